import { CohereClient, CohereError, CohereTimeoutError } from "cohere-ai";
import type { EmbeddingResult } from "@docindex/types";
import {
  AppError,
  ExternalServiceError,
  TimeoutError,
  createGuardedCall,
  errorMessageOf,
} from "@docindex/errors";
import type { Logger } from "@docindex/logger";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";
import { errorForStatus } from "./http-errors.js";

const DEFAULT_MODEL = "embed-v4.0";
const DEFAULT_DIMENSIONS = 1024;
const BATCH_SIZE = 96; // Cohere limit
const SERVICE = "cohere";

export interface CohereProviderConfig {
  apiKey: string;
  model?: string;
  dimensions?: number;
  /** Per-call timeout enforced by the circuit breaker. */
  timeoutMs?: number;
  logger?: Logger;
}

interface CohereEmbedResponse {
  embeddings: number[][];
  inputTokens: number;
}

export function mapCohereError(error: unknown): unknown {
  if (AppError.isAppError(error)) {
    return error;
  }
  if (error instanceof CohereTimeoutError) {
    return new TimeoutError("Cohere embed request timed out", SERVICE, { cause: error });
  }
  if (error instanceof CohereError) {
    return errorForStatus(SERVICE, error.statusCode, `Cohere embed failed: ${error.message}`, {
      cause: error,
    });
  }
  return new ExternalServiceError(`Cohere embed failed: ${errorMessageOf(error)}`, SERVICE, {
    cause: error,
  });
}

export class CohereEmbeddingProvider implements IEmbeddingProvider {
  readonly name = SERVICE;
  readonly model: string;
  readonly dimensions: number;
  readonly maxBatchSize = BATCH_SIZE;
  private client: CohereClient;
  private readonly call: (texts: string[]) => Promise<CohereEmbedResponse>;

  constructor(config: CohereProviderConfig) {
    this.client = new CohereClient({ token: config.apiKey });
    this.model = config.model ?? DEFAULT_MODEL;
    this.dimensions = config.dimensions ?? DEFAULT_DIMENSIONS;
    this.call = createGuardedCall(
      `${SERVICE}-embed`,
      (texts: string[]) => this.request(texts),
      { timeout: config.timeoutMs, logger: config.logger },
    );
  }

  async batchEmbed(texts: string[]): Promise<EmbeddingResult> {
    const allEmbeddings: number[][] = [];
    let totalTokens = 0;

    // Process in batches of BATCH_SIZE
    for (let i = 0; i < texts.length; i += BATCH_SIZE) {
      const batch = texts.slice(i, i + BATCH_SIZE);
      const response = await this.call(batch);
      allEmbeddings.push(...response.embeddings);
      totalTokens += response.inputTokens;
    }

    return {
      embeddings: allEmbeddings,
      model: this.model,
      tokensUsed: totalTokens,
      dimensions: this.dimensions,
    };
  }

  private async request(texts: string[]): Promise<CohereEmbedResponse> {
    try {
      const response = await this.client.v2.embed(
        {
          texts,
          model: this.model,
          inputType: "search_document",
          embeddingTypes: ["float"],
          // embed-v4 models default to 1536 dimensions
          ...(this.model.startsWith("embed-v4") ? { outputDimension: this.dimensions } : {}),
        },
        { maxRetries: 0 },
      );

      return {
        embeddings: response.embeddings.float ?? [],
        // Use actual tokensUsed from Cohere response for billing accuracy
        inputTokens: response.meta?.billedUnits?.inputTokens ?? 0,
      };
    } catch (error: unknown) {
      throw mapCohereError(error);
    }
  }
}
