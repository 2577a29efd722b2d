import type { EmbeddingResult } from "@docindex/types";
import {
  AppError,
  ExternalServiceError,
  createGuardedCall,
  errorMessageOf,
} from "@docindex/errors";
import type { Logger } from "@docindex/logger";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";
import { errorForStatus, parseRetryAfter } from "./http-errors.js";

const DEFAULT_DIMENSIONS = 1024;
const DEFAULT_MAX_BATCH_SIZE = 32;
const SERVICE = "bge-m3";

export interface BgeM3ProviderConfig {
  baseUrl: string;
  dimensions?: number;
  maxBatchSize?: number;
  timeoutMs?: number;
  logger?: Logger;
}

interface BgeM3Response {
  embeddings: number[][];
  tokens_used?: number;
}

function isBgeM3Response(value: unknown): value is BgeM3Response {
  if (typeof value !== "object" || value === null) return false;
  const embeddings: unknown = Reflect.get(value, "embeddings");
  return (
    Array.isArray(embeddings) &&
    embeddings.every((row) => Array.isArray(row) && row.every((v) => typeof v === "number"))
  );
}

/**
 * BGE-M3 self-hosted embedding provider.
 * Communicates with a BGE-M3 model server via HTTP.
 */
export class BgeM3EmbeddingProvider implements IEmbeddingProvider {
  readonly name = SERVICE;
  readonly model = "bge-m3";
  readonly dimensions: number;
  readonly maxBatchSize: number;
  private baseUrl: string;
  private readonly call: (texts: string[]) => Promise<BgeM3Response>;

  constructor(config: BgeM3ProviderConfig) {
    this.baseUrl = config.baseUrl.replace(/\/$/, "");
    this.dimensions = config.dimensions ?? DEFAULT_DIMENSIONS;
    this.maxBatchSize = config.maxBatchSize ?? DEFAULT_MAX_BATCH_SIZE;
    this.call = createGuardedCall(
      `${SERVICE}-embed`,
      (texts: string[]) => this.request(texts),
      { timeout: config.timeoutMs, logger: config.logger },
    );
  }

  async batchEmbed(texts: string[]): Promise<EmbeddingResult> {
    const data = await this.call(texts);

    return {
      embeddings: data.embeddings,
      model: this.model,
      tokensUsed: data.tokens_used ?? 0,
      dimensions: this.dimensions,
    };
  }

  private async request(texts: string[]): Promise<BgeM3Response> {
    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/embed`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ texts, dimensions: this.dimensions }),
      });
    } catch (error: unknown) {
      if (AppError.isAppError(error)) throw error;
      throw new ExternalServiceError(
        `BGE-M3 request failed: ${errorMessageOf(error)}`,
        SERVICE,
        { cause: error },
      );
    }

    if (!response.ok) {
      throw errorForStatus(
        SERVICE,
        response.status,
        `BGE-M3 embedding failed: ${String(response.status)} ${response.statusText}`,
        { retryAfter: parseRetryAfter(response.headers.get("retry-after")) },
      );
    }

    const data: unknown = await response.json();
    if (!isBgeM3Response(data)) {
      throw new ExternalServiceError("BGE-M3 returned an unexpected response body", SERVICE);
    }
    return data;
  }
}
