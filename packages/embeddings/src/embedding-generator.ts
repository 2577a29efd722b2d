import type { CallContext, Chunk, EmbeddedChunk } from "@docindex/types";
import {
  EmbeddingShapeError,
  errorClassOf,
  unlimited,
  withRetry,
  type IRateLimiter,
  type RetryOptions,
} from "@docindex/errors";
import type { Logger } from "@docindex/logger";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";

export interface EmbeddingGeneratorOptions {
  /** Upper bound on texts per request; the provider's own limit also applies. */
  batchSize: number;
  retry: Pick<RetryOptions, "maxAttempts" | "baseDelayMs" | "maxDelayMs" | "jitter">;
  /** Shared by every worker calling the same provider. */
  rateLimiter?: IRateLimiter;
  logger?: Logger;
}

/**
 * Turns chunks into vectors, batch by batch, with retry on transient failures.
 * A document is embedded completely or not at all.
 */
export class EmbeddingGenerator {
  private readonly provider: IEmbeddingProvider;
  private readonly options: EmbeddingGeneratorOptions;
  private readonly limiter: IRateLimiter;

  constructor(provider: IEmbeddingProvider, options: EmbeddingGeneratorOptions) {
    if (options.batchSize < 1) {
      throw new RangeError("batchSize must be at least 1");
    }
    this.provider = provider;
    this.options = options;
    this.limiter = options.rateLimiter ?? unlimited;
  }

  get model(): string {
    return this.provider.model;
  }

  get dimensions(): number {
    return this.provider.dimensions;
  }

  get batchSize(): number {
    return Math.min(this.options.batchSize, this.provider.maxBatchSize);
  }

  async embed(chunks: Chunk[], context: CallContext = {}): Promise<EmbeddedChunk[]> {
    const embedded: EmbeddedChunk[] = [];
    const size = this.batchSize;

    for (let i = 0; i < chunks.length; i += size) {
      const batch = chunks.slice(i, i + size);
      const vectors = await this.embedBatch(batch, context);
      batch.forEach((chunk, j) => {
        const vector = vectors[j];
        if (vector) {
          embedded.push({ ...chunk, vector });
        }
      });
    }

    return embedded;
  }

  private async embedBatch(batch: Chunk[], context: CallContext): Promise<number[][]> {
    const texts = batch.map((chunk) => chunk.text);
    let attempts = 0;

    try {
      const result = await withRetry(
        async () => {
          attempts++;
          await this.limiter.acquire();
          return this.provider.batchEmbed(texts);
        },
        {
          ...this.options.retry,
          onRetry: ({ attempt, maxAttempts, delayMs, error }) => {
            this.options.logger?.warn(
              { provider: this.provider.name, attempt, maxAttempts, delayMs, error: errorClassOf(error) },
              "embedding request failed, retrying",
            );
          },
        },
      );
      this.validate(result.embeddings, batch.length);
      return result.embeddings;
    } finally {
      context.noteAttempts?.(attempts);
    }
  }

  private validate(embeddings: number[][], expected: number): void {
    if (embeddings.length !== expected) {
      throw new EmbeddingShapeError(
        `Provider returned ${String(embeddings.length)} embeddings for ${String(expected)} texts`,
      );
    }
    for (const vector of embeddings) {
      if (vector.length !== this.provider.dimensions) {
        throw new EmbeddingShapeError(
          `Expected ${String(this.provider.dimensions)} dimensions, got ${String(vector.length)}`,
        );
      }
      if (!vector.every(Number.isFinite)) {
        throw new EmbeddingShapeError("Embedding contains non-finite values");
      }
    }
  }
}
