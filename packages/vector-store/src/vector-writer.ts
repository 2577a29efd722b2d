import type { CallContext, ChunkSource, UpsertResult, VectorRecord } from "@docindex/types";
import {
  AppError,
  RecordRejectedError,
  VectorStoreUnavailableError,
  computeBackoffDelay,
  errorMessageOf,
  isRetryable,
  sleep,
  unlimited,
  withRetry,
  type BackoffOptions,
  type IRateLimiter,
  type RetryOptions,
} from "@docindex/errors";
import type { Logger } from "@docindex/logger";
import type { IVectorStore } from "./vector-store.interface.js";

export interface VectorWriterOptions {
  collectionName: string;
  batchSize: number;
  retry: Required<Pick<RetryOptions, "maxAttempts" | "baseDelayMs" | "maxDelayMs">> &
    Pick<RetryOptions, "jitter">;
  /** Shared by every worker writing to the same store. */
  rateLimiter?: IRateLimiter;
  logger?: Logger;
}

type Rejection = Extract<UpsertResult, { status: "rejected" }>;

/**
 * Writes a document's records in batches. Records the store rejects as
 * retryable are re-sent with backoff; any permanent rejection fails the
 * document. Writes of the same content are serialized so the stores' owner
 * bookkeeping sees one writer at a time.
 */
export class VectorWriter {
  private readonly store: IVectorStore;
  private readonly options: VectorWriterOptions;
  private readonly limiter: IRateLimiter;
  private readonly writing = new Map<string, Promise<void>>();

  constructor(store: IVectorStore, options: VectorWriterOptions) {
    if (options.batchSize < 1) {
      throw new RangeError("batchSize must be at least 1");
    }
    this.store = store;
    this.options = options;
    this.limiter = options.rateLimiter ?? unlimited;
  }

  get collectionName(): string {
    return this.options.collectionName;
  }

  /**
   * Create the collection if it is missing, retrying transient failures.
   * Errors outside the taxonomy surface as VectorStoreUnavailableError.
   */
  async ensureCollection(dimensions: number): Promise<void> {
    try {
      await withRetry(
        async () => {
          await this.limiter.acquire();
          await this.store.ensureCollection(this.options.collectionName, dimensions);
        },
        {
          ...this.retryOptions(),
          onRetry: ({ attempt, maxAttempts, delayMs, error }) => {
            this.options.logger?.warn(
              { collection: this.options.collectionName, attempt, maxAttempts, delayMs, err: error },
              "collection check failed, retrying",
            );
          },
        },
      );
    } catch (error: unknown) {
      if (AppError.isAppError(error)) {
        throw error;
      }
      throw new VectorStoreUnavailableError(
        `Collection ${this.options.collectionName} unavailable: ${errorMessageOf(error)}`,
        { cause: error },
      );
    }
  }

  /**
   * Upsert every record, then delete the document's records left from earlier
   * content versions. Returns the number of records written.
   */
  async write(records: VectorRecord[], source: ChunkSource, context: CallContext = {}): Promise<number> {
    return this.exclusive(source.fingerprint, async () => {
      const { batchSize } = this.options;
      for (let i = 0; i < records.length; i += batchSize) {
        await this.writeBatch(records.slice(i, i + batchSize), context);
      }
      await this.removeStale(source);
      return records.length;
    });
  }

  /** Run `fn` once every earlier call for `key` has settled. */
  private async exclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.writing.get(key) ?? Promise.resolve();
    const current = previous.then(fn);
    const settled = current.then(
      () => undefined,
      () => undefined,
    );
    this.writing.set(key, settled);
    try {
      return await current;
    } finally {
      if (this.writing.get(key) === settled) {
        this.writing.delete(key);
      }
    }
  }

  private async writeBatch(batch: VectorRecord[], context: CallContext): Promise<void> {
    const { maxAttempts, baseDelayMs, maxDelayMs } = this.options.retry;
    const jitter = this.options.retry.jitter ?? true;
    let pending = batch;
    let attempt = 0;

    try {
      for (;;) {
        attempt++;
        await this.limiter.acquire();

        const retryable = await this.send(pending);
        if (retryable.length === 0) {
          return;
        }
        if (attempt >= maxAttempts) {
          throw new VectorStoreUnavailableError(
            `${String(retryable.length)} record(s) not written after ${String(attempt)} attempts: ${retryable[0]?.reason ?? "unknown"}`,
            { details: { ids: retryable.map((r) => r.id) } },
          );
        }

        const delayMs = computeBackoffDelay(attempt - 1, { baseDelayMs, maxDelayMs, jitter });
        this.options.logger?.warn(
          { attempt, maxAttempts, delayMs, pending: retryable.length },
          "vector upsert incomplete, retrying",
        );
        await sleep(delayMs);

        const retryIds = new Set(retryable.map((r) => r.id));
        pending = pending.filter((record) => retryIds.has(record.id));
      }
    } finally {
      context.noteAttempts?.(attempt);
    }
  }

  /** Upsert `records`; returns the retryable rejections and throws on permanent ones. */
  private async send(records: VectorRecord[]): Promise<Rejection[]> {
    let results: UpsertResult[];
    try {
      results = await this.store.upsert(this.options.collectionName, records);
    } catch (error: unknown) {
      if (!isRetryable(error)) {
        throw error;
      }
      const reason = errorMessageOf(error);
      return records.map((record): Rejection => ({ id: record.id, status: "rejected", retryable: true, reason }));
    }

    const rejections = results.filter((r): r is Rejection => r.status === "rejected");
    const permanent = rejections.filter((r) => !r.retryable);
    if (permanent.length > 0) {
      throw new RecordRejectedError(permanent.map(({ id, reason }) => ({ id, reason })));
    }
    return rejections;
  }

  private async removeStale(source: ChunkSource): Promise<void> {
    await withRetry(async () => {
      await this.limiter.acquire();
      await this.store.deleteStale(this.options.collectionName, source.documentKey, source.fingerprint);
    }, this.retryOptions());
  }

  private retryOptions(): BackoffOptions & { maxAttempts: number } {
    const { maxAttempts, baseDelayMs, maxDelayMs } = this.options.retry;
    return { maxAttempts, baseDelayMs, maxDelayMs, jitter: this.options.retry.jitter ?? true };
  }
}
