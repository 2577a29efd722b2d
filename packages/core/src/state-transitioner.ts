import type { DocumentDescriptor } from "@docindex/types";
import { PROCESSED_METADATA_KEYS } from "@docindex/types";
import { SourceChangedError, withRetry, type RetryOptions } from "@docindex/errors";
import type { Logger } from "@docindex/logger";
import type { IObjectStore } from "@docindex/storage";

export interface StateTransitionerOptions {
  processedPrefix: string;
  retry?: Pick<RetryOptions, "maxAttempts" | "baseDelayMs" | "maxDelayMs" | "jitter">;
  now?: () => Date;
  logger?: Logger;
}

export interface ProcessedRecord {
  runId: string;
  chunkCount: number;
  vectorCount: number;
}

/**
 * Moves documents from the source prefix to the processed prefix.
 *
 * The move is copy-then-delete. Between the two steps the source and a copy
 * with the same fingerprint coexist; the lister reports such a source as
 * already processed and {@link completeInterruptedMove} finishes the job.
 * The copy only goes ahead while the source still has the listed fingerprint,
 * and the source is kept if it changed before the delete.
 */
export class StateTransitioner {
  private readonly now: () => Date;

  constructor(
    private readonly store: IObjectStore,
    private readonly options: StateTransitionerOptions,
  ) {
    this.now = options.now ?? (() => new Date());
  }

  processedKeyFor(doc: DocumentDescriptor): string {
    return `${this.options.processedPrefix}${doc.relativeKey}`;
  }

  async markProcessed(doc: DocumentDescriptor, record: ProcessedRecord): Promise<string> {
    const processedKey = this.processedKeyFor(doc);
    const metadata = {
      [PROCESSED_METADATA_KEYS.RUN_ID]: record.runId,
      [PROCESSED_METADATA_KEYS.PROCESSED_AT]: this.now().toISOString(),
      [PROCESSED_METADATA_KEYS.FINGERPRINT]: doc.fingerprint,
      [PROCESSED_METADATA_KEYS.SOURCE_KEY]: doc.key,
      [PROCESSED_METADATA_KEYS.CHUNK_COUNT]: String(record.chunkCount),
      [PROCESSED_METADATA_KEYS.VECTOR_COUNT]: String(record.vectorCount),
    };

    await this.retry(() =>
      this.store.copy(doc.key, processedKey, {
        metadata,
        contentType: doc.mediaType,
        ifMatch: doc.fingerprint,
      }),
    );
    const current = await this.retry(() => this.store.head(doc.key));
    if (current?.fingerprint !== undefined && current.fingerprint !== doc.fingerprint) {
      throw new SourceChangedError(doc.key, {
        details: { listed: doc.fingerprint, current: current.fingerprint },
      });
    }
    await this.retry(() => this.store.delete(doc.key));
    this.options.logger?.debug({ documentKey: doc.key, processedKey }, "document moved to processed");
    return processedKey;
  }

  /** Deletes the source left behind when a move stopped after its copy. */
  async completeInterruptedMove(doc: DocumentDescriptor): Promise<string> {
    await this.retry(() => this.store.delete(doc.key));
    this.options.logger?.info({ documentKey: doc.key }, "completed interrupted move");
    return this.processedKeyFor(doc);
  }

  /** Deletes processed copies last modified before `olderThan`; returns how many. */
  async pruneProcessed(olderThan: Date, signal?: AbortSignal): Promise<number> {
    const objects = await this.retry(() => this.store.list(this.options.processedPrefix), signal);
    let removed = 0;
    for (const object of objects) {
      if (object.key.endsWith("/") || object.lastModified >= olderThan) {
        continue;
      }
      await this.retry(() => this.store.delete(object.key), signal);
      removed++;
    }
    if (removed > 0) {
      this.options.logger?.info({ removed, olderThan: olderThan.toISOString() }, "pruned processed documents");
    }
    return removed;
  }

  private retry<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    return withRetry(fn, { ...this.options.retry, signal });
  }
}
