import { randomUUID } from "node:crypto";
import pLimit from "p-limit";
import type {
  DocumentDescriptor,
  DocumentOutcome,
  FailureEvent,
  RunSummary,
  SkipReason,
} from "@docindex/types";
import { errorClassOf, errorMessageOf } from "@docindex/errors";
import type { Logger } from "@docindex/logger";
import type { INotificationSink } from "@docindex/notifications";
import type { VectorWriter } from "@docindex/vector-store";
import type { DocumentPipeline } from "./document-pipeline.js";
import { RunSummaryBuilder } from "./run-summary.js";
import type { SourceLister } from "./source-lister.js";
import type { StateTransitioner } from "./state-transitioner.js";

export interface RunOrchestratorDependencies {
  lister: SourceLister;
  pipeline: DocumentPipeline;
  transitioner: StateTransitioner;
  writer: VectorWriter;
  sink: INotificationSink;
  logger: Logger;
  /** Vector size of the collection, created on first use. */
  dimensions: number;
  maxConcurrency?: number;
  /** Cancels the run this many milliseconds after it starts. */
  deadlineMs?: number;
  now?: () => Date;
}

export interface RunOptions {
  runId?: string;
  signal?: AbortSignal;
}

const DEFAULT_MAX_CONCURRENCY = 5;

/**
 * One indexing run: list, recover interrupted moves, then process pending
 * documents on a bounded pool. Failures stay with their document; only a
 * listing failure aborts the run. When the collection cannot be reached,
 * every pending document fails at the write stage and the run still reports.
 */
export class RunOrchestrator {
  private readonly now: () => Date;
  private readonly maxConcurrency: number;

  constructor(private readonly deps: RunOrchestratorDependencies) {
    this.now = deps.now ?? (() => new Date());
    this.maxConcurrency = deps.maxConcurrency ?? DEFAULT_MAX_CONCURRENCY;
    if (!Number.isInteger(this.maxConcurrency) || this.maxConcurrency < 1) {
      throw new RangeError("maxConcurrency must be a positive integer");
    }
  }

  async run(options: RunOptions = {}): Promise<RunSummary> {
    const runId = options.runId ?? randomUUID();
    const signal = this.combineSignals(options.signal);
    const logger = this.deps.logger.child({ runId });
    const builder = new RunSummaryBuilder(runId, this.now());
    const notifications: Promise<void>[] = [];

    const notify = (event: Omit<FailureEvent, "runId" | "occurredAt">): void => {
      const published = this.deps.sink
        .publishFailure({ ...event, runId, occurredAt: this.now() })
        .catch((error: unknown) => {
          logger.warn({ err: error, sink: this.deps.sink.name }, "failure notification not delivered");
        });
      notifications.push(published);
    };

    logger.info({ maxConcurrency: this.maxConcurrency }, "indexing run started");

    try {
      const listing = await this.deps.lister.list();
      logger.info(
        {
          pending: listing.pending.length,
          alreadyProcessed: listing.alreadyProcessed.length,
          totalSource: listing.totalSource,
        },
        "documents listed",
      );

      await this.recoverInterruptedMoves(listing.alreadyProcessed, builder, notify, signal);

      let pending = listing.pending;
      if (pending.length > 0 && !signal?.aborted) {
        try {
          await this.deps.writer.ensureCollection(this.deps.dimensions);
        } catch (error: unknown) {
          logger.error({ err: error }, "vector collection unavailable");
          this.failAll(pending, error, builder, notify);
          pending = [];
        }
      }

      const limit = pLimit(this.maxConcurrency);
      await Promise.all(
        pending.map((doc) =>
          limit(async () => {
            const outcome = signal?.aborted
              ? this.skipped(doc, "cancelled", "pending")
              : await this.deps.pipeline.process(doc, { runId, signal, logger });
            builder.record(outcome);
            if (outcome.status === "failed") {
              notify({
                scope: "document",
                key: outcome.key,
                stage: outcome.failedStage,
                errorClass: outcome.errorClass ?? "UnknownError",
                message: outcome.errorMessage ?? "",
              });
            }
          }),
        ),
      );
    } catch (error: unknown) {
      logger.error({ err: error }, "indexing run aborted");
      notify({ scope: "run", errorClass: errorClassOf(error), message: errorMessageOf(error) });
      await Promise.allSettled(notifications);
      throw error;
    }

    const summary = builder.build(signal?.aborted ? "cancelled" : "completed", this.now());
    logger.info({ status: summary.status, counts: summary.counts, totals: summary.totals }, "indexing run finished");

    try {
      await this.deps.sink.publishSummary(summary);
    } catch (error: unknown) {
      logger.warn({ err: error, sink: this.deps.sink.name }, "summary notification not delivered");
    }
    await Promise.allSettled(notifications);
    return summary;
  }

  private async recoverInterruptedMoves(
    docs: DocumentDescriptor[],
    builder: RunSummaryBuilder,
    notify: (event: Omit<FailureEvent, "runId" | "occurredAt">) => void,
    signal: AbortSignal | undefined,
  ): Promise<void> {
    for (const doc of docs) {
      if (signal?.aborted) {
        builder.record(this.skipped(doc, "cancelled", "pending"));
        continue;
      }
      const startedAt = this.now();
      try {
        const processedKey = await this.deps.transitioner.completeInterruptedMove(doc);
        builder.record({ ...this.skipped(doc, "already-processed", "completed"), processedKey, startedAt });
      } catch (error: unknown) {
        const errorClass = errorClassOf(error);
        const message = errorMessageOf(error);
        builder.record({
          key: doc.key,
          status: "failed",
          state: "failed",
          attempts: 1,
          chunkCount: 0,
          vectorCount: 0,
          errorClass,
          errorMessage: message,
          failedStage: "transitioning",
          startedAt,
          finishedAt: this.now(),
        });
        notify({ scope: "document", key: doc.key, stage: "transitioning", errorClass, message });
      }
    }
  }

  private failAll(
    docs: DocumentDescriptor[],
    error: unknown,
    builder: RunSummaryBuilder,
    notify: (event: Omit<FailureEvent, "runId" | "occurredAt">) => void,
  ): void {
    const errorClass = errorClassOf(error);
    const message = errorMessageOf(error);
    for (const doc of docs) {
      const at = this.now();
      builder.record({
        key: doc.key,
        status: "failed",
        state: "failed",
        attempts: 0,
        chunkCount: 0,
        vectorCount: 0,
        errorClass,
        errorMessage: message,
        failedStage: "writing",
        startedAt: at,
        finishedAt: at,
      });
      notify({ scope: "document", key: doc.key, stage: "writing", errorClass, message });
    }
  }

  private skipped(
    doc: DocumentDescriptor,
    reason: SkipReason,
    state: DocumentOutcome["state"],
  ): DocumentOutcome {
    const at = this.now();
    return {
      key: doc.key,
      status: "skipped",
      state,
      attempts: 0,
      chunkCount: 0,
      vectorCount: 0,
      skipReason: reason,
      startedAt: at,
      finishedAt: at,
    };
  }

  private combineSignals(external: AbortSignal | undefined): AbortSignal | undefined {
    const signals: AbortSignal[] = [];
    if (external) signals.push(external);
    if (this.deps.deadlineMs !== undefined) signals.push(AbortSignal.timeout(this.deps.deadlineMs));
    if (signals.length <= 1) return signals[0];
    return AbortSignal.any(signals);
  }
}
