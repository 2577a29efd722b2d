import { eq } from "drizzle-orm";
import type { DocumentOutcome, RunSummary } from "@docindex/types";
import type { DbClient } from "./client.js";
import { documentOutcomes, indexingRuns } from "./schema/index.js";

export type IndexingRunRow = typeof indexingRuns.$inferInsert;
export type DocumentOutcomeRow = typeof documentOutcomes.$inferInsert;

export function toRunRow(summary: RunSummary): IndexingRunRow {
  return {
    id: summary.runId,
    status: summary.status,
    totalDocuments: summary.counts.total,
    completedDocuments: summary.counts.completed,
    failedDocuments: summary.counts.failed,
    skippedDocuments: summary.counts.skipped,
    chunkCount: summary.totals.chunks,
    vectorCount: summary.totals.vectors,
    startedAt: summary.startedAt,
    finishedAt: summary.finishedAt,
  };
}

export function toOutcomeRow(runId: string, outcome: DocumentOutcome): DocumentOutcomeRow {
  return {
    runId,
    documentKey: outcome.key,
    status: outcome.status,
    state: outcome.state,
    attempts: outcome.attempts,
    chunkCount: outcome.chunkCount,
    vectorCount: outcome.vectorCount,
    processedKey: outcome.processedKey ?? null,
    errorClass: outcome.errorClass ?? null,
    errorMessage: outcome.errorMessage ?? null,
    failedStage: outcome.failedStage ?? null,
    skipReason: outcome.skipReason ?? null,
    startedAt: outcome.startedAt,
    finishedAt: outcome.finishedAt,
  };
}

export interface IRunHistoryStore {
  save(summary: RunSummary): Promise<void>;
}

/** Persists run summaries. Saving a run id again replaces its earlier rows. */
export class RunHistoryRepository implements IRunHistoryStore {
  constructor(private readonly db: DbClient) {}

  async save(summary: RunSummary): Promise<void> {
    const run = toRunRow(summary);
    const outcomes = summary.outcomes.map((outcome) => toOutcomeRow(summary.runId, outcome));

    await this.db.transaction(async (tx) => {
      await tx
        .insert(indexingRuns)
        .values(run)
        .onConflictDoUpdate({ target: indexingRuns.id, set: run });
      await tx.delete(documentOutcomes).where(eq(documentOutcomes.runId, summary.runId));
      if (outcomes.length > 0) {
        await tx.insert(documentOutcomes).values(outcomes);
      }
    });
  }
}
