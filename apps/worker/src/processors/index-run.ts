import type { RunSummary } from "@docindex/types";
import { CancelledError } from "@docindex/errors";
import type { Logger } from "@docindex/logger";
import type { IndexRunJobData } from "@docindex/types";
import type { RunOrchestrator, StateTransitioner } from "@docindex/core";

const DAY_MS = 24 * 60 * 60 * 1000;

export interface IndexRunDependencies {
  orchestrator: Pick<RunOrchestrator, "run">;
  transitioner: Pick<StateTransitioner, "pruneProcessed">;
  logger: Logger;
  processedRetentionDays?: number;
  now?: () => Date;
}

/**
 * Index-run job processor.
 *
 * Runs the orchestrator once, then prunes old processed copies when a
 * retention period is configured. Listing failures and cancellation propagate
 * so the job is marked failed.
 */
export async function processIndexRun(
  data: IndexRunJobData,
  deps: IndexRunDependencies,
  signal?: AbortSignal,
): Promise<RunSummary> {
  const logger = deps.logger.child({ reason: data.reason });
  const summary = await deps.orchestrator.run({ runId: data.runId, signal });

  if (summary.status === "cancelled") {
    throw new CancelledError(`Run ${summary.runId} cancelled`);
  }

  if (deps.processedRetentionDays !== undefined) {
    const now = deps.now?.() ?? new Date();
    const cutoff = new Date(now.getTime() - deps.processedRetentionDays * DAY_MS);
    const removed = await deps.transitioner.pruneProcessed(cutoff, signal);
    logger.info({ runId: summary.runId, removed }, "processed retention applied");
  }

  return summary;
}

/** Process exit code for a finished run: 1 when any document failed. */
export function exitCodeFor(summary: RunSummary): number {
  return summary.status === "completed" && summary.counts.failed === 0 ? 0 : 1;
}
