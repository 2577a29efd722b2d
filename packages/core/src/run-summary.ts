import type { DocumentOutcome, RunFailure, RunStatus, RunSummary } from "@docindex/types";

/** Single collection point for the outcomes of a run. */
export class RunSummaryBuilder {
  private readonly outcomes = new Map<string, DocumentOutcome>();

  constructor(
    readonly runId: string,
    readonly startedAt: Date,
  ) {}

  record(outcome: DocumentOutcome): void {
    if (this.outcomes.has(outcome.key)) {
      throw new Error(`Outcome for ${outcome.key} already recorded in run ${this.runId}`);
    }
    this.outcomes.set(outcome.key, outcome);
  }

  has(key: string): boolean {
    return this.outcomes.has(key);
  }

  get size(): number {
    return this.outcomes.size;
  }

  build(status: RunStatus, finishedAt: Date): RunSummary {
    const outcomes = [...this.outcomes.values()].sort((a, b) => a.key.localeCompare(b.key));
    const counts = { total: outcomes.length, completed: 0, failed: 0, skipped: 0 };
    const totals = { chunks: 0, vectors: 0 };
    const failures: RunFailure[] = [];

    for (const outcome of outcomes) {
      counts[outcome.status]++;
      if (outcome.status === "completed") {
        totals.chunks += outcome.chunkCount;
        totals.vectors += outcome.vectorCount;
      }
      if (outcome.status === "failed") {
        failures.push({
          key: outcome.key,
          errorClass: outcome.errorClass ?? "UnknownError",
          stage: outcome.failedStage,
          message: outcome.errorMessage ?? "",
        });
      }
    }

    return {
      runId: this.runId,
      status,
      startedAt: this.startedAt,
      finishedAt,
      counts,
      failures,
      outcomes,
      totals,
    };
  }
}
