import { describe, it, expect, vi } from "vitest";
import type { RunSummary } from "@docindex/types";
import { CancelledError } from "@docindex/errors";
import { createLogger } from "@docindex/logger";
import { exitCodeFor, processIndexRun } from "./index-run.js";

function summaryWith(overrides: Partial<RunSummary> = {}): RunSummary {
  return {
    runId: "run-1",
    status: "completed",
    startedAt: new Date("2026-04-01T00:00:00.000Z"),
    finishedAt: new Date("2026-04-01T00:05:00.000Z"),
    counts: { total: 2, completed: 2, failed: 0, skipped: 0 },
    failures: [],
    outcomes: [],
    totals: { chunks: 5, vectors: 5 },
    ...overrides,
  };
}

const logger = createLogger({ level: "silent" });

describe("processIndexRun", () => {
  it("runs the orchestrator with the job's run id and signal", async () => {
    const run = vi.fn().mockResolvedValue(summaryWith());
    const pruneProcessed = vi.fn();
    const controller = new AbortController();

    const summary = await processIndexRun(
      { runId: "job-42", reason: "manual" },
      { orchestrator: { run }, transitioner: { pruneProcessed }, logger },
      controller.signal,
    );

    expect(summary.runId).toBe("run-1");
    expect(run).toHaveBeenCalledWith({ runId: "job-42", signal: controller.signal });
    expect(pruneProcessed).not.toHaveBeenCalled();
  });

  it("prunes processed copies past the retention period", async () => {
    const run = vi.fn().mockResolvedValue(summaryWith());
    const pruneProcessed = vi.fn().mockResolvedValue(3);

    await processIndexRun(
      { reason: "schedule" },
      {
        orchestrator: { run },
        transitioner: { pruneProcessed },
        logger,
        processedRetentionDays: 7,
        now: () => new Date("2026-04-15T00:00:00.000Z"),
      },
    );

    expect(pruneProcessed).toHaveBeenCalledWith(new Date("2026-04-08T00:00:00.000Z"), undefined);
  });

  it("fails the job when the run was cancelled", async () => {
    const run = vi.fn().mockResolvedValue(summaryWith({ status: "cancelled" }));
    const pruneProcessed = vi.fn();

    await expect(
      processIndexRun(
        { reason: "manual" },
        { orchestrator: { run }, transitioner: { pruneProcessed }, logger, processedRetentionDays: 1 },
      ),
    ).rejects.toBeInstanceOf(CancelledError);
    expect(pruneProcessed).not.toHaveBeenCalled();
  });
});

describe("exitCodeFor", () => {
  it("is 0 only for a completed run without failures", () => {
    expect(exitCodeFor(summaryWith())).toBe(0);
    expect(exitCodeFor(summaryWith({ counts: { total: 2, completed: 1, failed: 1, skipped: 0 } }))).toBe(1);
    expect(exitCodeFor(summaryWith({ status: "cancelled" }))).toBe(1);
  });
});
