import type { FailureEvent, RunSummary } from "@docindex/types";

export interface NotificationMessage {
  subject: string;
  text: string;
}

function successRate(summary: RunSummary): string {
  const { total, completed } = summary.counts;
  const rate = total > 0 ? (completed / total) * 100 : 0;
  return `${rate.toFixed(1)}%`;
}

export function formatSummary(summary: RunSummary): NotificationMessage {
  const { counts, totals } = summary;
  const subject = `Document indexing run ${summary.status} - ${String(counts.completed)}/${String(counts.total)} successful`;
  const lines = [
    `Run ${summary.runId} ${summary.status}`,
    "",
    `Total documents: ${String(counts.total)}`,
    `Completed: ${String(counts.completed)}`,
    `Failed: ${String(counts.failed)}`,
    `Skipped: ${String(counts.skipped)}`,
    `Success rate: ${successRate(summary)}`,
    `Chunks created: ${String(totals.chunks)}`,
    `Vectors stored: ${String(totals.vectors)}`,
    `Started: ${summary.startedAt.toISOString()}`,
    `Finished: ${summary.finishedAt.toISOString()}`,
  ];
  if (summary.failures.length > 0) {
    lines.push("", "Failures:");
    for (const failure of summary.failures) {
      lines.push(`- ${failure.key} [${failure.stage ?? "run"}] ${failure.errorClass}: ${failure.message}`);
    }
  }
  return { subject, text: lines.join("\n") };
}

export function formatFailure(event: FailureEvent): NotificationMessage {
  const target = event.key ?? `run ${event.runId}`;
  return {
    subject: `Document indexing failure - ${target}`,
    text: `${event.errorClass} during ${event.stage ?? "run"}: ${event.message}`,
  };
}
