import type { FailureEvent, RunSummary } from "@docindex/types";
import type { Logger } from "@docindex/logger";
import type { INotificationSink } from "./notification-sink.interface.js";
import { formatSummary } from "./format.js";

export class LogNotificationSink implements INotificationSink {
  readonly name = "log";

  constructor(private readonly logger: Logger) {}

  publishSummary(summary: RunSummary): Promise<void> {
    const { subject } = formatSummary(summary);
    const fields = {
      runId: summary.runId,
      status: summary.status,
      counts: summary.counts,
      totals: summary.totals,
      failures: summary.failures,
      durationMs: summary.finishedAt.getTime() - summary.startedAt.getTime(),
    };
    if (summary.counts.failed > 0) {
      this.logger.warn(fields, subject);
    } else {
      this.logger.info(fields, subject);
    }
    return Promise.resolve();
  }

  publishFailure(event: FailureEvent): Promise<void> {
    const fields = {
      runId: event.runId,
      documentKey: event.key,
      stage: event.stage,
      errorClass: event.errorClass,
      err: event.message,
    };
    if (event.scope === "run") {
      this.logger.error(fields, "indexing run failed");
    } else {
      this.logger.warn(fields, "document failed");
    }
    return Promise.resolve();
  }
}
