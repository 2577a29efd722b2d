import type { FailureEvent, RunSummary } from "@docindex/types";
import { NotificationError, errorMessageOf } from "@docindex/errors";
import type { Logger } from "@docindex/logger";
import type { INotificationSink } from "./notification-sink.interface.js";

/**
 * Fans out to every sink. A failing sink is logged as a NotificationError
 * and never affects the others or the caller.
 */
export class CompositeNotificationSink implements INotificationSink {
  readonly name = "composite";

  constructor(
    private readonly sinks: INotificationSink[],
    private readonly logger: Logger,
  ) {}

  async publishSummary(summary: RunSummary): Promise<void> {
    await this.fanOut((sink) => sink.publishSummary(summary), { runId: summary.runId });
  }

  async publishFailure(event: FailureEvent): Promise<void> {
    await this.fanOut((sink) => sink.publishFailure(event), {
      runId: event.runId,
      documentKey: event.key,
    });
  }

  private async fanOut(
    publish: (sink: INotificationSink) => Promise<void>,
    fields: Record<string, unknown>,
  ): Promise<void> {
    const results = await Promise.allSettled(this.sinks.map((sink) => publish(sink)));
    results.forEach((result, i) => {
      if (result.status === "fulfilled") return;
      const sinkName = this.sinks[i]?.name ?? "unknown";
      const error =
        result.reason instanceof NotificationError
          ? result.reason
          : new NotificationError(errorMessageOf(result.reason), sinkName, { cause: result.reason });
      this.logger.warn({ ...fields, sink: sinkName, err: error }, "notification failed");
    });
  }
}
