import type { FailureEvent, RunSummary } from "@docindex/types";
import type { IRunHistoryStore } from "@docindex/db";
import { NotificationError, errorMessageOf } from "@docindex/errors";
import type { INotificationSink } from "./notification-sink.interface.js";

/** Records each finished run; failures are part of the summary, so events are not stored. */
export class RunHistorySink implements INotificationSink {
  readonly name = "run-history";

  constructor(private readonly store: IRunHistoryStore) {}

  async publishSummary(summary: RunSummary): Promise<void> {
    try {
      await this.store.save(summary);
    } catch (error: unknown) {
      throw new NotificationError(`Saving run ${summary.runId} failed: ${errorMessageOf(error)}`, this.name, {
        cause: error,
      });
    }
  }

  publishFailure(_event: FailureEvent): Promise<void> {
    return Promise.resolve();
  }
}
