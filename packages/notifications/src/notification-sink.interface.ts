import type { FailureEvent, RunSummary } from "@docindex/types";

export interface INotificationSink {
  readonly name: string;
  publishSummary(summary: RunSummary): Promise<void>;
  publishFailure(event: FailureEvent): Promise<void>;
}
