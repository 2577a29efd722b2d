import type { FailureEvent, RunSummary } from "@docindex/types";
import { NotificationError, errorMessageOf } from "@docindex/errors";
import type { INotificationSink } from "./notification-sink.interface.js";
import { formatFailure, formatSummary } from "./format.js";

export interface WebhookSinkOptions {
  url: string;
  timeoutMs?: number;
}

/** POSTs a JSON message per summary and failure event. */
export class WebhookNotificationSink implements INotificationSink {
  readonly name = "webhook";
  private readonly url: string;
  private readonly timeoutMs: number;

  constructor(options: WebhookSinkOptions) {
    this.url = options.url;
    this.timeoutMs = options.timeoutMs ?? 10_000;
  }

  async publishSummary(summary: RunSummary): Promise<void> {
    await this.post({ type: "run-summary", ...formatSummary(summary), summary });
  }

  async publishFailure(event: FailureEvent): Promise<void> {
    await this.post({ type: "failure", ...formatFailure(event), event });
  }

  private async post(body: Record<string, unknown>): Promise<void> {
    let response: Response;
    try {
      response = await fetch(this.url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error: unknown) {
      throw new NotificationError(`Webhook request failed: ${errorMessageOf(error)}`, this.name, {
        cause: error,
      });
    }
    if (!response.ok) {
      throw new NotificationError(`Webhook responded ${String(response.status)}`, this.name, {
        details: { status: response.status },
      });
    }
  }
}
