export type { INotificationSink } from "./notification-sink.interface.js";
export { formatFailure, formatSummary, type NotificationMessage } from "./format.js";
export { LogNotificationSink } from "./log-sink.js";
export { WebhookNotificationSink, type WebhookSinkOptions } from "./webhook-sink.js";
export { RunHistorySink } from "./run-history-sink.js";
export { CompositeNotificationSink } from "./composite-sink.js";
