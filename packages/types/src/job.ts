export type IndexRunReason = "manual" | "schedule";

export interface IndexRunJobData {
  runId?: string;
  reason: IndexRunReason;
}

export interface DeadLetterJobData extends IndexRunJobData {
  originalQueue: string;
  failureReason: string;
  errorClass: string;
  failedAt: string;
}
