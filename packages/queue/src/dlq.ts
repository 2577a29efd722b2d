import { Queue } from "bullmq";
import type { ConnectionOptions } from "bullmq";
import type { DeadLetterJobData } from "@docindex/types";

export const DLQ_NAME = "docindex:dead-letter";

export function createDeadLetterQueue(connection: ConnectionOptions) {
  return new Queue<DeadLetterJobData>(DLQ_NAME, {
    connection,
    defaultJobOptions: {
      removeOnComplete: false,
      removeOnFail: false,
    },
  });
}

export type DeadLetterQueue = ReturnType<typeof createDeadLetterQueue>;
