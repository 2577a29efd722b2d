import { Queue } from "bullmq";
import type { ConnectionOptions } from "bullmq";
import type { IndexRunJobData } from "@docindex/types";

export const QUEUE_NAMES = {
  INDEX_RUN: "docindex:index-run",
} as const;

export interface QueueConfig {
  connection: ConnectionOptions;
}

const SCHEDULED_JOB_NAME = "scheduled-index-run";

export function createIndexRunQueue(config: QueueConfig) {
  return new Queue<IndexRunJobData>(QUEUE_NAMES.INDEX_RUN, {
    connection: config.connection,
    defaultJobOptions: {
      // A failed run is picked up by the next trigger, not retried in place
      attempts: 1,
      removeOnComplete: { count: 100 },
      removeOnFail: { count: 500 },
    },
  });
}

export type IndexRunQueue = ReturnType<typeof createIndexRunQueue>;

/**
 * Install `pattern` as the only repeat schedule of the queue, or remove
 * every schedule when `pattern` is undefined.
 */
export async function syncRunSchedule(queue: IndexRunQueue, pattern: string | undefined): Promise<void> {
  const existing = await queue.getRepeatableJobs();
  for (const job of existing) {
    if (job.pattern !== pattern) {
      await queue.removeRepeatableByKey(job.key);
    }
  }
  if (pattern && !existing.some((job) => job.pattern === pattern)) {
    await queue.add(SCHEDULED_JOB_NAME, { reason: "schedule" }, { repeat: { pattern } });
  }
}
