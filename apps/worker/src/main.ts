import { Worker } from "bullmq";
import { parseEnv } from "@docindex/config";
import { createLogger } from "@docindex/logger";
import { errorClassOf, errorMessageOf } from "@docindex/errors";
import {
  QUEUE_NAMES,
  createDeadLetterQueue,
  createIndexRunQueue,
  parseRedisConnection,
  syncRunSchedule,
} from "@docindex/queue";
import type { IndexRunJobData } from "@docindex/types";
import { connectionSummary, createContainer } from "./container.js";
import { processIndexRun } from "./processors/index-run.js";

async function main(): Promise<void> {
  const config = parseEnv();
  const logger = createLogger({ level: config.logLevel, service: "docindex-worker" });
  const connection = parseRedisConnection(config.redis.url);
  const container = createContainer(config, logger);

  const queue = createIndexRunQueue({ connection });
  const deadLetters = createDeadLetterQueue(connection);
  await syncRunSchedule(queue, config.run.schedule);

  const inFlight = new Set<AbortController>();

  // One run at a time
  const worker = new Worker<IndexRunJobData>(
    QUEUE_NAMES.INDEX_RUN,
    async (job) => {
      const controller = new AbortController();
      inFlight.add(controller);
      try {
        const summary = await processIndexRun(
          { ...job.data, runId: job.data.runId ?? job.id },
          {
            orchestrator: container.orchestrator,
            transitioner: container.transitioner,
            logger,
            processedRetentionDays: config.run.processedRetentionDays,
          },
          controller.signal,
        );
        return summary.counts;
      } finally {
        inFlight.delete(controller);
      }
    },
    { connection, concurrency: 1 },
  );

  worker.on("failed", (job, error) => {
    logger.error({ jobId: job?.id, err: error }, "index run job failed");
    if (!job) return;
    deadLetters
      .add("dead-letter", {
        ...job.data,
        originalQueue: QUEUE_NAMES.INDEX_RUN,
        failureReason: errorMessageOf(error),
        errorClass: errorClassOf(error),
        failedAt: new Date().toISOString(),
      })
      .catch((dlqError: unknown) => {
        logger.error({ jobId: job.id, err: dlqError }, "could not dead-letter job");
      });
  });

  logger.info(
    { queue: QUEUE_NAMES.INDEX_RUN, schedule: config.run.schedule ?? null, ...connectionSummary(config) },
    "worker started",
  );

  const shutdown = async (): Promise<void> => {
    logger.info({ inFlight: inFlight.size }, "shutting down");
    for (const controller of inFlight) {
      controller.abort();
    }
    await worker.close();
    await Promise.all([queue.close(), deadLetters.close()]);
    await container.close();
    logger.info("worker closed");
    process.exit(0);
  };

  process.on("SIGTERM", () => void shutdown());
  process.on("SIGINT", () => void shutdown());
}

main().catch((err: unknown) => {
  createLogger({ service: "docindex-worker" }).fatal({ err }, "worker failed to start");
  process.exit(1);
});
