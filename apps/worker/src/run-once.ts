import { parseEnv } from "@docindex/config";
import { createLogger } from "@docindex/logger";
import { createContainer } from "./container.js";
import { exitCodeFor, processIndexRun } from "./processors/index-run.js";

async function runOnce(): Promise<number> {
  const config = parseEnv();
  const logger = createLogger({ level: config.logLevel, service: "docindex-run" });
  const container = createContainer(config, logger);
  const controller = new AbortController();
  const abort = (): void => controller.abort();
  process.once("SIGTERM", abort);
  process.once("SIGINT", abort);

  try {
    const summary = await processIndexRun(
      { reason: "manual" },
      {
        orchestrator: container.orchestrator,
        transitioner: container.transitioner,
        logger,
        processedRetentionDays: config.run.processedRetentionDays,
      },
      controller.signal,
    );
    return exitCodeFor(summary);
  } catch (err: unknown) {
    logger.error({ err }, "indexing run failed");
    return 1;
  } finally {
    await container.close();
  }
}

runOnce().then(
  (code) => process.exit(code),
  (err: unknown) => {
    createLogger({ service: "docindex-run" }).fatal({ err }, "indexing run crashed");
    process.exit(1);
  },
);
