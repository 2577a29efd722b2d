import type { PipelineConfig } from "@docindex/types";
import { TokenBucketRateLimiter } from "@docindex/errors";
import { redactUrl, type Logger } from "@docindex/logger";
import { S3ObjectStore } from "@docindex/storage";
import { createChunker } from "@docindex/chunker";
import { EmbeddingGenerator, createEmbeddingProvider } from "@docindex/embeddings";
import { QdrantVectorStore, VectorWriter } from "@docindex/vector-store";
import {
  CompositeNotificationSink,
  LogNotificationSink,
  RunHistorySink,
  WebhookNotificationSink,
  type INotificationSink,
} from "@docindex/notifications";
import { RunHistoryRepository, createDbClient } from "@docindex/db";
import {
  DocumentPipeline,
  RunOrchestrator,
  SourceLister,
  StateTransitioner,
} from "@docindex/core";

export interface Container {
  orchestrator: RunOrchestrator;
  transitioner: StateTransitioner;
  close(): Promise<void>;
}

/** Connection endpoints for the startup log, passwords masked. */
export function connectionSummary(config: PipelineConfig): Record<string, string | null> {
  const { databaseUrl } = config.notifications;
  return {
    redis: redactUrl(config.redis.url),
    qdrant: redactUrl(config.vectorStore.url),
    database: databaseUrl ? redactUrl(databaseUrl) : null,
  };
}

/** Wires the production adapters from configuration. */
export function createContainer(config: PipelineConfig, logger: Logger): Container {
  const retry = {
    maxAttempts: config.retry.maxAttempts,
    baseDelayMs: config.retry.backoffBaseMs,
    maxDelayMs: config.retry.backoffCapMs,
    jitter: true,
  };

  const store = new S3ObjectStore(config.storage);

  const provider = createEmbeddingProvider({
    provider: config.embedding.provider,
    dimensions: config.embedding.dimensions,
    timeoutMs: config.retry.callTimeoutMs,
    logger,
    cohere: config.embedding.cohere,
    bgeM3: config.embedding.bgeM3,
  });
  const embedder = new EmbeddingGenerator(provider, {
    batchSize: config.embedding.batchSize,
    retry,
    rateLimiter: new TokenBucketRateLimiter({
      capacity: config.embedding.burst,
      refillPerSecond: config.embedding.requestsPerSecond,
    }),
    logger,
  });

  const vectorStore = new QdrantVectorStore({
    url: config.vectorStore.url,
    apiKey: config.vectorStore.apiKey,
    timeoutMs: config.retry.callTimeoutMs,
    logger,
  });
  const writer = new VectorWriter(vectorStore, {
    collectionName: config.vectorStore.collectionName,
    batchSize: config.vectorStore.batchSize,
    retry,
    rateLimiter: new TokenBucketRateLimiter({
      capacity: config.vectorStore.burst,
      refillPerSecond: config.vectorStore.requestsPerSecond,
    }),
    logger,
  });

  const transitioner = new StateTransitioner(store, {
    processedPrefix: config.storage.processedPrefix,
    retry,
    logger,
  });

  const pipeline = new DocumentPipeline({
    store,
    chunker: createChunker(config.chunking),
    window: config.chunking,
    embedder,
    writer,
    transitioner,
    logger,
    retry,
  });

  const lister = new SourceLister(store, {
    sourcePrefix: config.storage.sourcePrefix,
    processedPrefix: config.storage.processedPrefix,
    extensions: config.storage.extensions,
  });

  const sinks: INotificationSink[] = [new LogNotificationSink(logger)];
  if (config.notifications.webhookUrl) {
    sinks.push(new WebhookNotificationSink({ url: config.notifications.webhookUrl }));
  }
  const db = config.notifications.databaseUrl
    ? createDbClient({ url: config.notifications.databaseUrl })
    : undefined;
  if (db) {
    sinks.push(new RunHistorySink(new RunHistoryRepository(db.db)));
  }

  const orchestrator = new RunOrchestrator({
    lister,
    pipeline,
    transitioner,
    writer,
    sink: new CompositeNotificationSink(sinks, logger),
    logger,
    dimensions: provider.dimensions,
    maxConcurrency: config.run.maxConcurrency,
    deadlineMs: config.run.deadlineMs,
  });

  return {
    orchestrator,
    transitioner,
    close: async () => {
      await db?.close();
    },
  };
}
