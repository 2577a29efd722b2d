import type { ChunkingConfig } from "./chunk.js";

export type NodeEnv = "development" | "test" | "production";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type EmbeddingProviderType = "cohere" | "bge-m3";

export interface PipelineConfig {
  nodeEnv: NodeEnv;
  logLevel: LogLevel;
  storage: StorageConfig;
  chunking: ChunkingConfig;
  embedding: EmbeddingConfig;
  vectorStore: VectorStoreSettings;
  run: RunConfig;
  retry: RetryConfig;
  redis: RedisConfig;
  notifications: NotificationConfig;
}

export interface StorageConfig {
  bucket: string;
  region: string;
  endpoint?: string;
  forcePathStyle: boolean;
  accessKeyId?: string;
  secretAccessKey?: string;
  sourcePrefix: string;
  processedPrefix: string;
  extensions: string[];
}

export interface EmbeddingConfig {
  provider: EmbeddingProviderType;
  dimensions: number;
  batchSize: number;
  requestsPerSecond: number;
  burst: number;
  cohere: {
    apiKey: string;
    model: string;
  };
  bgeM3: {
    baseUrl: string;
  };
}

export interface VectorStoreSettings {
  url: string;
  apiKey?: string;
  collectionName: string;
  batchSize: number;
  requestsPerSecond: number;
  burst: number;
}

export interface RunConfig {
  maxConcurrency: number;
  deadlineMs?: number;
  processedRetentionDays?: number;
  schedule?: string;
}

export interface RetryConfig {
  maxAttempts: number;
  backoffBaseMs: number;
  backoffCapMs: number;
  callTimeoutMs: number;
}

export interface RedisConfig {
  url: string;
}

export interface NotificationConfig {
  webhookUrl?: string;
  databaseUrl?: string;
}
