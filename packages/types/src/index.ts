export type { DocumentDescriptor, SourceListing } from "./document.js";
export { PROCESSED_METADATA_KEYS } from "./document.js";

export type {
  BoundaryLevel,
  Chunk,
  ChunkingConfig,
  ChunkSource,
  ChunkStrategy,
  EmbeddedChunk,
} from "./chunk.js";
export { DEFAULT_BOUNDARY_POLICY } from "./chunk.js";

export type {
  CallContext,
  DocumentOutcome,
  DocumentState,
  DocumentStatus,
  EmbeddingResult,
  FailureEvent,
  FailureScope,
  ParseResult,
  PipelineStage,
  RunFailure,
  RunStatus,
  RunSummary,
  SkipReason,
  UpsertResult,
  VectorPayload,
  VectorRecord,
} from "./pipeline.js";

export type {
  EmbeddingConfig,
  EmbeddingProviderType,
  LogLevel,
  NodeEnv,
  NotificationConfig,
  PipelineConfig,
  RedisConfig,
  RetryConfig,
  RunConfig,
  StorageConfig,
  VectorStoreSettings,
} from "./config.js";

export type { DeadLetterJobData, IndexRunJobData, IndexRunReason } from "./job.js";
