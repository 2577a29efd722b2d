export interface ParseResult {
  text: string;
  pageCount: number;
  sectionCount?: number;
  metadata: Record<string, unknown>;
}

export interface EmbeddingResult {
  embeddings: number[][];
  model: string;
  tokensUsed: number;
  dimensions: number;
}

export interface VectorPayload extends Record<string, unknown> {
  /** Source key that last wrote the record. */
  documentKey: string;
  /** Every source key currently holding this content; kept up to date by the store. */
  documentKeys?: string[];
  fingerprint: string;
  text: string;
  chunkIndex: number;
  startChar: number;
  endChar: number;
  totalChunks: number;
  embeddingModel: string;
  mediaType: string;
  pageCount: number;
}

export interface VectorRecord {
  id: string;
  vector: number[];
  payload: VectorPayload;
}

export type UpsertResult =
  | { id: string; status: "ok" }
  | { id: string; status: "rejected"; retryable: boolean; reason: string };

export type DocumentState =
  | "pending"
  | "extracting"
  | "chunking"
  | "embedding"
  | "writing"
  | "transitioning"
  | "completed"
  | "failed";

export type PipelineStage = "extracting" | "chunking" | "embedding" | "writing" | "transitioning";

export type DocumentStatus = "completed" | "failed" | "skipped";

export type SkipReason = "already-processed" | "cancelled";

export interface DocumentOutcome {
  key: string;
  status: DocumentStatus;
  state: DocumentState;
  attempts: number;
  chunkCount: number;
  vectorCount: number;
  processedKey?: string;
  errorClass?: string;
  errorMessage?: string;
  failedStage?: PipelineStage;
  skipReason?: SkipReason;
  startedAt: Date;
  finishedAt: Date;
}

export interface RunFailure {
  key: string;
  errorClass: string;
  stage?: PipelineStage;
  message: string;
}

export type RunStatus = "completed" | "cancelled";

export interface RunSummary {
  runId: string;
  status: RunStatus;
  startedAt: Date;
  finishedAt: Date;
  counts: Record<DocumentStatus, number> & { total: number };
  failures: RunFailure[];
  outcomes: DocumentOutcome[];
  totals: {
    chunks: number;
    vectors: number;
  };
}

export type FailureScope = "document" | "run";

export interface FailureEvent {
  scope: FailureScope;
  runId: string;
  key?: string;
  stage?: PipelineStage;
  errorClass: string;
  message: string;
  occurredAt: Date;
}

/** Per-document context handed to stage collaborators. */
export interface CallContext {
  /** Report how many attempts a retried call needed. */
  noteAttempts?: (attempts: number) => void;
}
