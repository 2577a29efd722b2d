export interface DocumentDescriptor {
  /** Full key of the object under the source prefix. */
  key: string;
  /** Key with the source prefix stripped; identical under the processed prefix. */
  relativeKey: string;
  size: number;
  fingerprint: string;
  mediaType: string;
  lastModified: Date;
  discoveredAt: Date;
}

export interface SourceListing {
  pending: DocumentDescriptor[];
  /** Source objects whose processed copy already carries the same fingerprint. */
  alreadyProcessed: DocumentDescriptor[];
  totalSource: number;
  totalProcessed: number;
}

export const PROCESSED_METADATA_KEYS = {
  RUN_ID: "run-id",
  PROCESSED_AT: "processed-at",
  FINGERPRINT: "fingerprint",
  SOURCE_KEY: "source-key",
  CHUNK_COUNT: "chunk-count",
  VECTOR_COUNT: "vector-count",
} as const;
