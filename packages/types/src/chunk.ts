export type ChunkStrategy = "boundary" | "fixed";

export type BoundaryLevel = "section" | "paragraph" | "sentence" | "line" | "word";

export const DEFAULT_BOUNDARY_POLICY: readonly BoundaryLevel[] = ["section", "paragraph", "sentence"];

export interface ChunkingConfig {
  strategy: ChunkStrategy;
  chunkSize: number;
  chunkOverlap: number;
  boundaries: BoundaryLevel[];
}

export interface Chunk {
  id: string;
  documentKey: string;
  index: number;
  /** Inclusive start offset in the extracted text. */
  startChar: number;
  /** Exclusive end offset in the extracted text. */
  endChar: number;
  text: string;
}

export interface EmbeddedChunk extends Chunk {
  vector: number[];
}

export interface ChunkSource {
  documentKey: string;
  fingerprint: string;
}
