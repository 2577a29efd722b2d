import type { Chunk, ChunkSource, ChunkStrategy, ChunkingConfig } from "@docindex/types";

export type ChunkWindow = Pick<ChunkingConfig, "chunkSize" | "chunkOverlap">;

export interface IChunker {
  readonly strategy: ChunkStrategy;
  chunk(text: string, window: ChunkWindow, source: ChunkSource): Chunk[];
}
