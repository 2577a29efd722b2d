import type { ChunkingConfig } from "@docindex/types";
import type { IChunker } from "./chunker.interface.js";
import { BoundaryChunker } from "./boundary-chunker.js";
import { FixedChunker } from "./fixed-chunker.js";

export function createChunker(config: Pick<ChunkingConfig, "strategy" | "boundaries">): IChunker {
  switch (config.strategy) {
    case "boundary":
      return new BoundaryChunker(config.boundaries);
    case "fixed":
      return new FixedChunker();
    default:
      throw new Error(`Unknown chunking strategy: ${String(config.strategy)}`);
  }
}
