import type { Chunk, ChunkSource } from "@docindex/types";
import type { ChunkWindow, IChunker } from "./chunker.interface.js";
import { strideRanges, toChunks, validateWindow } from "./window.js";

/**
 * Fixed character windows.
 * Every window is cut hard at `chunkSize`; the next one starts `chunkOverlap` earlier.
 */
export class FixedChunker implements IChunker {
  readonly strategy = "fixed";

  chunk(text: string, window: ChunkWindow, source: ChunkSource): Chunk[] {
    validateWindow(window);
    if (text.trim().length === 0) {
      return [];
    }
    if (text.length <= window.chunkSize) {
      return toChunks(text, [{ start: 0, end: text.length }], source);
    }
    return toChunks(text, strideRanges(text, 0, window), source);
  }
}
