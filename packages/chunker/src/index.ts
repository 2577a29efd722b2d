export type { IChunker, ChunkWindow } from "./chunker.interface.js";
export { BoundaryChunker } from "./boundary-chunker.js";
export { FixedChunker } from "./fixed-chunker.js";
export { createChunker } from "./factory.js";
export { chunkId } from "./chunk-id.js";
