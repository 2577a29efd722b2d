export type { IVectorStore } from "./vector-store.interface.js";
export { QdrantVectorStore } from "./qdrant-adapter.js";
export type { QdrantVectorStoreOptions } from "./qdrant-adapter.js";
export { MemoryVectorStore } from "./memory-vector-store.js";
export { VectorWriter } from "./vector-writer.js";
export type { VectorWriterOptions } from "./vector-writer.js";
