export type {
  IObjectStore,
  ObjectSummary,
  ObjectHead,
  StoredObject,
  CopyObjectOptions,
} from "./object-store.interface.js";
export { S3ObjectStore } from "./s3-object-store.js";
export type { S3ObjectStoreOptions } from "./s3-object-store.js";
export { MemoryObjectStore } from "./memory-object-store.js";
export type { MemoryObjectStoreOptions, SeedOptions } from "./memory-object-store.js";
export { DEFAULT_MEDIA_TYPE, extensionOf, mediaTypeFor } from "./media-types.js";
