import { v5 as uuidv5 } from "uuid";

const CHUNK_NAMESPACE = "3f9c2a4e-8d1b-4c7a-9e5f-1b2d3c4e5f60";

/**
 * Deterministic chunk id: a UUIDv5 of the content fingerprint and the chunk's
 * position. The same bytes always produce the same ids, whatever their key.
 */
export function chunkId(fingerprint: string, index: number): string {
  return uuidv5(`${fingerprint}:${String(index)}`, CHUNK_NAMESPACE);
}
