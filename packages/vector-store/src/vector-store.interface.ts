import type { UpsertResult, VectorRecord } from "@docindex/types";

export interface IVectorStore {
  /**
   * Insert or replace records by id. Resolves with one result per record; a
   * rejected record carries whether retrying it could succeed.
   */
  upsert(collectionName: string, records: VectorRecord[]): Promise<UpsertResult[]>;
  /**
   * Drop `documentKey`'s claim on records whose fingerprint differs from
   * `fingerprint`. A record no other source key holds is deleted.
   */
  deleteStale(collectionName: string, documentKey: string, fingerprint: string): Promise<void>;
  ensureCollection(collectionName: string, dimensions: number): Promise<void>;
}
