import type { UpsertResult, VectorRecord } from "@docindex/types";
import type { IVectorStore } from "./vector-store.interface.js";
import { ownersOf, release, withOwners } from "./owners.js";
import { invalidReason, rejected } from "./validation.js";

interface Collection {
  dimensions: number;
  points: Map<string, VectorRecord>;
}

/** In-process vector store for tests and local runs. */
export class MemoryVectorStore implements IVectorStore {
  private readonly collections = new Map<string, Collection>();

  upsert(collectionName: string, records: VectorRecord[]): Promise<UpsertResult[]> {
    const collection = this.collections.get(collectionName);
    return Promise.resolve(
      records.map((record): UpsertResult => {
        if (!collection) {
          return rejected(record.id, `collection ${collectionName} does not exist`, false);
        }
        const reason = invalidReason(record, collection.dimensions);
        if (reason) {
          return rejected(record.id, reason, false);
        }
        const existing = ownersOf(collection.points.get(record.id)?.payload);
        collection.points.set(record.id, { ...withOwners(record, existing), vector: [...record.vector] });
        return { id: record.id, status: "ok" };
      }),
    );
  }

  deleteStale(collectionName: string, documentKey: string, fingerprint: string): Promise<void> {
    const points = this.collections.get(collectionName)?.points;
    for (const [id, record] of points ?? []) {
      if (record.payload.fingerprint === fingerprint || !ownersOf(record.payload).includes(documentKey)) {
        continue;
      }
      const left = release(record.payload, documentKey);
      if (left.documentKey === undefined) {
        points?.delete(id);
      } else {
        points?.set(id, {
          ...record,
          payload: { ...record.payload, documentKey: left.documentKey, documentKeys: left.documentKeys },
        });
      }
    }
    return Promise.resolve();
  }

  ensureCollection(collectionName: string, dimensions: number): Promise<void> {
    if (!this.collections.has(collectionName)) {
      this.collections.set(collectionName, { dimensions, points: new Map() });
    }
    return Promise.resolve();
  }

  records(collectionName: string): VectorRecord[] {
    return [...(this.collections.get(collectionName)?.points.values() ?? [])];
  }

  count(collectionName: string): number {
    return this.collections.get(collectionName)?.points.size ?? 0;
  }
}
