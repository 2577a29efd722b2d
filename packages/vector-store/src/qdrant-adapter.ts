import { QdrantClient } from "@qdrant/js-client-rest";
import type { UpsertResult, VectorRecord } from "@docindex/types";
import {
  AppError,
  PermanentError,
  RateLimitedError,
  VectorStoreUnavailableError,
  createGuardedCall,
  errorMessageOf,
  httpStatusOf,
} from "@docindex/errors";
import type { Logger } from "@docindex/logger";
import type { IVectorStore } from "./vector-store.interface.js";
import { ownersOf, release, withOwners } from "./owners.js";
import { invalidReason, rejected } from "./validation.js";

export interface QdrantVectorStoreOptions {
  url: string;
  apiKey?: string;
  /** Per-call timeout enforced by the circuit breaker. */
  timeoutMs?: number;
  logger?: Logger;
  client?: QdrantClient;
}

type QdrantPoint = { id: string; vector: number[]; payload: Record<string, unknown> };
type PointId = string | number;

const OWNER_FIELDS = ["documentKey", "documentKeys"];
const SCROLL_PAGE_SIZE = 256;

function toQdrantError(error: unknown): unknown {
  if (AppError.isAppError(error)) {
    return error;
  }
  const status = httpStatusOf(error);
  const message = `Qdrant request failed: ${errorMessageOf(error)}`;
  if (status === 429) {
    return new RateLimitedError(message, undefined, { cause: error });
  }
  if (status !== undefined && status >= 400 && status < 500) {
    return new PermanentError(message, { code: "VECTOR_WRITE_REJECTED", statusCode: status, cause: error });
  }
  return new VectorStoreUnavailableError(message, { cause: error });
}

function readVectorSize(vectors: unknown): number | undefined {
  if (typeof vectors !== "object" || vectors === null) return undefined;
  const size: unknown = Reflect.get(vectors, "size");
  return typeof size === "number" ? size : undefined;
}

export class QdrantVectorStore implements IVectorStore {
  private client: QdrantClient;
  private readonly dimensions = new Map<string, number>();
  private readonly guardedUpsert: (collectionName: string, records: VectorRecord[]) => Promise<void>;
  private readonly guardedDelete: (
    collectionName: string,
    documentKey: string,
    fingerprint: string,
  ) => Promise<void>;

  constructor(options: QdrantVectorStoreOptions) {
    this.client = options.client ?? new QdrantClient({ url: options.url, apiKey: options.apiKey });
    const breakerOptions = { timeout: options.timeoutMs, logger: options.logger };
    this.guardedUpsert = createGuardedCall(
      "qdrant-upsert",
      async (collectionName: string, records: VectorRecord[]) => {
        try {
          const owners = await this.ownersById(collectionName, records.map((r) => r.id));
          const points = records.map((record) => toPoint(withOwners(record, owners.get(record.id) ?? [])));
          await this.client.upsert(collectionName, { wait: true, points });
        } catch (error: unknown) {
          throw toQdrantError(error);
        }
      },
      breakerOptions,
    );
    this.guardedDelete = createGuardedCall(
      "qdrant-delete",
      async (collectionName: string, documentKey: string, fingerprint: string) => {
        try {
          await this.releaseStale(collectionName, documentKey, fingerprint);
        } catch (error: unknown) {
          throw toQdrantError(error);
        }
      },
      breakerOptions,
    );
  }

  async upsert(collectionName: string, records: VectorRecord[]): Promise<UpsertResult[]> {
    const dimensions = this.dimensions.get(collectionName);
    const results = new Map<string, UpsertResult>();
    const valid: VectorRecord[] = [];

    for (const record of records) {
      const reason = invalidReason(record, dimensions);
      if (reason) {
        results.set(record.id, rejected(record.id, reason, false));
      } else {
        valid.push(record);
      }
    }

    for (const result of await this.upsertValid(collectionName, valid)) {
      results.set(result.id, result);
    }

    return records.map(
      (record) => results.get(record.id) ?? rejected(record.id, "no result recorded", true),
    );
  }

  async deleteStale(collectionName: string, documentKey: string, fingerprint: string): Promise<void> {
    await this.guardedDelete(collectionName, documentKey, fingerprint);
  }

  async ensureCollection(collectionName: string, dimensions: number): Promise<void> {
    try {
      await this.createIfMissing(collectionName, dimensions);
    } catch (error: unknown) {
      throw toQdrantError(error);
    }
  }

  private async createIfMissing(collectionName: string, dimensions: number): Promise<void> {
    const collections = await this.client.getCollections();
    const exists = collections.collections.some((c) => c.name === collectionName);

    if (exists) {
      const info = await this.client.getCollection(collectionName);
      this.dimensions.set(collectionName, readVectorSize(info.config.params.vectors) ?? dimensions);
      return;
    }

    await this.client.createCollection(collectionName, {
      vectors: {
        size: dimensions,
        distance: "Cosine",
      },
    });

    // Create payload indexes for filtering
    await this.client.createPayloadIndex(collectionName, {
      field_name: "documentKey",
      field_schema: "keyword",
    });
    await this.client.createPayloadIndex(collectionName, {
      field_name: "documentKeys",
      field_schema: "keyword",
    });
    await this.client.createPayloadIndex(collectionName, {
      field_name: "fingerprint",
      field_schema: "keyword",
    });
    this.dimensions.set(collectionName, dimensions);
  }

  private async ownersById(collectionName: string, ids: string[]): Promise<Map<string, string[]>> {
    const points = await this.client.retrieve(collectionName, {
      ids,
      with_payload: OWNER_FIELDS,
      with_vector: false,
    });
    return new Map(points.map((point) => [String(point.id), ownersOf(point.payload)]));
  }

  /** Drop `documentKey` from stale records; delete those nobody else holds. */
  private async releaseStale(collectionName: string, documentKey: string, fingerprint: string): Promise<void> {
    const orphaned: PointId[] = [];
    const updates = new Map<string, { documentKey: string; documentKeys: string[]; ids: PointId[] }>();
    let offset: PointId | undefined;

    do {
      const page = await this.client.scroll(collectionName, {
        filter: {
          must: [{ key: "documentKeys", match: { value: documentKey } }],
          must_not: [{ key: "fingerprint", match: { value: fingerprint } }],
        },
        limit: SCROLL_PAGE_SIZE,
        with_payload: OWNER_FIELDS,
        with_vector: false,
        ...(offset !== undefined ? { offset } : {}),
      });
      for (const point of page.points) {
        const left = release(point.payload, documentKey);
        if (left.documentKey === undefined) {
          orphaned.push(point.id);
          continue;
        }
        const group = JSON.stringify([left.documentKey, left.documentKeys]);
        const update = updates.get(group) ?? {
          documentKey: left.documentKey,
          documentKeys: left.documentKeys,
          ids: [],
        };
        update.ids.push(point.id);
        updates.set(group, update);
      }
      const next = page.next_page_offset;
      offset = typeof next === "string" || typeof next === "number" ? next : undefined;
    } while (offset !== undefined);

    for (const update of updates.values()) {
      await this.client.setPayload(collectionName, {
        wait: true,
        points: update.ids,
        payload: { documentKey: update.documentKey, documentKeys: update.documentKeys },
      });
    }
    if (orphaned.length > 0) {
      await this.client.delete(collectionName, { wait: true, points: orphaned });
    }
  }

  /** A 4xx on a batch is narrowed down record by record. */
  private async upsertValid(collectionName: string, records: VectorRecord[]): Promise<UpsertResult[]> {
    if (records.length === 0) {
      return [];
    }
    try {
      await this.guardedUpsert(collectionName, records);
      return records.map((record): UpsertResult => ({ id: record.id, status: "ok" }));
    } catch (error: unknown) {
      if (!(error instanceof PermanentError)) {
        const reason = errorMessageOf(error);
        return records.map((record) => rejected(record.id, reason, true));
      }
      if (records.length === 1) {
        return records.map((record) => rejected(record.id, error.message, false));
      }
      const results: UpsertResult[] = [];
      for (const record of records) {
        results.push(...(await this.upsertValid(collectionName, [record])));
      }
      return results;
    }
  }
}

function toPoint(record: VectorRecord): QdrantPoint {
  return { id: record.id, vector: record.vector, payload: { ...record.payload } };
}
