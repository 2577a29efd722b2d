import { describe, it, expect, vi, beforeEach } from "vitest";
import type { UpsertResult, VectorRecord } from "@docindex/types";
import { PermanentError, RecordRejectedError, VectorStoreUnavailableError } from "@docindex/errors";
import { MemoryVectorStore } from "./memory-vector-store.js";
import { QdrantVectorStore } from "./qdrant-adapter.js";
import { VectorWriter } from "./vector-writer.js";
import type { IVectorStore } from "./vector-store.interface.js";

const qdrant = vi.hoisted(() => ({
  upsert: vi.fn(),
  retrieve: vi.fn(),
  scroll: vi.fn(),
  setPayload: vi.fn(),
  delete: vi.fn(),
  getCollections: vi.fn(),
  getCollection: vi.fn(),
  createCollection: vi.fn(),
  createPayloadIndex: vi.fn(),
}));

vi.mock("@qdrant/js-client-rest", () => ({
  QdrantClient: class {
    upsert = qdrant.upsert;
    retrieve = qdrant.retrieve;
    scroll = qdrant.scroll;
    setPayload = qdrant.setPayload;
    delete = qdrant.delete;
    getCollections = qdrant.getCollections;
    getCollection = qdrant.getCollection;
    createCollection = qdrant.createCollection;
    createPayloadIndex = qdrant.createPayloadIndex;
  },
}));

function record(
  id: string,
  vector: number[] = [0.1, 0.2, 0.3],
  fingerprint = "fp-new",
  documentKey = "incoming/a.txt",
): VectorRecord {
  return {
    id,
    vector,
    payload: {
      documentKey,
      fingerprint,
      text: `text of ${id}`,
      chunkIndex: 0,
      startChar: 0,
      endChar: 10,
      totalChunks: 1,
      embeddingModel: "test-model",
      mediaType: "text/plain",
      pageCount: 1,
    },
  };
}

const source = { documentKey: "incoming/a.txt", fingerprint: "fp-new" };
const retry = { maxAttempts: 3, baseDelayMs: 1, maxDelayMs: 5, jitter: false };

describe("MemoryVectorStore", () => {
  it("replaces a record upserted twice under the same id", async () => {
    const store = new MemoryVectorStore();
    await store.ensureCollection("docs", 3);

    await store.upsert("docs", [record("r1")]);
    await store.upsert("docs", [record("r1", [0.4, 0.5, 0.6])]);

    expect(store.count("docs")).toBe(1);
    expect(store.records("docs")[0]?.vector).toEqual([0.4, 0.5, 0.6]);
  });

  it("rejects records with the wrong dimension as not retryable", async () => {
    const store = new MemoryVectorStore();
    await store.ensureCollection("docs", 3);

    const results = await store.upsert("docs", [record("r1"), record("r2", [1, 2])]);

    expect(results).toEqual([
      { id: "r1", status: "ok" },
      {
        id: "r2",
        status: "rejected",
        retryable: false,
        reason: "vector has 2 dimensions, collection expects 3",
      },
    ]);
  });

  it("deleteStale removes only the document's records with another fingerprint", async () => {
    const store = new MemoryVectorStore();
    await store.ensureCollection("docs", 3);
    await store.upsert("docs", [
      record("old", [1, 1, 1], "fp-old"),
      record("new", [1, 1, 1], "fp-new"),
      record("other", [1, 1, 1], "fp-old", "incoming/b.txt"),
    ]);

    await store.deleteStale("docs", "incoming/a.txt", "fp-new");

    expect(store.records("docs").map((r) => r.id).sort()).toEqual(["new", "other"]);
  });

  it("keeps shared records while another source key still holds the content", async () => {
    const store = new MemoryVectorStore();
    await store.ensureCollection("docs", 3);
    await store.upsert("docs", [record("shared", [1, 1, 1], "fp-same", "incoming/a.txt")]);
    await store.upsert("docs", [record("shared", [1, 1, 1], "fp-same", "incoming/b.txt")]);

    await store.deleteStale("docs", "incoming/b.txt", "fp-edited");

    const [shared] = store.records("docs");
    expect(shared?.payload.documentKey).toBe("incoming/a.txt");
    expect(shared?.payload.documentKeys).toEqual(["incoming/a.txt"]);

    await store.deleteStale("docs", "incoming/a.txt", "fp-edited");

    expect(store.count("docs")).toBe(0);
  });
});

describe("QdrantVectorStore", () => {
  beforeEach(() => {
    for (const fn of Object.values(qdrant)) {
      fn.mockReset();
    }
    qdrant.upsert.mockResolvedValue({});
    qdrant.retrieve.mockResolvedValue([]);
    qdrant.scroll.mockResolvedValue({ points: [], next_page_offset: null });
    qdrant.setPayload.mockResolvedValue({});
    qdrant.delete.mockResolvedValue({});
    qdrant.createCollection.mockResolvedValue(true);
    qdrant.createPayloadIndex.mockResolvedValue({});
  });

  it("creates a missing collection with keyword indexes", async () => {
    qdrant.getCollections.mockResolvedValue({ collections: [] });
    const store = new QdrantVectorStore({ url: "http://qdrant.test" });

    await store.ensureCollection("docs", 4);

    expect(qdrant.createCollection).toHaveBeenCalledWith("docs", {
      vectors: { size: 4, distance: "Cosine" },
    });
    expect(qdrant.createPayloadIndex).toHaveBeenCalledWith("docs", {
      field_name: "documentKey",
      field_schema: "keyword",
    });
    expect(qdrant.createPayloadIndex).toHaveBeenCalledWith("docs", {
      field_name: "documentKeys",
      field_schema: "keyword",
    });
    expect(qdrant.createPayloadIndex).toHaveBeenCalledWith("docs", {
      field_name: "fingerprint",
      field_schema: "keyword",
    });
  });

  it("maps a refused collection request onto the error taxonomy", async () => {
    qdrant.getCollections.mockRejectedValue(Object.assign(new Error("Forbidden"), { status: 403 }));
    const store = new QdrantVectorStore({ url: "http://qdrant.test" });

    const error = await store.ensureCollection("docs", 4).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PermanentError);
    expect(error instanceof PermanentError && error.message).toBe("Qdrant request failed: Forbidden");
  });

  it("validates against an existing collection's vector size", async () => {
    qdrant.getCollections.mockResolvedValue({ collections: [{ name: "docs" }] });
    qdrant.getCollection.mockResolvedValue({
      config: { params: { vectors: { size: 3, distance: "Cosine" } } },
    });
    const store = new QdrantVectorStore({ url: "http://qdrant.test" });
    await store.ensureCollection("docs", 4);

    const results = await store.upsert("docs", [record("r1", [1, 2, 3, 4])]);

    expect(qdrant.createCollection).not.toHaveBeenCalled();
    expect(qdrant.upsert).not.toHaveBeenCalled();
    expect(results).toEqual([
      {
        id: "r1",
        status: "rejected",
        retryable: false,
        reason: "vector has 4 dimensions, collection expects 3",
      },
    ]);
  });

  it("upserts points and waits for the write", async () => {
    const store = new QdrantVectorStore({ url: "http://qdrant.test" });
    const r1 = record("r1");

    const results = await store.upsert("docs", [r1]);

    expect(results).toEqual([{ id: "r1", status: "ok" }]);
    expect(qdrant.upsert).toHaveBeenCalledWith("docs", {
      wait: true,
      points: [
        {
          id: "r1",
          vector: [0.1, 0.2, 0.3],
          payload: { ...r1.payload, documentKeys: ["incoming/a.txt"] },
        },
      ],
    });
  });

  it("adds the writer to the owners already stored under an id", async () => {
    qdrant.retrieve.mockResolvedValue([
      { id: "r1", payload: { documentKey: "incoming/b.txt", documentKeys: ["incoming/b.txt"] } },
    ]);
    const store = new QdrantVectorStore({ url: "http://qdrant.test" });

    await store.upsert("docs", [record("r1")]);

    expect(qdrant.retrieve).toHaveBeenCalledWith("docs", {
      ids: ["r1"],
      with_payload: ["documentKey", "documentKeys"],
      with_vector: false,
    });
    const body: { points: Array<{ payload: Record<string, unknown> }> } = qdrant.upsert.mock.calls[0]?.[1];
    expect(body.points[0]?.payload["documentKeys"]).toEqual(["incoming/b.txt", "incoming/a.txt"]);
  });

  it("isolates the record a rejected batch was refused for", async () => {
    qdrant.upsert.mockImplementation((_name: string, body: { points: { id: string }[] }) =>
      body.points.some((p) => p.id === "bad")
        ? Promise.reject(Object.assign(new Error("Bad Request"), { status: 400 }))
        : Promise.resolve({}),
    );
    const store = new QdrantVectorStore({ url: "http://qdrant.test" });

    const results = await store.upsert("docs", [record("good-1"), record("bad"), record("good-2")]);

    expect(results).toEqual([
      { id: "good-1", status: "ok" },
      {
        id: "bad",
        status: "rejected",
        retryable: false,
        reason: "Qdrant request failed: Bad Request",
      },
      { id: "good-2", status: "ok" },
    ]);
    expect(qdrant.upsert).toHaveBeenCalledTimes(4);
  });

  it("marks every record retryable when the store is unavailable", async () => {
    qdrant.upsert.mockRejectedValue(Object.assign(new Error("unavailable"), { status: 503 }));
    const store = new QdrantVectorStore({ url: "http://qdrant.test" });

    const results = await store.upsert("docs", [record("r1"), record("r2")]);

    expect(results.map((r) => r.status === "rejected" && r.retryable)).toEqual([true, true]);
    expect(qdrant.upsert).toHaveBeenCalledTimes(1);
  });

  it("deletes stale records only the document holds and releases shared ones", async () => {
    qdrant.scroll.mockResolvedValue({
      points: [
        { id: "p1", payload: { documentKey: "incoming/a.txt", documentKeys: ["incoming/a.txt"] } },
        {
          id: "p2",
          payload: { documentKey: "incoming/a.txt", documentKeys: ["incoming/b.txt", "incoming/a.txt"] },
        },
      ],
      next_page_offset: null,
    });
    const store = new QdrantVectorStore({ url: "http://qdrant.test" });

    await store.deleteStale("docs", "incoming/a.txt", "fp-new");

    expect(qdrant.scroll).toHaveBeenCalledWith("docs", {
      filter: {
        must: [{ key: "documentKeys", match: { value: "incoming/a.txt" } }],
        must_not: [{ key: "fingerprint", match: { value: "fp-new" } }],
      },
      limit: 256,
      with_payload: ["documentKey", "documentKeys"],
      with_vector: false,
    });
    expect(qdrant.setPayload).toHaveBeenCalledWith("docs", {
      wait: true,
      points: ["p2"],
      payload: { documentKey: "incoming/b.txt", documentKeys: ["incoming/b.txt"] },
    });
    expect(qdrant.delete).toHaveBeenCalledWith("docs", { wait: true, points: ["p1"] });
  });

  it("follows scroll pages to the end", async () => {
    qdrant.scroll
      .mockResolvedValueOnce({
        points: [{ id: "p1", payload: { documentKeys: ["incoming/a.txt"] } }],
        next_page_offset: "p2",
      })
      .mockResolvedValueOnce({
        points: [{ id: "p2", payload: { documentKeys: ["incoming/a.txt"] } }],
        next_page_offset: null,
      });
    const store = new QdrantVectorStore({ url: "http://qdrant.test" });

    await store.deleteStale("docs", "incoming/a.txt", "fp-new");

    expect(qdrant.scroll).toHaveBeenCalledTimes(2);
    expect(qdrant.scroll.mock.calls[1]?.[1]).toMatchObject({ offset: "p2" });
    expect(qdrant.delete).toHaveBeenCalledWith("docs", { wait: true, points: ["p1", "p2"] });
    expect(qdrant.setPayload).not.toHaveBeenCalled();
  });
});

/** Rejects the given ids as retryable on the first upsert only. */
class FlakyStore extends MemoryVectorStore {
  private calls = 0;

  constructor(private readonly flakyIds: string[]) {
    super();
  }

  override async upsert(collectionName: string, records: VectorRecord[]): Promise<UpsertResult[]> {
    this.calls++;
    if (this.calls > 1) {
      return super.upsert(collectionName, records);
    }
    const accepted = await super.upsert(
      collectionName,
      records.filter((r) => !this.flakyIds.includes(r.id)),
    );
    const flaky = records
      .filter((r) => this.flakyIds.includes(r.id))
      .map((r): UpsertResult => ({ id: r.id, status: "rejected", retryable: true, reason: "overloaded" }));
    return [...accepted, ...flaky];
  }
}

describe("VectorWriter", () => {
  it("writes in batches and removes records from earlier versions", async () => {
    const store = new MemoryVectorStore();
    await store.ensureCollection("docs", 3);
    await store.upsert("docs", [record("stale", [1, 1, 1], "fp-old")]);
    const upsert = vi.spyOn(store, "upsert");
    const writer = new VectorWriter(store, { collectionName: "docs", batchSize: 2, retry });

    const written = await writer.write([record("r1"), record("r2"), record("r3")], source);

    expect(written).toBe(3);
    expect(upsert).toHaveBeenCalledTimes(2);
    expect(store.records("docs").map((r) => r.id).sort()).toEqual(["r1", "r2", "r3"]);
  });

  it("re-sends only the records rejected as retryable", async () => {
    const store = new FlakyStore(["r2"]);
    await store.ensureCollection("docs", 3);
    const upsert = vi.spyOn(store, "upsert");
    const noteAttempts = vi.fn();
    const writer = new VectorWriter(store, { collectionName: "docs", batchSize: 10, retry });

    await writer.write([record("r1"), record("r2"), record("r3")], source, { noteAttempts });

    expect(upsert).toHaveBeenCalledTimes(2);
    expect(upsert.mock.calls[1]?.[1].map((r) => r.id)).toEqual(["r2"]);
    expect(noteAttempts).toHaveBeenCalledWith(2);
    expect(store.count("docs")).toBe(3);
  });

  it("fails with RecordRejectedError on a permanent rejection", async () => {
    const store = new MemoryVectorStore();
    await store.ensureCollection("docs", 3);
    const noteAttempts = vi.fn();
    const writer = new VectorWriter(store, { collectionName: "docs", batchSize: 10, retry });

    const error = await writer
      .write([record("r1"), record("r2", [1, 2])], source, { noteAttempts })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RecordRejectedError);
    expect(error instanceof RecordRejectedError && error.rejected).toEqual([
      { id: "r2", reason: "vector has 2 dimensions, collection expects 3" },
    ]);
    expect(noteAttempts).toHaveBeenCalledWith(1);
  });

  it("gives up with VectorStoreUnavailableError after the last attempt", async () => {
    const store: IVectorStore = {
      upsert: vi.fn().mockRejectedValue(new VectorStoreUnavailableError("down")),
      deleteStale: vi.fn().mockResolvedValue(undefined),
      ensureCollection: vi.fn().mockResolvedValue(undefined),
    };
    const writer = new VectorWriter(store, {
      collectionName: "docs",
      batchSize: 10,
      retry: { ...retry, maxAttempts: 2 },
    });

    await expect(writer.write([record("r1")], source)).rejects.toThrow(
      "1 record(s) not written after 2 attempts: down",
    );
    expect(store.upsert).toHaveBeenCalledTimes(2);
    expect(store.deleteStale).not.toHaveBeenCalled();
  });

  it("still removes stale records when the document has no chunks", async () => {
    const store = new MemoryVectorStore();
    await store.ensureCollection("docs", 3);
    await store.upsert("docs", [record("stale", [1, 1, 1], "fp-old")]);
    const writer = new VectorWriter(store, { collectionName: "docs", batchSize: 10, retry });

    await writer.write([], source);

    expect(store.count("docs")).toBe(0);
  });

  it("leaves an unchanged copy's records when an identical source is edited", async () => {
    const store = new MemoryVectorStore();
    await store.ensureCollection("docs", 3);
    const writer = new VectorWriter(store, { collectionName: "docs", batchSize: 10, retry });
    const a = { documentKey: "incoming/a.txt", fingerprint: "fp-same" };
    const b = { documentKey: "incoming/b.txt", fingerprint: "fp-same" };

    await Promise.all([
      writer.write([record("shared", [1, 1, 1], "fp-same", a.documentKey)], a),
      writer.write([record("shared", [1, 1, 1], "fp-same", b.documentKey)], b),
    ]);
    await writer.write([record("edited", [1, 1, 1], "fp-edited", b.documentKey)], {
      documentKey: b.documentKey,
      fingerprint: "fp-edited",
    });

    expect(store.records("docs").map((r) => [r.id, r.payload.documentKeys])).toEqual([
      ["shared", ["incoming/a.txt"]],
      ["edited", ["incoming/b.txt"]],
    ]);
  });

  it("retries the collection check and wraps a lasting failure", async () => {
    const ensureCollection = vi.fn().mockRejectedValue(new Error("ECONNRESET"));
    const store: IVectorStore = {
      upsert: vi.fn().mockResolvedValue([]),
      deleteStale: vi.fn().mockResolvedValue(undefined),
      ensureCollection,
    };
    const writer = new VectorWriter(store, { collectionName: "docs", batchSize: 10, retry });

    const error = await writer.ensureCollection(3).catch((e: unknown) => e);

    expect(ensureCollection).toHaveBeenCalledTimes(3);
    expect(error).toBeInstanceOf(VectorStoreUnavailableError);
    expect(error instanceof VectorStoreUnavailableError && error.message).toBe(
      "Collection docs unavailable: ECONNRESET",
    );
  });

  it("creates the collection after a transient failure", async () => {
    const ensureCollection = vi
      .fn()
      .mockRejectedValueOnce(new Error("ECONNRESET"))
      .mockResolvedValueOnce(undefined);
    const store: IVectorStore = {
      upsert: vi.fn().mockResolvedValue([]),
      deleteStale: vi.fn().mockResolvedValue(undefined),
      ensureCollection,
    };
    const writer = new VectorWriter(store, { collectionName: "docs", batchSize: 10, retry });

    await writer.ensureCollection(3);

    expect(ensureCollection).toHaveBeenCalledTimes(2);
    expect(ensureCollection).toHaveBeenLastCalledWith("docs", 3);
  });

  it("rejects a batch size below one", () => {
    expect(
      () => new VectorWriter(new MemoryVectorStore(), { collectionName: "docs", batchSize: 0, retry }),
    ).toThrow("batchSize must be at least 1");
  });
});
