import { describe, it, expect, vi } from "vitest";
import { ListingError, StorageError } from "@docindex/errors";
import { MemoryObjectStore } from "@docindex/storage";
import { SourceLister } from "./source-lister.js";

const discoveredAt = new Date("2026-02-01T12:00:00.000Z");

function lister(store: MemoryObjectStore) {
  return new SourceLister(store, {
    sourcePrefix: "incoming/",
    processedPrefix: "done/",
    extensions: [".pdf", ".txt", ".md"],
    now: () => discoveredAt,
  });
}

describe("SourceLister", () => {
  it("lists eligible source documents as pending", async () => {
    const store = new MemoryObjectStore();
    store.seed("incoming/reports/q1.txt", "quarter one");
    store.seed("incoming/notes.md", "# notes");
    store.seed("incoming/image.png", "not text");
    store.seed("incoming/folder/", "");

    const listing = await lister(store).list();

    expect(listing.pending.map((d) => [d.key, d.relativeKey, d.mediaType])).toEqual([
      ["incoming/notes.md", "notes.md", "text/markdown"],
      ["incoming/reports/q1.txt", "reports/q1.txt", "text/plain"],
    ]);
    expect(listing.pending[1]).toMatchObject({ size: 11, discoveredAt });
    expect(listing.totalSource).toBe(2);
    expect(listing.alreadyProcessed).toEqual([]);
  });

  it("reports a source whose processed copy has the same content as already processed", async () => {
    const store = new MemoryObjectStore();
    store.seed("incoming/a.txt", "same bytes");
    store.seed("done/a.txt", "same bytes");

    const listing = await lister(store).list();

    expect(listing.pending).toEqual([]);
    expect(listing.alreadyProcessed.map((d) => d.key)).toEqual(["incoming/a.txt"]);
    expect(listing.totalProcessed).toBe(1);
  });

  it("matches on the recorded fingerprint when the listed one differs", async () => {
    const store = new MemoryObjectStore();
    store.seed("incoming/a.txt", "source bytes");
    const fingerprint = (await store.head("incoming/a.txt"))?.fingerprint ?? "";
    store.seed("done/a.txt", "rewritten bytes", { metadata: { fingerprint } });

    const listing = await lister(store).list();

    expect(listing.alreadyProcessed.map((d) => d.key)).toEqual(["incoming/a.txt"]);
  });

  it("treats a changed re-upload as pending", async () => {
    const store = new MemoryObjectStore();
    store.seed("done/a.txt", "old bytes", { metadata: { fingerprint: "old-fingerprint" } });
    store.seed("incoming/a.txt", "new bytes");

    const listing = await lister(store).list();

    expect(listing.pending.map((d) => d.key)).toEqual(["incoming/a.txt"]);
  });

  it("raises ListingError when the store cannot be listed", async () => {
    const store = new MemoryObjectStore();
    vi.spyOn(store, "list").mockRejectedValue(new StorageError("access denied"));

    const error = await lister(store)
      .list()
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ListingError);
    expect(error instanceof ListingError && error.message).toBe("Failed to list documents: access denied");
  });
});
