import { createHash } from "node:crypto";
import { ObjectNotFoundError, SourceChangedError } from "@docindex/errors";
import type {
  CopyObjectOptions,
  IObjectStore,
  ObjectHead,
  ObjectSummary,
  StoredObject,
} from "./object-store.interface.js";

interface Entry {
  body: Uint8Array;
  lastModified: Date;
  fingerprint: string;
  contentType?: string;
  metadata: Record<string, string>;
}

export interface SeedOptions {
  contentType?: string;
  metadata?: Record<string, string>;
}

export interface MemoryObjectStoreOptions {
  now?: () => Date;
}

/**
 * In-process object store used by tests and local runs. Fingerprints are the
 * sha256 of the bytes, so a copy keeps its source's fingerprint.
 */
export class MemoryObjectStore implements IObjectStore {
  private readonly objects = new Map<string, Entry>();
  private readonly now: () => Date;

  constructor(options?: MemoryObjectStoreOptions) {
    this.now = options?.now ?? (() => new Date());
  }

  /** Store text or bytes under `key`. */
  seed(key: string, content: string | Uint8Array, options?: SeedOptions): void {
    const body = typeof content === "string" ? new TextEncoder().encode(content) : content;
    this.objects.set(key, {
      body: Uint8Array.from(body),
      lastModified: this.now(),
      fingerprint: createHash("sha256").update(body).digest("hex"),
      contentType: options?.contentType,
      metadata: { ...options?.metadata },
    });
  }

  keys(prefix = ""): string[] {
    return [...this.objects.keys()].filter((key) => key.startsWith(prefix)).sort();
  }

  list(prefix: string): Promise<ObjectSummary[]> {
    return Promise.resolve(
      this.keys(prefix).flatMap((key) => {
        const entry = this.objects.get(key);
        return entry ? [this.summarize(key, entry)] : [];
      }),
    );
  }

  head(key: string): Promise<ObjectHead | null> {
    const entry = this.objects.get(key);
    return Promise.resolve(entry ? this.describe(key, entry) : null);
  }

  get(key: string): Promise<StoredObject> {
    const entry = this.objects.get(key);
    if (!entry) {
      return Promise.reject(new ObjectNotFoundError(key));
    }
    return Promise.resolve({ ...this.describe(key, entry), body: Uint8Array.from(entry.body) });
  }

  copy(sourceKey: string, destinationKey: string, options: CopyObjectOptions): Promise<void> {
    const entry = this.objects.get(sourceKey);
    if (!entry) {
      return Promise.reject(new ObjectNotFoundError(sourceKey));
    }
    if (options.ifMatch !== undefined && options.ifMatch !== entry.fingerprint) {
      return Promise.reject(new SourceChangedError(sourceKey));
    }
    this.objects.set(destinationKey, {
      body: Uint8Array.from(entry.body),
      lastModified: this.now(),
      fingerprint: entry.fingerprint,
      contentType: options.contentType ?? entry.contentType,
      metadata: { ...options.metadata },
    });
    return Promise.resolve();
  }

  delete(key: string): Promise<void> {
    this.objects.delete(key);
    return Promise.resolve();
  }

  private summarize(key: string, entry: Entry): ObjectSummary {
    return {
      key,
      size: entry.body.byteLength,
      lastModified: entry.lastModified,
      fingerprint: entry.fingerprint,
    };
  }

  private describe(key: string, entry: Entry): ObjectHead {
    return {
      ...this.summarize(key, entry),
      contentType: entry.contentType,
      metadata: { ...entry.metadata },
    };
  }
}
