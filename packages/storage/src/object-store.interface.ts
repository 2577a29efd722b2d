export interface ObjectSummary {
  key: string;
  size: number;
  lastModified: Date;
  /** Content hash reported by the store (S3 ETag without quotes). */
  fingerprint?: string;
}

export interface ObjectHead extends ObjectSummary {
  contentType?: string;
  /** User metadata; S3 lower-cases the keys. */
  metadata: Record<string, string>;
}

export interface StoredObject extends ObjectHead {
  body: Uint8Array;
}

export interface CopyObjectOptions {
  /** Replaces the source's user metadata on the copy. */
  metadata: Record<string, string>;
  contentType?: string;
  /** Copy only while the source still has this fingerprint; SourceChangedError otherwise. */
  ifMatch?: string;
}

/**
 * Flat key/value object storage. Keys are `/`-separated paths; "directories"
 * are only key prefixes.
 */
export interface IObjectStore {
  /** Every object under `prefix`, following pagination to the end. */
  list(prefix: string): Promise<ObjectSummary[]>;
  /** Returns null when the key does not exist. */
  head(key: string): Promise<ObjectHead | null>;
  /** Throws ObjectNotFoundError when the key does not exist. */
  get(key: string): Promise<StoredObject>;
  copy(sourceKey: string, destinationKey: string, options: CopyObjectOptions): Promise<void>;
  /** Deleting a missing key is not an error. */
  delete(key: string): Promise<void>;
}
