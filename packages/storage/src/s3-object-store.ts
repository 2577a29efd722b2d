import {
  CopyObjectCommand,
  DeleteObjectCommand,
  GetObjectCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  S3Client,
  type ListObjectsV2CommandOutput,
} from "@aws-sdk/client-s3";
import {
  AppError,
  ObjectNotFoundError,
  SourceChangedError,
  StorageError,
  httpStatusOf,
} from "@docindex/errors";
import type {
  CopyObjectOptions,
  IObjectStore,
  ObjectHead,
  ObjectSummary,
  StoredObject,
} from "./object-store.interface.js";

export interface S3ObjectStoreOptions {
  bucket: string;
  region: string;
  /** Endpoint URL (for S3-compatible services like MinIO) */
  endpoint?: string;
  /** Force path-style addressing (set true for MinIO) */
  forcePathStyle?: boolean;
  accessKeyId?: string;
  secretAccessKey?: string;
  /** Pre-built client, mainly for tests. */
  client?: S3Client;
}

function stripQuotes(etag: string | undefined): string | undefined {
  return etag?.replace(/^"+|"+$/g, "");
}

function isNotFound(error: unknown): boolean {
  if (error instanceof Error && (error.name === "NoSuchKey" || error.name === "NotFound")) {
    return true;
  }
  return httpStatusOf(error) === 404;
}

/** CopySource is `bucket/key` with the key URL-encoded, slashes kept. */
function copySource(bucket: string, key: string): string {
  return `${bucket}/${encodeURIComponent(key).replace(/%2F/g, "/")}`;
}

export class S3ObjectStore implements IObjectStore {
  private readonly client: S3Client;
  private readonly bucket: string;

  constructor(options: S3ObjectStoreOptions) {
    this.bucket = options.bucket;
    this.client =
      options.client ??
      new S3Client({
        region: options.region,
        ...(options.endpoint ? { endpoint: options.endpoint } : {}),
        ...(options.forcePathStyle ? { forcePathStyle: true } : {}),
        ...(options.accessKeyId && options.secretAccessKey
          ? {
              credentials: {
                accessKeyId: options.accessKeyId,
                secretAccessKey: options.secretAccessKey,
              },
            }
          : {}),
      });
  }

  async list(prefix: string): Promise<ObjectSummary[]> {
    const objects: ObjectSummary[] = [];
    let continuationToken: string | undefined;

    do {
      const response: ListObjectsV2CommandOutput = await this.send("list", prefix, () =>
        this.client.send(
          new ListObjectsV2Command({
            Bucket: this.bucket,
            Prefix: prefix,
            ContinuationToken: continuationToken,
          }),
        ),
      );

      for (const obj of response.Contents ?? []) {
        if (!obj.Key) continue;
        objects.push({
          key: obj.Key,
          size: obj.Size ?? 0,
          lastModified: obj.LastModified ?? new Date(0),
          fingerprint: stripQuotes(obj.ETag),
        });
      }

      continuationToken = response.IsTruncated ? response.NextContinuationToken : undefined;
    } while (continuationToken);

    return objects;
  }

  async head(key: string): Promise<ObjectHead | null> {
    try {
      const response = await this.client.send(
        new HeadObjectCommand({ Bucket: this.bucket, Key: key }),
      );
      return {
        key,
        size: response.ContentLength ?? 0,
        lastModified: response.LastModified ?? new Date(0),
        fingerprint: stripQuotes(response.ETag),
        contentType: response.ContentType,
        metadata: response.Metadata ?? {},
      };
    } catch (error: unknown) {
      if (isNotFound(error)) {
        return null;
      }
      throw new StorageError(`Failed to head ${key}`, { cause: error });
    }
  }

  async get(key: string): Promise<StoredObject> {
    const response = await this.send("get", key, () =>
      this.client.send(new GetObjectCommand({ Bucket: this.bucket, Key: key })),
    );
    const body = response.Body ? await response.Body.transformToByteArray() : new Uint8Array(0);

    return {
      key,
      body,
      size: response.ContentLength ?? body.byteLength,
      lastModified: response.LastModified ?? new Date(0),
      fingerprint: stripQuotes(response.ETag),
      contentType: response.ContentType,
      metadata: response.Metadata ?? {},
    };
  }

  async copy(sourceKey: string, destinationKey: string, options: CopyObjectOptions): Promise<void> {
    await this.send("copy", sourceKey, () =>
      this.client.send(
        new CopyObjectCommand({
          Bucket: this.bucket,
          Key: destinationKey,
          CopySource: copySource(this.bucket, sourceKey),
          MetadataDirective: "REPLACE",
          Metadata: options.metadata,
          ContentType: options.contentType,
          ...(options.ifMatch !== undefined ? { CopySourceIfMatch: `"${options.ifMatch}"` } : {}),
        }),
      ),
    );
  }

  async delete(key: string): Promise<void> {
    try {
      await this.client.send(new DeleteObjectCommand({ Bucket: this.bucket, Key: key }));
    } catch (error: unknown) {
      if (isNotFound(error)) {
        return;
      }
      throw new StorageError(`Failed to delete ${key}`, { cause: error });
    }
  }

  private async send<T>(operation: string, key: string, call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (error: unknown) {
      if (AppError.isAppError(error)) {
        throw error;
      }
      if (isNotFound(error)) {
        throw new ObjectNotFoundError(key, { cause: error });
      }
      if (httpStatusOf(error) === 412) {
        throw new SourceChangedError(key, { cause: error });
      }
      throw new StorageError(`S3 ${operation} failed for ${key}`, { cause: error });
    }
  }
}
