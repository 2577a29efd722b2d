import type { DocumentDescriptor, SourceListing } from "@docindex/types";
import { PROCESSED_METADATA_KEYS } from "@docindex/types";
import { AppError, ListingError, errorMessageOf } from "@docindex/errors";
import { extensionOf, mediaTypeFor, type IObjectStore, type ObjectSummary } from "@docindex/storage";

export interface SourceListerOptions {
  sourcePrefix: string;
  processedPrefix: string;
  /** Lower-cased extensions with their leading dot. */
  extensions: string[];
  now?: () => Date;
}

/**
 * Works out which source documents still need indexing by comparing the
 * source prefix with the processed prefix.
 */
export class SourceLister {
  private readonly extensions: Set<string>;
  private readonly now: () => Date;

  constructor(
    private readonly store: IObjectStore,
    private readonly options: SourceListerOptions,
  ) {
    this.extensions = new Set(options.extensions);
    this.now = options.now ?? (() => new Date());
  }

  async list(): Promise<SourceListing> {
    try {
      return await this.compare();
    } catch (error: unknown) {
      if (error instanceof ListingError) {
        throw error;
      }
      throw new ListingError(`Failed to list documents: ${errorMessageOf(error)}`, {
        cause: error,
        details: AppError.isAppError(error) ? { code: error.code } : undefined,
      });
    }
  }

  private async compare(): Promise<SourceListing> {
    const { sourcePrefix, processedPrefix } = this.options;
    const [sources, processed] = await Promise.all([
      this.store.list(sourcePrefix),
      this.store.list(processedPrefix),
    ]);

    const eligibleSources = sources.filter((o) => this.isEligible(o, sourcePrefix));
    const processedByRelativeKey = new Map(
      processed
        .filter((o) => this.isEligible(o, processedPrefix))
        .map((o) => [o.key.slice(processedPrefix.length), o] as const),
    );

    const discoveredAt = this.now();
    const pending: DocumentDescriptor[] = [];
    const alreadyProcessed: DocumentDescriptor[] = [];

    for (const object of eligibleSources) {
      const doc = this.describe(object, discoveredAt);
      const copy = processedByRelativeKey.get(doc.relativeKey);
      if (copy && (await this.isSameVersion(doc, copy))) {
        alreadyProcessed.push(doc);
      } else {
        pending.push(doc);
      }
    }

    const byKey = (a: DocumentDescriptor, b: DocumentDescriptor): number => a.key.localeCompare(b.key);
    return {
      pending: pending.sort(byKey),
      alreadyProcessed: alreadyProcessed.sort(byKey),
      totalSource: eligibleSources.length,
      totalProcessed: processedByRelativeKey.size,
    };
  }

  private isEligible(object: ObjectSummary, prefix: string): boolean {
    return (
      object.key.startsWith(prefix) &&
      !object.key.endsWith("/") &&
      this.extensions.has(extensionOf(object.key))
    );
  }

  private describe(object: ObjectSummary, discoveredAt: Date): DocumentDescriptor {
    return {
      key: object.key,
      relativeKey: object.key.slice(this.options.sourcePrefix.length),
      size: object.size,
      fingerprint: object.fingerprint ?? `${String(object.size)}-${String(object.lastModified.getTime())}`,
      mediaType: mediaTypeFor(object.key),
      lastModified: object.lastModified,
      discoveredAt,
    };
  }

  /** The listed fingerprint decides when it matches; otherwise the recorded one does. */
  private async isSameVersion(doc: DocumentDescriptor, copy: ObjectSummary): Promise<boolean> {
    if (copy.fingerprint === doc.fingerprint) {
      return true;
    }
    const head = await this.store.head(copy.key);
    return head?.metadata[PROCESSED_METADATA_KEYS.FINGERPRINT] === doc.fingerprint;
  }
}
