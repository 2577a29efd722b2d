import type { VectorRecord } from "@docindex/types";

/**
 * Records are keyed by content, so byte-identical sources share them. The
 * `documentKeys` payload lists every source key that still holds the content.
 */
export function ownersOf(payload: Record<string, unknown> | null | undefined): string[] {
  const keys = payload?.["documentKeys"];
  if (Array.isArray(keys)) {
    return keys.filter((key): key is string => typeof key === "string");
  }
  const key = payload?.["documentKey"];
  return typeof key === "string" ? [key] : [];
}

/** `record` with its own key added to the owners already stored under its id. */
export function withOwners(record: VectorRecord, existing: string[]): VectorRecord {
  const key = record.payload.documentKey;
  const documentKeys = existing.includes(key) ? existing : [...existing, key];
  return { ...record, payload: { ...record.payload, documentKeys } };
}

export interface Release {
  /** Owners left after `documentKey` lets go; empty means delete the record. */
  documentKeys: string[];
  /** `documentKey` field to keep on the record; undefined exactly when no owner is left. */
  documentKey: string | undefined;
}

export function release(
  payload: Record<string, unknown> | null | undefined,
  documentKey: string,
): Release {
  const documentKeys = ownersOf(payload).filter((key) => key !== documentKey);
  const current = payload?.["documentKey"];
  return {
    documentKeys,
    documentKey:
      typeof current === "string" && documentKeys.includes(current)
        ? current
        : documentKeys[documentKeys.length - 1],
  };
}
