import type { UpsertResult, VectorRecord } from "@docindex/types";

/** Reason a record cannot be stored, or undefined when it is acceptable. */
export function invalidReason(record: VectorRecord, dimensions: number | undefined): string | undefined {
  if (dimensions !== undefined && record.vector.length !== dimensions) {
    return `vector has ${String(record.vector.length)} dimensions, collection expects ${String(dimensions)}`;
  }
  if (!record.vector.every(Number.isFinite)) {
    return "vector contains non-finite values";
  }
  return undefined;
}

export function rejected(id: string, reason: string, retryable: boolean): UpsertResult {
  return { id, status: "rejected", retryable, reason };
}
