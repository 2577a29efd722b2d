import type { PipelineStage } from "@docindex/types";
import {
  CancelledError,
  PermanentError,
  TransientError,
  errorClassOf,
  errorMessageOf,
} from "@docindex/errors";

export type StageErrorKind = "cancelled" | "permanent" | "transient" | "unexpected";

export interface StageFailure {
  stage: PipelineStage;
  kind: StageErrorKind;
  errorClass: string;
  message: string;
  error: unknown;
}

/**
 * Classifies an error raised inside a stage. Transient errors reaching this
 * point have exhausted their retries; all kinds but `cancelled` fail the document.
 */
export function classifyStageError(error: unknown, stage: PipelineStage): StageFailure {
  let kind: StageErrorKind;
  if (error instanceof CancelledError) {
    kind = "cancelled";
  } else if (error instanceof PermanentError) {
    kind = "permanent";
  } else if (error instanceof TransientError) {
    kind = "transient";
  } else {
    kind = "unexpected";
  }
  return { stage, kind, errorClass: errorClassOf(error), message: errorMessageOf(error), error };
}
