import { AppError } from "./app-error.js";

export interface ErrorExtras {
  details?: Record<string, unknown>;
  cause?: unknown;
}

/** Source enumeration failed. Aborts the run before any document is touched. */
export class ListingError extends AppError {
  constructor(message = "Failed to list documents", options?: ErrorExtras) {
    super({
      message,
      statusCode: 503,
      code: "LISTING_ERROR",
      details: options?.details,
      cause: options?.cause,
    });
  }
}

// ---------- Permanent: the document fails, no retry ----------

export class PermanentError extends AppError {
  constructor(
    message: string,
    options?: ErrorExtras & { code?: string; statusCode?: number; isOperational?: boolean },
  ) {
    super({
      message,
      statusCode: options?.statusCode ?? 422,
      code: options?.code ?? "PERMANENT_ERROR",
      isOperational: options?.isOperational,
      details: options?.details,
      cause: options?.cause,
    });
  }
}

export class ExtractionError extends PermanentError {
  constructor(message = "Text extraction failed", options?: ErrorExtras & { code?: string }) {
    super(message, { ...options, code: options?.code ?? "EXTRACTION_ERROR" });
  }
}

export class UnsupportedMediaTypeError extends ExtractionError {
  public readonly mediaType: string;

  constructor(mediaType: string, options?: ErrorExtras) {
    super(`Unsupported media type: ${mediaType}`, {
      ...options,
      code: "UNSUPPORTED_MEDIA_TYPE",
    });
    this.mediaType = mediaType;
  }
}

export class ObjectNotFoundError extends PermanentError {
  public readonly key: string;

  constructor(key: string, options?: ErrorExtras) {
    super(`Object not found: ${key}`, { ...options, code: "OBJECT_NOT_FOUND", statusCode: 404 });
    this.key = key;
  }
}

/** The embedding provider refused the input itself (malformed or oversized text). */
export class ContentRejectedError extends PermanentError {
  public readonly service: string;

  constructor(message = "Content rejected", service: string, options?: ErrorExtras) {
    super(message, { ...options, code: "CONTENT_REJECTED", statusCode: 400 });
    this.service = service;
  }
}

/** Authentication or configuration rejection from a provider; retrying cannot help. */
export class ProviderRejectedError extends PermanentError {
  public readonly service: string;

  constructor(message: string, service: string, statusCode: number, options?: ErrorExtras) {
    super(message, { ...options, code: "PROVIDER_REJECTED", statusCode });
    this.service = service;
  }
}

export class EmbeddingShapeError extends PermanentError {
  constructor(message: string, options?: ErrorExtras) {
    super(message, { ...options, code: "EMBEDDING_SHAPE" });
  }
}

export interface RejectedRecord {
  id: string;
  reason: string;
}

export class RecordRejectedError extends PermanentError {
  public readonly rejected: RejectedRecord[];

  constructor(rejected: RejectedRecord[], options?: ErrorExtras) {
    super(`Vector store rejected ${String(rejected.length)} record(s)`, {
      ...options,
      code: "RECORD_REJECTED",
    });
    this.rejected = rejected;
  }
}

export class InvalidTransitionError extends PermanentError {
  constructor(from: string, to: string) {
    super(`Invalid document state transition: ${from} -> ${to}`, {
      code: "INVALID_TRANSITION",
      statusCode: 500,
      isOperational: false,
    });
  }
}

// ---------- Transient: retried with backoff ----------

export class TransientError extends AppError {
  constructor(
    message: string,
    options?: ErrorExtras & { code?: string; statusCode?: number },
  ) {
    super({
      message,
      statusCode: options?.statusCode ?? 503,
      code: options?.code ?? "TRANSIENT_ERROR",
      details: options?.details,
      cause: options?.cause,
    });
  }
}

export class RateLimitedError extends TransientError {
  /** Seconds the provider asked us to wait, when it said so. */
  public readonly retryAfter?: number;

  constructor(message = "Rate limited", retryAfter?: number, options?: ErrorExtras) {
    super(message, { ...options, code: "RATE_LIMITED", statusCode: 429 });
    this.retryAfter = retryAfter;
  }
}

export class TimeoutError extends TransientError {
  public readonly service: string;

  constructor(message = "Call timed out", service: string, options?: ErrorExtras) {
    super(message, { ...options, code: "TIMEOUT", statusCode: 504 });
    this.service = service;
  }
}

export class CircuitOpenError extends TransientError {
  public readonly service: string;

  constructor(service: string, options?: ErrorExtras) {
    super(`Circuit for ${service} is open`, { ...options, code: "CIRCUIT_OPEN" });
    this.service = service;
  }
}

export class ExternalServiceError extends TransientError {
  public readonly service: string;

  constructor(message = "External service error", service: string, options?: ErrorExtras) {
    super(message, { ...options, code: "EXTERNAL_SERVICE_ERROR", statusCode: 502 });
    this.service = service;
  }
}

export class StorageError extends TransientError {
  constructor(message = "Object storage error", options?: ErrorExtras) {
    super(message, { ...options, code: "STORAGE_ERROR" });
  }
}

/**
 * The source object no longer has the content it was listed with. Retrying
 * the call cannot help; the next run sees the new content.
 */
export class SourceChangedError extends TransientError {
  public readonly key: string;

  constructor(key: string, options?: ErrorExtras) {
    super(`${key} changed after it was listed`, { ...options, code: "SOURCE_CHANGED", statusCode: 409 });
    this.key = key;
  }
}

export class VectorStoreUnavailableError extends TransientError {
  constructor(message = "Vector store unavailable", options?: ErrorExtras) {
    super(message, { ...options, code: "VECTOR_STORE_UNAVAILABLE" });
  }
}

// ---------- Run-level ----------

export class NotificationError extends AppError {
  public readonly sink: string;

  constructor(message = "Notification failed", sink: string, options?: ErrorExtras) {
    super({
      message,
      statusCode: 502,
      code: "NOTIFICATION_ERROR",
      details: options?.details,
      cause: options?.cause,
    });
    this.sink = sink;
  }
}

export class CancelledError extends AppError {
  constructor(message = "Run cancelled", options?: ErrorExtras) {
    super({
      message,
      statusCode: 499,
      code: "CANCELLED",
      details: options?.details,
      cause: options?.cause,
    });
  }
}
