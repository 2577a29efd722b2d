export { AppError } from "./app-error.js";
export type { AppErrorOptions } from "./app-error.js";

export {
  ListingError,
  PermanentError,
  ExtractionError,
  UnsupportedMediaTypeError,
  ObjectNotFoundError,
  ContentRejectedError,
  ProviderRejectedError,
  EmbeddingShapeError,
  RecordRejectedError,
  InvalidTransitionError,
  TransientError,
  RateLimitedError,
  TimeoutError,
  CircuitOpenError,
  ExternalServiceError,
  StorageError,
  SourceChangedError,
  VectorStoreUnavailableError,
  NotificationError,
  CancelledError,
} from "./errors.js";
export type { ErrorExtras, RejectedRecord } from "./errors.js";

export { errorCodeOf, httpStatusOf, errorClassOf, errorMessageOf } from "./inspect.js";

export { createCircuitBreaker, createGuardedCall, normalizeBreakerError } from "./circuit-breaker.js";
export type { CircuitBreakerOptions } from "./circuit-breaker.js";

export { withRetry, isRetryable, computeBackoffDelay, sleep } from "./retry.js";
export type { RetryOptions, RetryAttemptInfo, BackoffOptions } from "./retry.js";

export { TokenBucketRateLimiter, unlimited } from "./rate-limiter.js";
export type { IRateLimiter, TokenBucketOptions } from "./rate-limiter.js";
