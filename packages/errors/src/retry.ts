import { AppError } from "./app-error.js";
import {
  CancelledError,
  ListingError,
  PermanentError,
  RateLimitedError,
  SourceChangedError,
  TransientError,
} from "./errors.js";
import { errorCodeOf } from "./inspect.js";

export interface RetryOptions {
  /** Maximum number of attempts, the first call included. Default: 3 */
  maxAttempts?: number;
  /** Delay in milliseconds before the first retry; doubles per retry. Default: 1000 */
  baseDelayMs?: number;
  /** Maximum delay in milliseconds between retries. Default: 30000 */
  maxDelayMs?: number;
  /** Scale each delay by a random factor in [0.5, 1.0). Default: true */
  jitter?: boolean;
  /** Error codes that should be retried. If omitted, all retryable errors are retried. */
  retryableErrors?: string[];
  /** Called before sleeping ahead of a retry. */
  onRetry?: (info: RetryAttemptInfo) => void;
  /** Stops further attempts (and any pending backoff) with a CancelledError. */
  signal?: AbortSignal;
}

export interface RetryAttemptInfo {
  /** The attempt that just failed (1-based). */
  attempt: number;
  maxAttempts: number;
  delayMs: number;
  error: unknown;
}

export type BackoffOptions = Required<Pick<RetryOptions, "baseDelayMs" | "maxDelayMs" | "jitter">>;

const DEFAULT_RETRY_OPTIONS: Required<
  Pick<RetryOptions, "maxAttempts" | "baseDelayMs" | "maxDelayMs" | "jitter">
> = {
  maxAttempts: 3,
  baseDelayMs: 1_000,
  maxDelayMs: 30_000,
  jitter: true,
};

/**
 * Determines whether an error is retryable.
 * Transient errors, server errors (5xx) and unknown errors (network failures) are retried;
 * permanent errors, cancellations, changed sources and other client errors (4xx) are not.
 */
export function isRetryable(error: unknown, retryableErrors?: string[]): boolean {
  if (AppError.isAppError(error)) {
    if (
      error instanceof PermanentError ||
      error instanceof CancelledError ||
      error instanceof ListingError ||
      error instanceof SourceChangedError
    ) {
      return false;
    }

    // If retryableErrors list is specified, only retry matching codes
    if (retryableErrors && retryableErrors.length > 0) {
      return retryableErrors.includes(error.code);
    }

    if (error instanceof TransientError) {
      return true;
    }

    // Never retry client errors (4xx)
    if (error.statusCode >= 400 && error.statusCode < 500) {
      return false;
    }

    return error.statusCode >= 500;
  }

  if (retryableErrors && retryableErrors.length > 0) {
    const code = errorCodeOf(error);
    return code !== undefined && retryableErrors.includes(code);
  }

  return true;
}

/**
 * Delay before retry number `retryIndex` (0 for the first retry).
 * delay = min(maxDelay, max(baseDelay * 2^retryIndex, retryAfter)) * random(0.5, 1.0)
 */
export function computeBackoffDelay(
  retryIndex: number,
  options: BackoffOptions,
  error?: unknown,
): number {
  const exponentialDelay = options.baseDelayMs * Math.pow(2, retryIndex);
  const requested =
    error instanceof RateLimitedError && error.retryAfter !== undefined
      ? error.retryAfter * 1_000
      : 0;
  const cappedDelay = Math.min(options.maxDelayMs, Math.max(exponentialDelay, requested));
  if (!options.jitter) {
    return Math.floor(cappedDelay);
  }
  const jitter = 0.5 + Math.random() * 0.5;
  return Math.floor(cappedDelay * jitter);
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new CancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Execute a function with retry logic using exponential backoff.
 * Rethrows the last error once attempts are exhausted, and the first
 * non-retryable error immediately.
 */
export async function withRetry<T>(fn: () => Promise<T>, options?: RetryOptions): Promise<T> {
  const { maxAttempts, baseDelayMs, maxDelayMs, jitter } = {
    ...DEFAULT_RETRY_OPTIONS,
    ...options,
  };
  const retryableErrors = options?.retryableErrors;
  const signal = options?.signal;

  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (signal?.aborted) {
      throw new CancelledError();
    }
    try {
      return await fn();
    } catch (error: unknown) {
      lastError = error;

      if (attempt >= maxAttempts || !isRetryable(error, retryableErrors)) {
        break;
      }

      const delayMs = computeBackoffDelay(attempt - 1, { baseDelayMs, maxDelayMs, jitter }, error);
      options?.onRetry?.({ attempt, maxAttempts, delayMs, error });
      await sleep(delayMs, signal);
    }
  }

  throw lastError;
}
