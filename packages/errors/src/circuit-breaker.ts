import CircuitBreaker from "opossum";
import type { Logger } from "@docindex/logger";
import { AppError } from "./app-error.js";
import { CircuitOpenError, PermanentError, RateLimitedError, TimeoutError } from "./errors.js";
import { errorCodeOf } from "./inspect.js";

export interface CircuitBreakerOptions {
  /** Timeout in milliseconds after which the call is considered failed. Default: 30000 */
  timeout?: number;
  /** Error percentage at which to open the circuit. Default: 50 */
  errorThresholdPercentage?: number;
  /** Time in milliseconds to wait before attempting to close the circuit. Default: 30000 */
  resetTimeout?: number;
  /** Rolling count timeout in milliseconds. Default: 10000 */
  rollingCountTimeout?: number;
  /** Number of buckets in the rolling window. Default: 10 */
  rollingCountBuckets?: number;
  /** Minimum calls in the window before the circuit may open. Default: 10 */
  volumeThreshold?: number;
  logger?: Logger;
}

const DEFAULT_OPTIONS = {
  timeout: 30_000,
  errorThresholdPercentage: 50,
  resetTimeout: 30_000,
  volumeThreshold: 10,
};

export function createCircuitBreaker<TArgs extends unknown[], TResult>(
  name: string,
  fn: (...args: TArgs) => Promise<TResult>,
  options?: CircuitBreakerOptions,
): CircuitBreaker<TArgs, TResult> {
  const logger = options?.logger;
  const mergedOptions = {
    timeout: options?.timeout ?? DEFAULT_OPTIONS.timeout,
    errorThresholdPercentage:
      options?.errorThresholdPercentage ?? DEFAULT_OPTIONS.errorThresholdPercentage,
    resetTimeout: options?.resetTimeout ?? DEFAULT_OPTIONS.resetTimeout,
    volumeThreshold: options?.volumeThreshold ?? DEFAULT_OPTIONS.volumeThreshold,
    ...(options?.rollingCountTimeout !== undefined
      ? { rollingCountTimeout: options.rollingCountTimeout }
      : {}),
    ...(options?.rollingCountBuckets !== undefined
      ? { rollingCountBuckets: options.rollingCountBuckets }
      : {}),
    name,
    // Rejected content and throttling say nothing about the health of the service
    errorFilter: (err: unknown) => err instanceof PermanentError || err instanceof RateLimitedError,
  };

  const breaker = new CircuitBreaker(fn, mergedOptions);

  breaker.on("open", () => {
    logger?.warn({ breaker: name }, "circuit OPENED (requests will be short-circuited)");
  });

  breaker.on("halfOpen", () => {
    logger?.warn({ breaker: name }, "circuit HALF-OPEN (next request is a test)");
  });

  breaker.on("close", () => {
    logger?.info({ breaker: name }, "circuit CLOSED (back to normal)");
  });

  return breaker;
}

/** Map opossum's timeout and open-circuit rejections onto the transient taxonomy. */
export function normalizeBreakerError(service: string, error: unknown): unknown {
  if (AppError.isAppError(error)) {
    return error;
  }
  switch (errorCodeOf(error)) {
    case "ETIMEDOUT":
      return new TimeoutError(`${service} call timed out`, service, { cause: error });
    case "EOPENBREAKER":
      return new CircuitOpenError(service, { cause: error });
    default:
      return error;
  }
}

/**
 * Wrap `fn` in a circuit breaker and return a plain async function with the
 * same signature whose breaker rejections are normalized.
 */
export function createGuardedCall<TArgs extends unknown[], TResult>(
  name: string,
  fn: (...args: TArgs) => Promise<TResult>,
  options?: CircuitBreakerOptions,
): (...args: TArgs) => Promise<TResult> {
  const breaker = createCircuitBreaker(name, fn, options);

  return async (...args: TArgs): Promise<TResult> => {
    try {
      return await breaker.fire(...args);
    } catch (error: unknown) {
      throw normalizeBreakerError(name, error);
    }
  };
}
