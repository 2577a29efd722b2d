import {
  AppError,
  ContentRejectedError,
  ExternalServiceError,
  ProviderRejectedError,
  RateLimitedError,
} from "@docindex/errors";

/** Map an HTTP failure status from a provider onto the error taxonomy. */
export function errorForStatus(
  service: string,
  status: number | undefined,
  message: string,
  options?: { retryAfter?: number; cause?: unknown },
): AppError {
  const cause = options?.cause;
  if (status === 429) {
    return new RateLimitedError(message, options?.retryAfter, { cause });
  }
  if (status === 400 || status === 413 || status === 422) {
    return new ContentRejectedError(message, service, { cause });
  }
  if (status !== undefined && status >= 400 && status < 500) {
    return new ProviderRejectedError(message, service, status, { cause });
  }
  return new ExternalServiceError(message, service, { cause });
}

/** `Retry-After` in seconds; HTTP dates are converted relative to now. */
export function parseRetryAfter(value: string | null, now = Date.now()): number | undefined {
  if (value === null || value.trim() === "") {
    return undefined;
  }
  const seconds = Number(value);
  if (Number.isFinite(seconds)) {
    return Math.max(0, seconds);
  }
  const date = Date.parse(value);
  return Number.isNaN(date) ? undefined : Math.max(0, Math.ceil((date - now) / 1000));
}
