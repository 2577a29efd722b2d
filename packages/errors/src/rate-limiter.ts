import { sleep } from "./retry.js";

export interface IRateLimiter {
  acquire(): Promise<void>;
}

export interface TokenBucketOptions {
  /** Maximum tokens (burst capacity). */
  capacity: number;
  /** Tokens added per second. */
  refillPerSecond: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Token bucket shared by every worker calling the same external service.
 *
 * A caller that finds the bucket empty reserves its token up front (the balance
 * goes negative), so concurrent waiters are released in arrival order, one
 * refill interval apart.
 */
export class TokenBucketRateLimiter implements IRateLimiter {
  private tokens: number;
  private lastRefill: number;
  private readonly capacity: number;
  private readonly refillPerSecond: number;
  private readonly now: () => number;
  private readonly wait: (ms: number) => Promise<void>;

  constructor(options: TokenBucketOptions) {
    if (options.capacity < 1 || options.refillPerSecond <= 0) {
      throw new Error("Token bucket needs capacity >= 1 and a positive refill rate");
    }
    this.capacity = options.capacity;
    this.refillPerSecond = options.refillPerSecond;
    this.now = options.now ?? Date.now;
    this.wait = options.sleep ?? sleep;
    this.tokens = options.capacity;
    this.lastRefill = this.now();
  }

  async acquire(): Promise<void> {
    this.refill();

    this.tokens -= 1;
    if (this.tokens >= 0) {
      return;
    }

    const waitMs = Math.ceil((-this.tokens / this.refillPerSecond) * 1000);
    await this.wait(waitMs);
  }

  /** Tokens currently available; negative while callers are queued. */
  get available(): number {
    this.refill();
    return this.tokens;
  }

  private refill(): void {
    const now = this.now();
    const elapsedSeconds = (now - this.lastRefill) / 1000;
    this.tokens = Math.min(this.capacity, this.tokens + elapsedSeconds * this.refillPerSecond);
    this.lastRefill = now;
  }
}

/** Limiter that never waits, for collaborators with no quota. */
export const unlimited: IRateLimiter = {
  acquire: () => Promise.resolve(),
};
