import { describe, it, expect } from "vitest";
import { createGuardedCall, normalizeBreakerError } from "./circuit-breaker.js";
import { CircuitOpenError, ExtractionError, RateLimitedError, TimeoutError } from "./errors.js";

describe("normalizeBreakerError", () => {
  it("maps opossum timeouts and open circuits", () => {
    const timeout = Object.assign(new Error("Timed out after 10ms"), { code: "ETIMEDOUT" });
    const open = Object.assign(new Error("Breaker is open"), { code: "EOPENBREAKER" });

    expect(normalizeBreakerError("cohere", timeout)).toBeInstanceOf(TimeoutError);
    expect(normalizeBreakerError("cohere", open)).toBeInstanceOf(CircuitOpenError);
  });

  it("passes other errors through", () => {
    const err = new Error("boom");
    expect(normalizeBreakerError("cohere", err)).toBe(err);
  });
});

describe("createGuardedCall", () => {
  it("returns the wrapped result", async () => {
    const call = createGuardedCall("echo", (value: string) => Promise.resolve(value.toUpperCase()));

    await expect(call("abc")).resolves.toBe("ABC");
  });

  it("converts a slow call into a TimeoutError", async () => {
    const call = createGuardedCall(
      "slow",
      () => new Promise<string>((resolve) => setTimeout(() => resolve("late"), 200)),
      { timeout: 10 },
    );

    await expect(call()).rejects.toBeInstanceOf(TimeoutError);
  });

  it("opens after repeated failures and short-circuits", async () => {
    const call = createGuardedCall("flaky", () => Promise.reject(new Error("down")), {
      volumeThreshold: 1,
      errorThresholdPercentage: 1,
      resetTimeout: 60_000,
    });

    await expect(call()).rejects.toThrow("down");
    await expect(call()).rejects.toBeInstanceOf(CircuitOpenError);
  });

  it("does not count permanent errors as failures", async () => {
    const call = createGuardedCall("picky", () => Promise.reject(new ExtractionError("bad")), {
      volumeThreshold: 1,
      errorThresholdPercentage: 1,
      resetTimeout: 60_000,
    });

    await expect(call()).rejects.toBeInstanceOf(ExtractionError);
    await expect(call()).rejects.toBeInstanceOf(ExtractionError);
  });

  it("does not count rate limits as failures", async () => {
    let calls = 0;
    const call = createGuardedCall(
      "throttled",
      () => {
        calls++;
        return calls <= 3 ? Promise.reject(new RateLimitedError()) : Promise.resolve("ok");
      },
      { volumeThreshold: 1, errorThresholdPercentage: 1, resetTimeout: 60_000 },
    );

    for (let i = 0; i < 3; i++) {
      await expect(call()).rejects.toBeInstanceOf(RateLimitedError);
    }
    await expect(call()).resolves.toBe("ok");
  });
});
