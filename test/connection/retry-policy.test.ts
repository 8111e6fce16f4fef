/**
 * Unit tests for backoff computation and the abortable sleep.
 *
 * @see /src/connection/retry-policy.ts
 */

import { describe, it, expect } from "vitest";
import {
  DEFAULT_RETRY_POLICY,
  computeBackoffDelay,
  sleep,
} from "../../src/connection/retry-policy.js";

describe("computeBackoffDelay", () => {
  const policy = { baseDelayMs: 1000, maxDelayMs: 30_000, jitterRatio: 0.1 };

  it("doubles the delay per retry without jitter", () => {
    const delays = [0, 1, 2, 3].map((n) => computeBackoffDelay(n, policy, () => 0));
    expect(delays).toEqual([1000, 2000, 4000, 8000]);
  });

  it("adds at most jitterRatio of the exponential delay", () => {
    expect(computeBackoffDelay(2, policy, () => 0.5)).toBe(4200);
    expect(computeBackoffDelay(2, policy, () => 0.999)).toBeLessThan(4400);
  });

  it("never exceeds maxDelayMs", () => {
    expect(computeBackoffDelay(10, policy, () => 0.9)).toBe(30_000);
    expect(computeBackoffDelay(4, policy, () => 0.99)).toBe(17_584);
    expect(computeBackoffDelay(5, policy, () => 0)).toBe(30_000);
  });

  it("stays within [base * 2^n, min(max, base * 2^n * 1.1)] for random draws", () => {
    for (let n = 0; n < 8; n++) {
      const delay = computeBackoffDelay(n, policy);
      const floor = Math.min(1000 * 2 ** n, 30_000);
      expect(delay).toBeGreaterThanOrEqual(floor);
      expect(delay).toBeLessThanOrEqual(Math.min(30_000, 1000 * 2 ** n * 1.1));
    }
  });

  it("has the documented defaults", () => {
    expect(DEFAULT_RETRY_POLICY).toEqual({
      maxAttempts: 3,
      baseDelayMs: 1000,
      maxDelayMs: 30_000,
      jitterRatio: 0.1,
    });
  });
});

describe("sleep", () => {
  it("resolves early when the signal aborts", async () => {
    const controller = new AbortController();
    const started = Date.now();
    const pending = sleep(10_000, controller.signal);

    controller.abort();
    await pending;

    expect(Date.now() - started).toBeLessThan(1000);
  });

  it("resolves at once for an already aborted signal", async () => {
    await expect(sleep(10_000, AbortSignal.abort())).resolves.toBeUndefined();
  });
});
