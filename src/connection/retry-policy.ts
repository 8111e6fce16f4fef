/**
 * Exponential backoff with proportional jitter.
 *
 * The delay before retry `n` (zero-based) is `base * 2^n` plus a jitter
 * drawn uniformly from `[0, base * 2^n * jitterRatio)`, clamped to
 * `maxDelayMs`.
 */

import type { RetryConfigType } from "../config-schema.js";

/** Retry settings as stored in the client configuration. */
export type RetryPolicy = RetryConfigType;

/** Default policy: 3 attempts, 1 s base, 30 s cap, 10% jitter. */
export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  jitterRatio: 0.1,
};

/**
 * Compute the delay before the next attempt.
 *
 * @param retryIndex - Zero-based index of the retry (0 for the first retry).
 * @param policy - Backoff parameters.
 * @param random - Source of uniform values in [0, 1). Defaults to `Math.random`.
 * @returns Delay in milliseconds, never above `policy.maxDelayMs`.
 */
export function computeBackoffDelay(
  retryIndex: number,
  policy: Pick<RetryPolicy, "baseDelayMs" | "maxDelayMs" | "jitterRatio">,
  random: () => number = Math.random
): number {
  const exponential = policy.baseDelayMs * 2 ** Math.max(0, retryIndex);
  const jitter = random() * exponential * policy.jitterRatio;
  return Math.min(exponential + jitter, policy.maxDelayMs);
}

/**
 * Sleep for `ms` milliseconds, resolving early when the signal aborts.
 * Never rejects.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted === true || ms <= 0) return Promise.resolve();

  return new Promise((resolve) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
