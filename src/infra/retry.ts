// ---------------------------------------------------------------------------
// Retry with exponential backoff
// ---------------------------------------------------------------------------

import { setTimeout as delay } from "node:timers/promises";

export type RetryOptions = {
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  backoffMultiplier?: number;
  /** Return false to give up immediately on this error. */
  shouldRetry?: (err: unknown) => boolean;
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
};

export const DEFAULT_RETRY = {
  maxAttempts: 3,
  baseDelayMs: 2_000,
  maxDelayMs: 10_000,
  backoffMultiplier: 2,
} as const;

export function calculateBackoff(
  attempt: number,
  baseDelayMs: number = DEFAULT_RETRY.baseDelayMs,
  maxDelayMs: number = DEFAULT_RETRY.maxDelayMs,
  multiplier: number = DEFAULT_RETRY.backoffMultiplier,
): number {
  return Math.min(baseDelayMs * Math.pow(multiplier, attempt), maxDelayMs);
}

export function sleep(ms: number): Promise<void> {
  return delay(ms);
}

/**
 * Run `fn` until it succeeds or the attempts run out. The error of the last
 * attempt is rethrown unchanged.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_RETRY.maxAttempts);
  const baseDelayMs = options.baseDelayMs ?? DEFAULT_RETRY.baseDelayMs;
  const maxDelayMs = options.maxDelayMs ?? DEFAULT_RETRY.maxDelayMs;
  const multiplier = options.backoffMultiplier ?? DEFAULT_RETRY.backoffMultiplier;
  const wait = options.sleep ?? sleep;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      const retryable = options.shouldRetry?.(err) ?? true;
      if (!retryable || attempt >= maxAttempts - 1) {
        throw err;
      }
      const delayMs = calculateBackoff(attempt, baseDelayMs, maxDelayMs, multiplier);
      options.onRetry?.(err, attempt + 1, delayMs);
      await wait(delayMs);
    }
  }
}
