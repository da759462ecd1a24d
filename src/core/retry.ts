/**
 * Exponential backoff retry utility.
 */

import { sleep } from "./utils.js";

export interface RetryOptions {
  /** Total attempts including the first one */
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  factor: number;
  /** Return false to give up immediately on this error */
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  /** Called before each wait with the attempt that just failed */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

/** Waits of 2s, 4s, 8s, then 10s between attempts */
export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxAttempts: 3,
  initialDelayMs: 2_000,
  maxDelayMs: 10_000,
  factor: 2,
};

/**
 * Run `fn`, retrying failures with exponentially growing waits.
 * The error from the final attempt is rethrown unchanged.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: Partial<RetryOptions> = {},
): Promise<T> {
  const { maxAttempts, initialDelayMs, maxDelayMs, factor, shouldRetry, onRetry } = {
    ...DEFAULT_RETRY_OPTIONS,
    ...options,
  };

  let delay = initialDelayMs;
  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (attempt >= maxAttempts || (shouldRetry && !shouldRetry(error, attempt))) {
        throw error;
      }
      onRetry?.(error, attempt, delay);
      await sleep(delay);
      delay = Math.min(delay * factor, maxDelayMs);
    }
  }
}
