/**
 * Retryable-call wrapper with exponential backoff.
 *
 * A policy names the attempt budget, the delay before each retry and which
 * errors are worth retrying. Non-retryable errors and the error from the last
 * attempt are rethrown unchanged so callers can inspect them.
 */

export interface RetryPolicy {
  maxAttempts: number;
  /** Delay before retry number `retry` (0-based). */
  backoffMs: (retry: number) => number;
  isRetryable: (error: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/** 1s, 2s, 4s, ... for a 1000 ms base. */
export function exponentialBackoff(baseDelayMs: number): (retry: number) => number {
  return (retry) => baseDelayMs * Math.pow(2, retry);
}

export async function withRetry<T>(
  work: (attempt: number) => Promise<T>,
  policy: RetryPolicy
): Promise<T> {
  const wait = policy.sleep ?? sleep;
  let attempt = 1;

  for (;;) {
    try {
      return await work(attempt);
    } catch (error) {
      if (attempt >= policy.maxAttempts || !policy.isRetryable(error)) {
        throw error;
      }

      const delayMs = policy.backoffMs(attempt - 1);
      policy.onRetry?.(error, attempt, delayMs);
      await wait(delayMs);
      attempt++;
    }
  }
}
