import { delay } from 'es-toolkit';

/**
 * Options for retryWithBackoff
 */
export interface RetryOptions {
  /**
   * Total attempts including the first one
   */
  maxAttempts: number;

  /**
   * Delay before the second attempt; doubles after every further failure
   */
  baseDelayMs: number;

  /**
   * Whether a failure may be retried (default: every error)
   */
  shouldRetry?: (error: unknown) => boolean;

  /**
   * Called before each wait with the failed attempt number (1-based)
   */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;

  signal?: AbortSignal;
}

/**
 * Run `fn` until it succeeds, backing off exponentially between attempts.
 *
 * Non-retryable errors and the error of the final attempt are rethrown as-is.
 */
export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const { maxAttempts, baseDelayMs, shouldRetry, onRetry, signal } = options;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      const retryable = shouldRetry?.(error) ?? true;
      if (!retryable || attempt >= maxAttempts || signal?.aborted) {
        throw error;
      }

      const waitMs = baseDelayMs * 2 ** (attempt - 1);
      onRetry?.(error, attempt, waitMs);
      await delay(waitMs, { signal });
    }
  }
}
