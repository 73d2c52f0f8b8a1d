import type { LoggerMethods } from '@ledgerlens/logger';

import { delay } from 'es-toolkit';

import { IngestionError, isAbortError } from '../errors/ingestion-error';

export interface SoftCallOptions<T> {
  logger: LoggerMethods;

  /**
   * Prefix for the warning, e.g. "[FigureExtractor] OCR"
   */
  label: string;

  /**
   * Returned when the call fails or times out
   */
  fallback: T;

  /**
   * Give up after this many milliseconds (default: no limit)
   */
  timeoutMs?: number;
}

/**
 * Run an optional collaborator call, degrading to `fallback` on failure.
 *
 * Failures and timeouts are logged at warn level. Aborts are rethrown so
 * cancellation is never mistaken for a degraded result.
 */
export async function softCall<T>(
  fn: () => Promise<T>,
  options: SoftCallOptions<T>,
): Promise<T> {
  const { logger, label, fallback, timeoutMs } = options;
  const timer = new AbortController();
  try {
    if (timeoutMs === undefined || timeoutMs <= 0) {
      return await fn();
    }
    const expired = delay(timeoutMs, { signal: timer.signal }).then(
      (): never => {
        throw new IngestionError(`Timed out after ${timeoutMs}ms`);
      },
    );
    return await Promise.race([fn(), expired]);
  } catch (error) {
    if (isAbortError(error)) {
      throw error;
    }
    logger.warn(
      `${label} failed, continuing without it:`,
      IngestionError.getErrorMessage(error),
    );
    return fallback;
  } finally {
    // Releases the pending timer once the race is settled
    timer.abort();
  }
}
