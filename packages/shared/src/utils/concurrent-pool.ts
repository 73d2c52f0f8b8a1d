/**
 * Options for ConcurrentPool.run
 */
export interface ConcurrentPoolOptions<R> {
  /**
   * Fired after each item completes, with the item's original index
   */
  onItemComplete?: (result: R, index: number) => void;

  /**
   * Once aborted, idle workers stop taking new items. Items already running
   * are left to finish; the run then rejects with an AbortError.
   */
  signal?: AbortSignal;
}

/**
 * ConcurrentPool - keeps up to N workers busy over a shared queue.
 *
 * A worker that finishes picks up the next item immediately, so one slow
 * document does not hold back the rest of a folder run.
 */
export class ConcurrentPool {
  /**
   * Process items with at most `concurrency` in flight.
   *
   * @returns Results in input order
   */
  static async run<T, R>(
    items: T[],
    concurrency: number,
    processFn: (item: T, index: number) => Promise<R>,
    options: ConcurrentPoolOptions<R> = {},
  ): Promise<R[]> {
    const results: R[] = new Array(items.length);
    const { onItemComplete, signal } = options;
    let nextIndex = 0;

    async function worker(): Promise<void> {
      while (nextIndex < items.length && !signal?.aborted) {
        const index = nextIndex++;
        results[index] = await processFn(items[index], index);
        onItemComplete?.(results[index], index);
      }
    }

    const workerCount = Math.max(1, Math.min(concurrency, items.length));
    await Promise.all(Array.from({ length: workerCount }, () => worker()));

    if (signal?.aborted && nextIndex < items.length) {
      const error = new Error(
        `Pool aborted with ${items.length - nextIndex} item(s) not started`,
      );
      error.name = 'AbortError';
      throw error;
    }

    return results;
  }
}
