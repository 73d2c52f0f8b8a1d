/**
 * BatchProcessor - splits work into fixed-size batches.
 *
 * Used for embedding requests, which providers cap per call.
 */
export class BatchProcessor {
  /**
   * Split an array into batches of `batchSize`.
   *
   * @example
   * ```typescript
   * BatchProcessor.createBatches([1, 2, 3, 4, 5], 2);
   * // [[1, 2], [3, 4], [5]]
   * ```
   */
  static createBatches<T>(items: T[], batchSize: number): T[][] {
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new RangeError(
        `Batch size must be a positive integer: ${batchSize}`,
      );
    }

    const batches: T[][] = [];
    for (let i = 0; i < items.length; i += batchSize) {
      batches.push(items.slice(i, i + batchSize));
    }
    return batches;
  }

  /**
   * Run all batches in parallel and flatten the results.
   *
   * `processFn` must return one result per input item.
   */
  static async processBatch<T, R>(
    items: T[],
    batchSize: number,
    processFn: (batch: T[]) => Promise<R[]>,
  ): Promise<R[]> {
    const batches = this.createBatches(items, batchSize);
    const results = await Promise.all(batches.map((batch) => processFn(batch)));
    return results.flat();
  }

  /**
   * Run batches one after another and flatten the results.
   *
   * For rate-limited backends where parallel batches would be throttled.
   */
  static async processBatchSequential<T, R>(
    items: T[],
    batchSize: number,
    processFn: (batch: T[], batchIndex: number) => Promise<R[]>,
  ): Promise<R[]> {
    const results: R[] = [];
    const batches = this.createBatches(items, batchSize);
    for (const [index, batch] of batches.entries()) {
      results.push(...(await processFn(batch, index)));
    }
    return results;
  }
}
