/**
 * Parallel Processing Utilities
 *
 * Provides a bounded worker pool for running async operations with a concurrency limit.
 */

import { toError } from './errors.js';

export interface ParallelOptions<R> {
  /** Maximum number of concurrent operations (default: 5) */
  concurrency?: number;
  /**
   * Called once per item as soon as it settles, in completion order.
   * Runs synchronously before the worker claims its next item.
   */
  onSettled?: (result: R | Error, item: number) => void;
}

/**
 * Run async operations in parallel with concurrency limit
 *
 * Workers pull the next unclaimed item as soon as they finish the previous one,
 * so slow items never hold back a fixed partition of the input.
 *
 * @returns Results array in same order as input, with errors captured
 *
 * @example
 * const results = await parallelMap(paths, async (filePath) => {
 *   return await processImage(filePath);
 * }, { concurrency: 4 });
 */
export async function parallelMap<T, R>(
  items: readonly T[],
  fn: (item: T, index: number) => Promise<R>,
  options: ParallelOptions<R> = {}
): Promise<(R | Error)[]> {
  const { concurrency = 5, onSettled } = options;

  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new Error(`Concurrency must be a positive integer, got ${concurrency}`);
  }

  const results: (R | Error)[] = new Array(items.length);
  let nextIndex = 0;

  const worker = async (): Promise<void> => {
    while (true) {
      // Claim the index before any async work
      const index = nextIndex;
      if (index >= items.length) {
        break;
      }
      nextIndex++;

      const item = items[index];
      let settled: R | Error;

      try {
        settled = await fn(item, index);
      } catch (error) {
        settled = toError(error);
      }

      results[index] = settled;
      onSettled?.(settled, index);
    }
  };

  const workers: Promise<void>[] = [];
  const workerCount = Math.min(concurrency, items.length);

  for (let i = 0; i < workerCount; i++) {
    workers.push(worker());
  }

  await Promise.all(workers);

  return results;
}

/**
 * Check if a result from parallelMap is an error
 */
export function isParallelError<T>(result: T | Error): result is Error {
  return result instanceof Error;
}
