/**
 * Parallel execution utilities for concurrent operations.
 *
 * Dependency direction: parallel.ts → nothing (leaf module)
 * Used by: stage dispatcher, gate engine
 */

/** Result of a parallel operation. */
export type ParallelResult<T> =
  | { index: number; success: true; value: T }
  | { index: number; success: false; error: Error };

/** Options for parallel execution. */
export interface ParallelOptions {
  /** Maximum number of concurrent operations (default: unlimited). */
  concurrency?: number;
  /** Whether to continue on error (default: false). */
  continueOnError?: boolean;
}

/**
 * Execute an array of operations with a bounded worker pool.
 *
 * @returns Array of results with the same order as input
 */
export async function parallel<T>(
  operations: Array<() => Promise<T>>,
  options: ParallelOptions = {},
): Promise<ParallelResult<T>[]> {
  const { concurrency = Infinity, continueOnError = false } = options;
  const results: ParallelResult<T>[] = new Array(operations.length);
  let currentIndex = 0;

  const worker = async (): Promise<void> => {
    while (currentIndex < operations.length) {
      const index = currentIndex++;
      const operation = operations[index];
      if (!operation) continue;

      try {
        results[index] = { index, success: true, value: await operation() };
      } catch (error) {
        const err = error instanceof Error ? error : new Error(String(error));
        results[index] = { index, success: false, error: err };
        if (!continueOnError) {
          throw err;
        }
      }
    }
  };

  const width = Math.max(1, Math.min(concurrency, operations.length));
  await Promise.all(Array.from({ length: width }, () => worker()));

  return results;
}

/**
 * Execute an operation with a timeout.
 *
 * @throws {Error} `Operation timed out after <ms>ms` when the deadline passes first
 */
export async function withTimeout<T>(operation: () => Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`Operation timed out after ${timeoutMs}ms`)), timeoutMs);
  });

  try {
    return await Promise.race([operation(), deadline]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Parallel map with concurrency control.
 *
 * @throws the first operation error unless `continueOnError` is set
 */
export async function parallelMap<T, R>(
  items: readonly T[],
  mapper: (item: T, index: number) => Promise<R>,
  options: ParallelOptions = {},
): Promise<ParallelResult<R>[]> {
  const operations = items.map((item, index) => () => mapper(item, index));
  return parallel(operations, options);
}
