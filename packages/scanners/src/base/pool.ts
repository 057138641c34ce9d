/**
 * Options for parallel processing
 */
export interface ParallelProcessOptions {
  /** Stop pulling new items once aborted; in-flight items still finish */
  signal?: AbortSignal;
  /** Callback invoked after each item is processed. `total` is known only for arrays. */
  onProgress?: (completed: number, total: number | undefined) => void;
}

function toAsyncIterator<T>(items: Iterable<T> | AsyncIterable<T>): AsyncIterator<T> {
  if (Symbol.asyncIterator in items) {
    return items[Symbol.asyncIterator]();
  }
  const iterator = items[Symbol.iterator]();
  return {
    next: async () => iterator.next(),
  };
}

/**
 * Process items with a bounded pool of workers.
 *
 * Each worker pulls the next item from a shared iterator, so lazily produced
 * sources (directory walks) are consumed only as fast as workers free up.
 * Results come back in the order items were pulled. A failure in the source
 * iterator rejects the whole call; a failure in `processor` is captured as a
 * rejected entry and never retried.
 *
 * @param items Items to process
 * @param processor Function to process each item
 * @param concurrency Maximum number of concurrent operations (default: 10)
 */
export async function parallelProcess<T, R>(
  items: Iterable<T> | AsyncIterable<T>,
  processor: (item: T, index: number) => Promise<R>,
  concurrency: number = 10,
  options: ParallelProcessOptions = {},
): Promise<PromiseSettledResult<R>[]> {
  const { signal, onProgress } = options;
  const total = Array.isArray(items) ? items.length : undefined;
  const iterator = toAsyncIterator(items);
  const results: PromiseSettledResult<R>[] = [];
  let nextIndex = 0;
  let completed = 0;

  async function worker(): Promise<void> {
    while (!signal?.aborted) {
      const next = await iterator.next();
      if (next.done) return;

      const index = nextIndex++;
      try {
        const value = await processor(next.value, index);
        results[index] = { status: "fulfilled", value };
      } catch (reason) {
        results[index] = { status: "rejected", reason };
      }
      completed++;
      onProgress?.(completed, total);
    }
  }

  const workerCount = Math.max(1, Math.floor(concurrency));
  await Promise.all(Array.from({ length: workerCount }, () => worker()));

  return results;
}

/**
 * Helper to extract successful results from parallel processing
 */
export function extractResults<T>(settled: PromiseSettledResult<T>[]): {
  successes: T[];
  failures: { reason: unknown }[];
} {
  const successes: T[] = [];
  const failures: { reason: unknown }[] = [];

  for (const result of settled) {
    if (result.status === "fulfilled") {
      successes.push(result.value);
    } else {
      failures.push({ reason: result.reason });
    }
  }

  return { successes, failures };
}
