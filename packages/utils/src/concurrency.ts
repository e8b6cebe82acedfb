import os from "os";

export interface RunBoundedOptions {
  /** Maximum number of tasks in flight. Defaults to the CPU count. */
  concurrency?: number;
  /** Stop starting new tasks once aborted. In-flight tasks still finish. */
  signal?: AbortSignal;
}

/**
 * Default parallelism for CPU-heavy batch work
 */
export function defaultConcurrency(): number {
  return Math.max(1, os.availableParallelism());
}

/**
 * Run `worker` over `items` with at most `concurrency` tasks in flight.
 *
 * Results are returned in input order. Items never started because the
 * signal was aborted are reported as `undefined` in the results array.
 * Worker rejections propagate; callers that need per-item failures should
 * catch inside the worker.
 */
export async function runBounded<T, R>(
  items: readonly T[],
  worker: (item: T, index: number) => Promise<R>,
  options: RunBoundedOptions = {}
): Promise<Array<R | undefined>> {
  const { concurrency = defaultConcurrency(), signal } = options;

  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`);
  }

  const results: Array<R | undefined> = new Array(items.length).fill(undefined);
  let next = 0;

  const lane = async (): Promise<void> => {
    while (next < items.length) {
      if (signal?.aborted) return;
      const index = next++;
      results[index] = await worker(items[index], index);
    }
  };

  const lanes = Array.from({ length: Math.min(concurrency, items.length) }, () => lane());
  await Promise.all(lanes);

  return results;
}
