// Bounded task pool: at most `size` tasks in flight, results kept in input order

export interface PoolOptions {
  size: number;
  signal?: AbortSignal;
}

export type PoolResult<T> =
  | { status: 'fulfilled'; value: T }
  | { status: 'rejected'; reason: unknown }
  | { status: 'skipped' };

export async function runBounded<I, T>(
  items: readonly I[],
  task: (item: I, index: number) => Promise<T> | T,
  options: PoolOptions
): Promise<PoolResult<T>[]> {
  const results: PoolResult<T>[] = items.map((): PoolResult<T> => ({ status: 'skipped' }));
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      if (options.signal?.aborted) return;
      const index = next++;
      try {
        results[index] = { status: 'fulfilled', value: await task(items[index], index) };
      } catch (reason) {
        results[index] = { status: 'rejected', reason };
      }
    }
  };

  const size = Math.max(1, Math.min(options.size, items.length));
  await Promise.all(Array.from({ length: size }, () => worker()));
  return results;
}
