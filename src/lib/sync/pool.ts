import { SyncAbortedError } from '@/lib/errors';

/**
 * Maps `items` through `worker` with at most `concurrency` calls in flight.
 * Results keep input order. Resolves only once every started call has
 * settled, so callers can treat the return as a hard synchronization point.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal,
): Promise<R[]> {
  const results: R[] = [];
  let next = 0;
  let stopped = false;

  const runner = async () => {
    while (!stopped && next < items.length) {
      if (signal?.aborted) {
        stopped = true;
        throw new SyncAbortedError();
      }
      const index = next;
      next += 1;
      try {
        results[index] = await worker(items[index], index);
      } catch (err) {
        stopped = true;
        throw err;
      }
    }
  };

  const size = Math.max(1, Math.min(concurrency, items.length));
  const settled = await Promise.allSettled(
    Array.from({ length: size }, () => runner()),
  );
  const failure = settled.find(
    (result): result is PromiseRejectedResult => result.status === 'rejected',
  );
  if (failure) throw failure.reason;
  return results;
}
