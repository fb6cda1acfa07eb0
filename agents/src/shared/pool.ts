/**
 * Bounded worker pool. Each item is settled on its own; one rejection never
 * stops the others. Once the signal aborts, items not yet started are skipped.
 */

export type PoolSettlement<R> =
  | { status: 'fulfilled'; value: R }
  | { status: 'rejected'; reason: unknown }
  | { status: 'skipped' };

export interface PoolOptions {
  concurrency: number;
  signal?: AbortSignal;
}

export async function runPool<T, R>(
  items: readonly T[],
  worker: (item: T, index: number) => Promise<R>,
  options: PoolOptions,
): Promise<PoolSettlement<R>[]> {
  const settlements: PoolSettlement<R>[] = items.map(() => ({ status: 'skipped' }));
  const requested = Number.isFinite(options.concurrency) ? Math.floor(options.concurrency) : 1;
  const width = Math.max(1, Math.min(requested, items.length));
  let next = 0;

  const lane = async (): Promise<void> => {
    while (next < items.length && !options.signal?.aborted) {
      const index = next++;
      try {
        settlements[index] = { status: 'fulfilled', value: await worker(items[index], index) };
      } catch (reason) {
        settlements[index] = { status: 'rejected', reason };
      }
    }
  };

  await Promise.all(Array.from({ length: width }, () => lane()));
  return settlements;
}
