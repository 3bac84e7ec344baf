import type { Semaphore } from './semaphore';

/**
 * Options for ConcurrentPool.run
 */
export interface ConcurrentPoolOptions<R> {
  /** Fired after each item completes */
  onItemComplete?: (result: R, index: number) => void;
  /**
   * Shared bound across several pools. Each item holds one permit while
   * `processFn` runs, on top of the pool's own worker count.
   */
  semaphore?: Semaphore;
}

/**
 * ConcurrentPool - Worker pool utility for concurrent task execution.
 *
 * Unlike batch processing where all items in a batch must complete before
 * the next batch starts, the pool keeps N workers active at all times.
 * When a worker finishes, it immediately picks up the next available item.
 */
export class ConcurrentPool {
  /**
   * Process items concurrently using a worker pool pattern.
   *
   * Spawns up to `concurrency` workers that pull items from a shared queue.
   * Results maintain the original item order regardless of completion order.
   */
  static async run<T, R>(
    items: readonly T[],
    concurrency: number,
    processFn: (item: T, index: number) => Promise<R>,
    options: ConcurrentPoolOptions<R> = {},
  ): Promise<R[]> {
    const { onItemComplete, semaphore } = options;
    const results: R[] = new Array(items.length);
    let nextIndex = 0;

    const runItem = (index: number): Promise<R> =>
      semaphore
        ? semaphore.use(() => processFn(items[index], index))
        : processFn(items[index], index);

    async function worker(): Promise<void> {
      while (nextIndex < items.length) {
        const index = nextIndex++;
        results[index] = await runItem(index);
        onItemComplete?.(results[index], index);
      }
    }

    const workers = Array.from(
      { length: Math.min(Math.max(1, concurrency), items.length) },
      () => worker(),
    );
    await Promise.all(workers);
    return results;
  }
}
