/**
 * Outcome of one item processed by {@link ConcurrentPool.runSettled}
 */
export type PoolOutcome<T, R> =
  | { status: 'fulfilled'; item: T; value: R }
  | { status: 'rejected'; item: T; reason: unknown };

/**
 * ConcurrentPool - Worker pool for running independent documents in parallel.
 *
 * The pool keeps N workers active at all times. When a worker finishes,
 * it immediately picks up the next available item.
 */
export class ConcurrentPool {
  /**
   * Process items concurrently using a worker pool pattern.
   *
   * Results maintain the original item order. The first rejection rejects
   * the whole run; use {@link runSettled} to keep going past failures.
   *
   * @param concurrency - Maximum number of concurrent workers (at least 1)
   * @param onItemComplete - Optional callback fired after each item completes
   */
  static async run<T, R>(
    items: T[],
    concurrency: number,
    processFn: (item: T, index: number) => Promise<R>,
    onItemComplete?: (result: R, index: number) => void,
  ): Promise<R[]> {
    const results: R[] = new Array(items.length);
    let nextIndex = 0;

    async function worker(): Promise<void> {
      while (nextIndex < items.length) {
        const index = nextIndex++;
        results[index] = await processFn(items[index], index);
        onItemComplete?.(results[index], index);
      }
    }

    const workerCount = Math.min(Math.max(1, concurrency), items.length);
    await Promise.all(Array.from({ length: workerCount }, () => worker()));
    return results;
  }

  /**
   * Same as {@link run}, but a failing item does not stop the others.
   * Each item yields a fulfilled or rejected outcome, in input order.
   */
  static async runSettled<T, R>(
    items: T[],
    concurrency: number,
    processFn: (item: T, index: number) => Promise<R>,
  ): Promise<PoolOutcome<T, R>[]> {
    return this.run(
      items,
      concurrency,
      async (item, index): Promise<PoolOutcome<T, R>> => {
        try {
          const value = await processFn(item, index);
          return { status: 'fulfilled', item, value };
        } catch (reason) {
          return { status: 'rejected', item, reason };
        }
      },
    );
  }
}
