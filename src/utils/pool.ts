/**
 * Runs `worker` over `items` with at most `concurrency` calls in flight.
 * Workers receive the item's index so results can be stored by position
 * rather than by completion order. Once `signal` aborts no further item is
 * started; calls already running are left to settle.
 */
export async function runWithConcurrency<T>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<void>,
  signal?: AbortSignal
): Promise<void> {
  let next = 0;
  const lanes = Math.max(1, Math.min(Math.floor(concurrency), items.length));

  async function lane(): Promise<void> {
    while (next < items.length && !signal?.aborted) {
      const index = next++;
      await worker(items[index], index);
    }
  }

  await Promise.all(Array.from({ length: lanes }, () => lane()));
}
