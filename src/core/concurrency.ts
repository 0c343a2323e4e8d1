/**
 * Runs `worker` over `items` with at most `concurrency` calls in flight. Items are
 * claimed in input order; once `signal` aborts, no further item is started and the
 * calls already running are awaited.
 */
export async function processWithConcurrency<T>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<void>,
  signal?: AbortSignal,
): Promise<void> {
  let index = 0;
  const slots = new Array(Math.max(1, concurrency)).fill(null).map(async () => {
    while (true) {
      if (signal?.aborted) {
        break;
      }
      const current = index;
      index += 1;
      if (current >= items.length) {
        break;
      }
      await worker(items[current], current);
    }
  });
  await Promise.all(slots);
}
