export interface ConcurrencyResult {
  dispatched: number;
  aborted: boolean;
}

export async function processWithConcurrency<T>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T) => Promise<void>,
  signal?: AbortSignal,
): Promise<ConcurrencyResult> {
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
      await worker(items[current]);
    }
  });
  await Promise.all(slots);

  const dispatched = Math.min(index, items.length);
  return { dispatched, aborted: dispatched < items.length };
}
