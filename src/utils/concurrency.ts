/**
 * Run fn over items with at most `concurrency` calls in flight.
 * Items are started in order; with concurrency 1 they run strictly in sequence.
 */
export async function forEachConcurrent<T>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<void>,
): Promise<void> {
  let nextIndex = 0;

  async function worker(): Promise<void> {
    while (nextIndex < items.length) {
      const idx = nextIndex++;
      await fn(items[idx], idx);
    }
  }

  const workers: Promise<void>[] = [];
  const effectiveConcurrency = Math.max(1, Math.min(concurrency, items.length));
  for (let i = 0; i < effectiveConcurrency; i++) {
    workers.push(worker());
  }

  await Promise.all(workers);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
