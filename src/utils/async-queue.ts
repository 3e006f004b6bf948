export interface QueueOptions {
  readonly concurrency?: number;
  /** Called after each item settles, with the number done so far. */
  readonly onProgress?: (done: number, total: number) => void;
}

/**
 * Map `items` through `worker` with at most `concurrency` calls in flight.
 * Results keep input order. The first rejection rejects the whole run;
 * workers that must not abort the batch should catch their own errors.
 */
export async function runWithConcurrency<T, R>(
  items: readonly T[],
  worker: (value: T, index: number) => Promise<R>,
  options: QueueOptions = {},
): Promise<R[]> {
  const concurrency = Math.max(1, Math.floor(options.concurrency ?? 1));
  const results = new Array<R>(items.length);
  let cursor = 0;
  let done = 0;

  const lane = async (): Promise<void> => {
    while (cursor < items.length) {
      const index = cursor++;
      results[index] = await worker(items[index], index);
      done += 1;
      options.onProgress?.(done, items.length);
    }
  };

  const lanes = Array.from({ length: Math.min(concurrency, items.length) }, () => lane());
  await Promise.all(lanes);
  return results;
}
