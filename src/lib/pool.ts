/**
 * Newsdesk — Worker Pool
 *
 * Runs an async task per item with at most `concurrency` tasks in flight.
 * Each result lands in the slot of its input index, so the output keeps
 * input order no matter which task finishes first.
 */

export interface PoolOptions {
  concurrency: number;
  /** Once aborted, pending items are not started and in-flight ones are no longer awaited */
  signal?: AbortSignal;
}

/**
 * Map items through `task`. Slots left `undefined` belong to items that
 * were still pending or in flight when the signal aborted.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  task: (item: T, index: number) => Promise<R>,
  options: PoolOptions
): Promise<Array<R | undefined>> {
  const results: Array<R | undefined> = new Array<R | undefined>(items.length).fill(undefined);
  const { signal } = options;
  // Aborted once the pool settles, which detaches the listener below
  const settled = new AbortController();

  const aborted = new Promise<undefined>((resolve) => {
    if (!signal) return;
    if (signal.aborted) {
      resolve(undefined);
      return;
    }
    signal.addEventListener('abort', () => resolve(undefined), { once: true, signal: settled.signal });
  });

  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length && !signal?.aborted) {
      const index = next++;
      const outcome = await Promise.race([
        task(items[index], index).then((value) => ({ value })),
        aborted,
      ]);
      if (outcome) {
        results[index] = outcome.value;
      }
    }
  };

  const workerCount = Math.max(1, Math.min(options.concurrency, items.length));
  try {
    await Promise.all(Array.from({ length: workerCount }, () => worker()));
  } finally {
    settled.abort();
  }

  return results;
}
