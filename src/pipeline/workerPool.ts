export type PoolResult = {
  completed: number;
  aborted: boolean;
};

/**
 * Runs `worker` over `items` with at most `concurrency` in flight.
 * The first rejection stops dispatch; in-flight items finish before it is rethrown.
 * An aborted signal stops dispatch the same way without an error.
 */
export const runWithConcurrency = async <T>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<void>,
  signal?: AbortSignal,
): Promise<PoolResult> => {
  if (items.length === 0) {
    return { completed: 0, aborted: signal?.aborted ?? false };
  }

  const workerCount = Math.min(Math.max(1, Math.floor(concurrency)), items.length);
  const failure: { failed: boolean; error?: unknown } = { failed: false };
  let cursor = 0;
  let completed = 0;

  const workers = Array.from({ length: workerCount }, async () => {
    while (true) {
      if (failure.failed || signal?.aborted) {
        return;
      }

      const currentIndex = cursor;
      cursor += 1;

      if (currentIndex >= items.length) {
        return;
      }

      const item = items[currentIndex];
      if (item === undefined) {
        return;
      }

      try {
        await worker(item, currentIndex);
        completed += 1;
      } catch (error) {
        if (!failure.failed) {
          failure.failed = true;
          failure.error = error;
        }
        return;
      }
    }
  });

  await Promise.all(workers);

  if (failure.failed) {
    throw failure.error;
  }

  return { completed, aborted: signal?.aborted ?? false };
};
