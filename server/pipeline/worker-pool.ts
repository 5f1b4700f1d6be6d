import pLimit from 'p-limit';

/**
 * Runs `task` for every item with at most `concurrency` in flight.
 *
 * After the first failure no queued item is started; items already running
 * are awaited, then the first error is rethrown.
 */
export async function forEachBounded<T>(
  items: readonly T[],
  concurrency: number,
  task: (item: T) => Promise<void>,
): Promise<void> {
  const limit = pLimit(Math.max(1, concurrency));
  const state: { failed: boolean; error?: unknown } = { failed: false };

  await Promise.all(
    items.map((item) =>
      limit(async () => {
        if (state.failed) return;
        try {
          await task(item);
        } catch (error) {
          if (!state.failed) {
            state.failed = true;
            state.error = error;
          }
        }
      }),
    ),
  );

  if (state.failed) throw state.error;
}
