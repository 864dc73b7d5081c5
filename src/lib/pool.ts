/**
 * Bounded task pool.
 *
 * Runs independent tasks with at most `limit` in flight. After the first
 * failure no further task is started; tasks already running are awaited
 * and the first error is rethrown. Results keep input order.
 */
export async function runBounded<T, R>(
  items: readonly T[],
  limit: number,
  task: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const width = Math.max(1, Math.min(Math.floor(limit), items.length));
  let next = 0;
  let failed = false;
  let firstError: unknown = undefined;

  async function worker(): Promise<void> {
    while (!failed && next < items.length) {
      const index = next++;
      try {
        results[index] = await task(items[index], index);
      } catch (error) {
        if (!failed) {
          failed = true;
          firstError = error;
        }
      }
    }
  }

  await Promise.all(Array.from({ length: width }, () => worker()));

  if (failed) {
    throw firstError;
  }
  return results;
}
