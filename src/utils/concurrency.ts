/**
 * Bounded-concurrency helpers
 */

/**
 * Run an async worker over items with at most `limit` in flight.
 *
 * Results keep input order. A rejected worker rejects the whole call,
 * so workers that must not abort the batch handle their own errors.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results: R[] = new Array<R>(items.length);
  let next = 0;

  const runLane = async (): Promise<void> => {
    while (next < items.length) {
      const index = next;
      next += 1;
      results[index] = await worker(items[index], index);
    }
  };

  const lanes = Math.max(1, Math.min(limit, items.length));
  await Promise.all(Array.from({ length: lanes }, () => runLane()));

  return results;
}
