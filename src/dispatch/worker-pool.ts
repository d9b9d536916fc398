/**
 * Run an async mapper over items with at most `concurrency` in flight.
 * Results keep input order. The mapper is expected not to reject; a rejection
 * still lets the other workers finish before it propagates.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  mapper: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      const item = items[index];
      if (item === undefined) continue;
      results[index] = await mapper(item, index);
    }
  };

  const workerCount = Math.max(1, Math.min(concurrency, items.length));
  const settled = await Promise.allSettled(Array.from({ length: workerCount }, worker));
  for (const outcome of settled) {
    if (outcome.status === 'rejected') {
      throw outcome.reason;
    }
  }
  return results;
}
