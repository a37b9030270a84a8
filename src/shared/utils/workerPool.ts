/**
 * Runs `worker` over `items` with at most `concurrency` calls in flight.
 * Results are stored by input index, so the output order always matches
 * the input order whatever the completion order.
 */
export async function runPool<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(
      `concurrency must be a positive integer, got ${concurrency}`
    );
  }

  const results = new Array<R>(items.length);
  let nextIndex = 0;

  const drain = async (): Promise<void> => {
    while (nextIndex < items.length) {
      const index = nextIndex++;
      results[index] = await worker(items[index], index);
    }
  };

  const workerCount = Math.min(concurrency, items.length);
  await Promise.all(Array.from({ length: workerCount }, () => drain()));

  return results;
}
