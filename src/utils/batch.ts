/**
 * Run `worker` over `items` in chunks of `concurrency`, waiting for every
 * call of a chunk to settle before starting the next one. Results keep the
 * input order.
 */
export async function settleInChunks<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<PromiseSettledResult<R>[]> {
  const size = Math.max(1, Math.floor(concurrency));
  const results: PromiseSettledResult<R>[] = [];

  for (let i = 0; i < items.length; i += size) {
    const batch = items.slice(i, i + size);
    const batchResults = await Promise.allSettled(batch.map((item, offset) => worker(item, i + offset)));
    results.push(...batchResults);
  }

  return results;
}
