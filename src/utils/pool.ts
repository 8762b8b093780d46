/**
 * Maps `items` through `fn` with at most `concurrency` calls in flight.
 * Results keep the input order. The first rejection stops workers from
 * picking up new items and rejects the whole call.
 */
export async function mapOrdered<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const width = Math.max(1, Math.min(Math.floor(concurrency), items.length));
  let next = 0;
  let failed = false;

  const worker = async () => {
    while (!failed && next < items.length) {
      const index = next++;
      try {
        results[index] = await fn(items[index], index);
      } catch (error) {
        failed = true;
        throw error;
      }
    }
  };

  await Promise.all(Array.from({ length: items.length ? width : 0 }, worker));
  return results;
}
