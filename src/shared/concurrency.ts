/**
 * Run `fn` over `items` with at most `concurrency` calls in flight.
 * Results keep the input order. A rejection from `fn` rejects the whole
 * call; callers that need isolation catch inside `fn`.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results: R[] = new Array<R>(items.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      results[index] = await fn(items[index], index);
    }
  };

  const workers: Promise<void>[] = [];
  for (let i = 0; i < Math.min(Math.max(1, concurrency), items.length); i++) {
    workers.push(worker());
  }
  await Promise.all(workers);
  return results;
}
