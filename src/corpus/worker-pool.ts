/**
 * Runs `task` over `items` with at most `concurrency` calls in flight. The
 * result array lines up with `items`, whatever order the tasks finish in.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  task: (item: T, index: number) => Promise<R>,
  onProgress?: (done: number, total: number) => void,
): Promise<R[]> {
  const results: R[] = new Array(items.length);
  let completed = 0;

  const queue = items.map((item, index) => ({ item, index }));
  const workers = Array.from(
    { length: Math.min(Math.max(1, concurrency), queue.length) },
    async () => {
      for (let next = queue.shift(); next; next = queue.shift()) {
        results[next.index] = await task(next.item, next.index);
        completed++;
        onProgress?.(completed, items.length);
      }
    },
  );

  await Promise.all(workers);
  return results;
}
