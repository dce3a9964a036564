/**
 * Runs `task` over `items` with at most `limit` tasks in flight. Results keep the order of
 * `items`, whatever order the tasks finish in.
 */
export const mapWithConcurrency = async <T, R>({
  items,
  limit,
  task
}: {
  items: readonly T[];
  limit: number;
  task: (item: T) => Promise<R>;
}): Promise<R[]> => {
  const results: R[] = [];
  // Workers share one iterator, so each item is taken exactly once.
  const queue = items.entries();

  const worker = async () => {
    for (const [index, item] of queue) {
      results[index] = await task(item);
    }
  };

  await Promise.all(Array.from({length: Math.max(1, Math.min(limit, items.length))}, () => worker()));
  return results;
};
