/**
 * Maps `items` through `task` with at most `limit` tasks in flight. Results
 * keep input order. The first rejection rejects the whole call, so callers
 * that need per-item outcomes catch inside `task`.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  task: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const pending = items.entries();
  const laneCount = Math.max(1, Math.min(Math.floor(limit), items.length));

  // lanes share one iterator, so each entry is taken exactly once
  const lanes = Array.from({ length: laneCount }, async () => {
    for (const [index, item] of pending) {
      results[index] = await task(item, index);
    }
  });

  await Promise.all(lanes);
  return results;
}
