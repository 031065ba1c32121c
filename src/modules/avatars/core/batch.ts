/**
 * Runs `task` over `items` at most `size` at a time.
 * Results keep the order of `items`.
 */
export const mapInBatches = async <T, R>(
  items: readonly T[],
  size: number,
  task: (item: T, index: number) => Promise<R>
): Promise<R[]> => {
  const results: R[] = [];

  for (let i = 0; i < items.length; i += size) {
    const batch = items.slice(i, i + size);
    const batchResults = await Promise.all(batch.map((item, offset) => task(item, i + offset)));
    results.push(...batchResults);
  }

  return results;
};
