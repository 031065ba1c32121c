/**
 * Link order resolution.
 *
 * Merges a client-supplied partial ordering into the full set of a
 * profile's active links. The index of each id in the result is its new
 * `sort_order`.
 */

/**
 * Resolves the complete order of a profile's active links.
 *
 * Requested ids come first (first occurrence wins, ids that are not among
 * `existingActiveIds` are dropped), followed by the untouched links in their
 * stored order.
 *
 * @example
 * resolveLinkOrder(['C', 'A'], ['A', 'B', 'C']); // ['C', 'A', 'B']
 * resolveLinkOrder(['A', 'A', 'B'], ['A', 'B', 'C']); // ['A', 'B', 'C']
 */
export const resolveLinkOrder = (
  requestedIds: readonly string[],
  existingActiveIds: readonly string[]
): string[] => {
  const known = new Set(existingActiveIds);
  const placed = new Set<string>();
  const order: string[] = [];

  const place = (id: string): void => {
    if (known.has(id) && !placed.has(id)) {
      placed.add(id);
      order.push(id);
    }
  };

  requestedIds.forEach(place);
  existingActiveIds.forEach(place);

  return order;
};
