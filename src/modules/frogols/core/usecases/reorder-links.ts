/**
 * Reorder Links Use Case
 *
 * Applies a client-supplied order to a profile's active links.
 */

import { ok, err, type Result } from 'neverthrow';

import { createLinkNotFoundError, type FrogolError } from '../errors.js';
import { resolveLinkOrder } from '../link-order.js';

import type { LinkRepository } from '../ports.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface ReorderLinksDeps {
  linkRepo: LinkRepository;
}

export interface ReorderLinksInput {
  linkIds: readonly string[];
}

export interface ReorderLinksResult {
  /** Profile whose links were reordered, null for an empty request */
  frogolId: string | null;
  /** Final order; the index is the stored sort order */
  orderedIds: string[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Use Case
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Reorders links.
 *
 * Flow:
 * 1. Empty request: nothing to do, the store is not touched
 * 2. The first id selects the profile; ids of other profiles are dropped
 * 3. Merge the request with the profile's active links in stored order
 * 4. Persist every sort order in one transaction
 */
export const reorderLinks = async (
  deps: ReorderLinksDeps,
  input: ReorderLinksInput
): Promise<Result<ReorderLinksResult, FrogolError>> => {
  const { linkRepo } = deps;
  const [firstId] = input.linkIds;

  if (firstId === undefined) {
    return ok({ frogolId: null, orderedIds: [] });
  }

  const firstResult = await linkRepo.getById(firstId);
  if (firstResult.isErr()) {
    return err(firstResult.error);
  }
  if (firstResult.value === null) {
    return err(createLinkNotFoundError(firstId));
  }
  const { frogolId } = firstResult.value;

  const activeResult = await linkRepo.listActive(frogolId);
  if (activeResult.isErr()) {
    return err(activeResult.error);
  }

  const orderedIds = resolveLinkOrder(
    input.linkIds,
    activeResult.value.map((link) => link.id)
  );

  const saveResult = await linkRepo.reassignSortOrders(frogolId, orderedIds);
  if (saveResult.isErr()) {
    return err(saveResult.error);
  }

  return ok({ frogolId, orderedIds });
};
