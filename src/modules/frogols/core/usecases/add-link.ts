/**
 * Add Link Use Case
 *
 * Appends a link at the end of a profile's list.
 */

import { ok, err, type Result } from 'neverthrow';

import { createInvalidInputError, type FrogolError } from '../errors.js';
import { normalizeUrl } from '../url.js';

import type { LinkRepository } from '../ports.js';
import type { Link } from '../types.js';

export interface AddLinkDeps {
  linkRepo: LinkRepository;
}

export interface AddLinkInput {
  frogolId: string;
  url: string;
  label: string;
}

/**
 * Adds a link.
 *
 * Flow:
 * 1. Reject a blank URL or label
 * 2. Normalize the URL
 * 3. Take the next free sort order and insert as an active link
 */
export const addLink = async (
  deps: AddLinkDeps,
  input: AddLinkInput
): Promise<Result<Link, FrogolError>> => {
  const { linkRepo } = deps;

  const label = input.label.trim();
  if (input.url.trim() === '') {
    return err(createInvalidInputError('url', 'URL is required'));
  }
  if (label === '') {
    return err(createInvalidInputError('label', 'Label is required'));
  }

  const orderResult = await linkRepo.nextSortOrder(input.frogolId);
  if (orderResult.isErr()) {
    return err(orderResult.error);
  }

  const createResult = await linkRepo.create({
    frogolId: input.frogolId,
    url: normalizeUrl(input.url),
    label,
    sortOrder: orderResult.value,
  });
  if (createResult.isErr()) {
    return err(createResult.error);
  }

  return ok(createResult.value);
};
