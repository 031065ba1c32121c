/**
 * Track Click Use Case
 *
 * Records a visit of a link and returns the link so the caller can redirect.
 */

import { ok, err, type Result } from 'neverthrow';

import { getLink } from './manage-links.js';

import type { FrogolError } from '../errors.js';
import type { ClickRepository, LinkRepository } from '../ports.js';
import type { Link } from '../types.js';

export interface TrackClickDeps {
  linkRepo: LinkRepository;
  clickRepo: ClickRepository;
}

export interface TrackClickInput {
  linkId: string;
  ipAddress?: string;
  userAgent?: string;
}

export const trackClick = async (
  deps: TrackClickDeps,
  input: TrackClickInput
): Promise<Result<Link, FrogolError>> => {
  const linkResult = await getLink(deps, { id: input.linkId });
  if (linkResult.isErr()) {
    return err(linkResult.error);
  }

  const recordResult = await deps.clickRepo.record({
    linkId: input.linkId,
    ipAddress: input.ipAddress ?? null,
    userAgent: input.userAgent ?? null,
  });
  if (recordResult.isErr()) {
    return err(recordResult.error);
  }

  return ok(linkResult.value);
};
