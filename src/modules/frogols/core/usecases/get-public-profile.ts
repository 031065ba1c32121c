/**
 * Get Public Profile Use Case
 *
 * Loads what a visitor sees: the profile and its active links in display order.
 */

import { ok, err, type Result } from 'neverthrow';

import { getFrogolBySlug } from './get-frogol.js';

import type { FrogolError } from '../errors.js';
import type { FrogolRepository, LinkRepository } from '../ports.js';
import type { Frogol, Link } from '../types.js';

export interface GetPublicProfileDeps {
  frogolRepo: FrogolRepository;
  linkRepo: LinkRepository;
}

export interface PublicProfile {
  frogol: Frogol;
  links: Link[];
}

export const getPublicProfile = async (
  deps: GetPublicProfileDeps,
  input: { slug: string }
): Promise<Result<PublicProfile, FrogolError>> => {
  const frogolResult = await getFrogolBySlug(deps, input);
  if (frogolResult.isErr()) {
    return err(frogolResult.error);
  }

  const linksResult = await deps.linkRepo.listActive(frogolResult.value.id);
  if (linksResult.isErr()) {
    return err(linksResult.error);
  }

  return ok({ frogol: frogolResult.value, links: linksResult.value });
};
