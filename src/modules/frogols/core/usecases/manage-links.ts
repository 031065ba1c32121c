/**
 * Link Management Use Cases
 *
 * Lookups and edits of single links. Owner checks go through the link's profile.
 */

import { ok, err, type Result } from 'neverthrow';

import { getOwnedFrogol } from './get-frogol.js';
import {
  createInvalidInputError,
  createLinkNotFoundError,
  type FrogolError,
} from '../errors.js';
import { normalizeUrl } from '../url.js';

import type { FrogolRepository, LinkRepository } from '../ports.js';
import type { Link } from '../types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface LinkDeps {
  linkRepo: LinkRepository;
}

export interface OwnedLinkDeps extends LinkDeps {
  frogolRepo: FrogolRepository;
}

// ─────────────────────────────────────────────────────────────────────────────
// Queries
// ─────────────────────────────────────────────────────────────────────────────

export const getLink = async (
  deps: LinkDeps,
  input: { id: string }
): Promise<Result<Link, FrogolError>> => {
  const result = await deps.linkRepo.getById(input.id);
  if (result.isErr()) {
    return err(result.error);
  }
  if (result.value === null) {
    return err(createLinkNotFoundError(input.id));
  }
  return ok(result.value);
};

/**
 * Finds a link whose profile belongs to the user.
 * Links of other users' profiles are reported as not found.
 */
export const getOwnedLink = async (
  deps: OwnedLinkDeps,
  input: { id: string; userId: string }
): Promise<Result<Link, FrogolError>> => {
  const linkResult = await getLink(deps, input);
  if (linkResult.isErr()) {
    return err(linkResult.error);
  }

  const frogolResult = await getOwnedFrogol(deps, {
    id: linkResult.value.frogolId,
    userId: input.userId,
  });
  if (frogolResult.isErr()) {
    return err(
      frogolResult.error.type === 'FrogolNotFoundError'
        ? createLinkNotFoundError(input.id)
        : frogolResult.error
    );
  }

  return ok(linkResult.value);
};

/**
 * Lists a profile's links in display order; inactive links only when asked.
 */
export const listLinks = async (
  deps: LinkDeps,
  input: { frogolId: string; includeInactive: boolean }
): Promise<Result<Link[], FrogolError>> => {
  return input.includeInactive
    ? deps.linkRepo.listAll(input.frogolId)
    : deps.linkRepo.listActive(input.frogolId);
};

// ─────────────────────────────────────────────────────────────────────────────
// Commands
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Replaces URL and label. The URL is normalized like on creation.
 */
export const updateLink = async (
  deps: LinkDeps,
  input: { id: string; url: string; label: string }
): Promise<Result<Link, FrogolError>> => {
  const label = input.label.trim();
  if (input.url.trim() === '') {
    return err(createInvalidInputError('url', 'URL is required'));
  }
  if (label === '') {
    return err(createInvalidInputError('label', 'Label is required'));
  }

  const result = await deps.linkRepo.update(input.id, { url: normalizeUrl(input.url), label });
  if (result.isErr()) {
    return err(result.error);
  }
  if (result.value === null) {
    return err(createLinkNotFoundError(input.id));
  }
  return ok(result.value);
};

export const setLinkActive = async (
  deps: LinkDeps,
  input: { id: string; isActive: boolean }
): Promise<Result<Link, FrogolError>> => {
  const result = await deps.linkRepo.setActive(input.id, input.isActive);
  if (result.isErr()) {
    return err(result.error);
  }
  if (result.value === null) {
    return err(createLinkNotFoundError(input.id));
  }
  return ok(result.value);
};

export const deleteLink = async (
  deps: LinkDeps,
  input: { id: string }
): Promise<Result<void, FrogolError>> => {
  const result = await deps.linkRepo.delete(input.id);
  if (result.isErr()) {
    return err(result.error);
  }
  if (!result.value) {
    return err(createLinkNotFoundError(input.id));
  }
  return ok(undefined);
};
