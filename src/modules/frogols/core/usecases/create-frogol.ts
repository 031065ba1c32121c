/**
 * Create Frogol Use Case
 *
 * Creates a profile for a user under a normalized, unique slug.
 */

import { ok, err, type Result } from 'neverthrow';

import { createSlugTakenError, type FrogolError } from '../errors.js';
import { normalizeSlug } from '../slug.js';

import type { FrogolRepository } from '../ports.js';
import type { Frogol } from '../types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface CreateFrogolDeps {
  frogolRepo: FrogolRepository;
}

export interface CreateFrogolInput {
  userId: string;
  /** Raw slug as typed by the user */
  slug: string;
  displayName: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Use Case
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates a profile.
 *
 * Flow:
 * 1. Normalize the slug (InvalidInputError on empty or reserved)
 * 2. Look the slug up; an existing profile means SlugTakenError
 * 3. Insert. The store's unique constraint still applies, so a concurrent
 *    insert of the same slug also ends as SlugTakenError.
 */
export const createFrogol = async (
  deps: CreateFrogolDeps,
  input: CreateFrogolInput
): Promise<Result<Frogol, FrogolError>> => {
  const { frogolRepo } = deps;

  const slugResult = normalizeSlug(input.slug);
  if (slugResult.isErr()) {
    return err(slugResult.error);
  }
  const slug = slugResult.value;

  const existingResult = await frogolRepo.getBySlug(slug);
  if (existingResult.isErr()) {
    return err(existingResult.error);
  }
  if (existingResult.value !== null) {
    return err(createSlugTakenError(slug));
  }

  const displayName = input.displayName.trim();

  const createResult = await frogolRepo.create({
    userId: input.userId,
    slug,
    displayName: displayName !== '' ? displayName : null,
  });
  if (createResult.isErr()) {
    return err(createResult.error);
  }

  return ok(createResult.value);
};
