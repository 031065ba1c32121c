/**
 * Get Frogol Use Cases
 *
 * Lookups by slug and id, and the owner-scoped lookup used by protected routes.
 */

import { ok, err, type Result } from 'neverthrow';

import { createFrogolNotFoundError, type FrogolError } from '../errors.js';

import type { FrogolRepository } from '../ports.js';
import type { Frogol } from '../types.js';

export interface GetFrogolDeps {
  frogolRepo: FrogolRepository;
}

/**
 * Finds a profile by slug.
 */
export const getFrogolBySlug = async (
  deps: GetFrogolDeps,
  input: { slug: string }
): Promise<Result<Frogol, FrogolError>> => {
  const result = await deps.frogolRepo.getBySlug(input.slug);
  if (result.isErr()) {
    return err(result.error);
  }
  if (result.value === null) {
    return err(createFrogolNotFoundError(input.slug));
  }
  return ok(result.value);
};

/**
 * Finds a profile by id.
 */
export const getFrogolById = async (
  deps: GetFrogolDeps,
  input: { id: string }
): Promise<Result<Frogol, FrogolError>> => {
  const result = await deps.frogolRepo.getById(input.id);
  if (result.isErr()) {
    return err(result.error);
  }
  if (result.value === null) {
    return err(createFrogolNotFoundError(input.id));
  }
  return ok(result.value);
};

/**
 * Finds a profile owned by the given user.
 * Profiles of other users are reported as not found.
 */
export const getOwnedFrogol = async (
  deps: GetFrogolDeps,
  input: { id: string; userId: string }
): Promise<Result<Frogol, FrogolError>> => {
  const result = await getFrogolById(deps, { id: input.id });
  if (result.isErr()) {
    return err(result.error);
  }
  if (result.value.userId !== input.userId) {
    return err(createFrogolNotFoundError(input.id));
  }
  return ok(result.value);
};
