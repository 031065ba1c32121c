/**
 * Update Frogol Use Case
 */

import { ok, err, type Result } from 'neverthrow';

import { createFrogolNotFoundError, type FrogolError } from '../errors.js';

import type { FrogolRepository } from '../ports.js';
import type { Frogol, UpdateFrogolInput } from '../types.js';

export interface UpdateFrogolDeps {
  frogolRepo: FrogolRepository;
}

/**
 * Updates display name and theme. Avatar URL and bio change only when given.
 */
export const updateFrogol = async (
  deps: UpdateFrogolDeps,
  input: UpdateFrogolInput & { id: string }
): Promise<Result<Frogol, FrogolError>> => {
  const { id, ...changes } = input;

  const result = await deps.frogolRepo.update(id, changes);
  if (result.isErr()) {
    return err(result.error);
  }
  if (result.value === null) {
    return err(createFrogolNotFoundError(id));
  }

  return ok(result.value);
};
