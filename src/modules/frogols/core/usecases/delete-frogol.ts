/**
 * Delete Frogol Use Case
 */

import { ok, err, type Result } from 'neverthrow';

import { createFrogolNotFoundError, type FrogolError } from '../errors.js';

import type { FrogolRepository } from '../ports.js';

export interface DeleteFrogolDeps {
  frogolRepo: FrogolRepository;
}

/**
 * Deletes a profile together with its links, clicks and leads.
 */
export const deleteFrogol = async (
  deps: DeleteFrogolDeps,
  input: { id: string }
): Promise<Result<void, FrogolError>> => {
  const result = await deps.frogolRepo.delete(input.id);
  if (result.isErr()) {
    return err(result.error);
  }
  if (!result.value) {
    return err(createFrogolNotFoundError(input.id));
  }
  return ok(undefined);
};
