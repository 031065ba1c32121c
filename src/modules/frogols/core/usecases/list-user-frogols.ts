/**
 * List User Frogols Use Case
 */

import type { FrogolError } from '../errors.js';
import type { FrogolRepository } from '../ports.js';
import type { FrogolSummary } from '../types.js';
import type { Result } from 'neverthrow';

export interface ListUserFrogolsDeps {
  frogolRepo: FrogolRepository;
}

/**
 * Lists the user's profiles with their counts, newest first.
 */
export const listUserFrogols = async (
  deps: ListUserFrogolsDeps,
  input: { userId: string }
): Promise<Result<FrogolSummary[], FrogolError>> => {
  return deps.frogolRepo.listSummariesForUser(input.userId);
};
