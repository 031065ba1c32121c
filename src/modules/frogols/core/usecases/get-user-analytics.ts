/**
 * Get User Analytics Use Case
 */

import type { FrogolError } from '../errors.js';
import type { FrogolRepository } from '../ports.js';
import type { UserAnalytics } from '../types.js';
import type { Result } from 'neverthrow';

export interface GetUserAnalyticsDeps {
  frogolRepo: FrogolRepository;
}

/**
 * Totals across all of the user's profiles plus the five best performers.
 */
export const getUserAnalytics = async (
  deps: GetUserAnalyticsDeps,
  input: { userId: string }
): Promise<Result<UserAnalytics, FrogolError>> => {
  return deps.frogolRepo.getUserAnalytics(input.userId);
};
