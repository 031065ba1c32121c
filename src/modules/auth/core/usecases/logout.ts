/**
 * Logout Use Case
 *
 * Revokes a token by deleting its session record. Signature-valid tokens
 * without a record are rejected by the session auth provider.
 */

import type { AuthError } from '../errors.js';
import type { SessionRepository } from '../ports.js';
import type { Result } from 'neverthrow';

export interface LogoutDeps {
  sessionRepo: SessionRepository;
}

export const logout = async (
  deps: LogoutDeps,
  input: { token: string }
): Promise<Result<void, AuthError>> => {
  return deps.sessionRepo.deleteByToken(input.token);
};
