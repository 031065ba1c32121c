/**
 * Require Auth Use Case
 *
 * Gate for owner-only operations.
 */

import { ok, err, type Result } from 'neverthrow';

import { createAuthenticationRequiredError, type AuthError } from '../errors.js';
import { isAuthenticated, type RequestAuth, type UserId } from '../types.js';

/**
 * Returns the caller's user ID. For anonymous callers the error is the
 * reason their token was rejected, if they sent one.
 */
export function requireAuth(auth: RequestAuth): Result<UserId, AuthError> {
  if (isAuthenticated(auth.context)) {
    return ok(auth.context.userId);
  }
  return err(auth.rejection ?? createAuthenticationRequiredError());
}
