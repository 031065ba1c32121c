/**
 * Authenticate Use Case
 *
 * Resolves the session token of a request into an auth context.
 */

import { ANONYMOUS_SESSION, type RequestAuth } from '../types.js';

import type { AuthProvider } from '../ports.js';

export interface AuthenticateDeps {
  authProvider: AuthProvider;
}

export interface AuthenticateInput {
  /** Token from the Authorization header or the session cookie */
  token: string | null;
}

/**
 * Never fails: a missing token and a rejected token both resolve to the
 * anonymous session. A rejected token keeps its error in `rejection` so
 * protected routes can report it while public routes stay reachable.
 *
 * @example
 * const { context, rejection } = await authenticate({ authProvider }, { token });
 */
export async function authenticate(
  deps: AuthenticateDeps,
  input: AuthenticateInput
): Promise<RequestAuth> {
  if (input.token === null || input.token === '') {
    return { context: ANONYMOUS_SESSION, rejection: null };
  }

  const verified = await deps.authProvider.verifyToken(input.token);

  return verified.match<RequestAuth>(
    (session) => ({ context: session, rejection: null }),
    (error) => ({ context: ANONYMOUS_SESSION, rejection: error })
  );
}
