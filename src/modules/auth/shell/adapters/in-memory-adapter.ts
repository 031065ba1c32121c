/**
 * In-Memory Authentication Adapter
 *
 * AuthProvider over a fixed token table, for tests and local tooling that run
 * without a database.
 */

import { ok, err, type Result } from 'neverthrow';

import {
  createInvalidTokenError,
  createSessionRevokedError,
  createTokenExpiredError,
  type AuthError,
} from '../../core/errors.js';
import { toUserId, type AuthSession } from '../../core/types.js';

import type { AuthProvider } from '../../core/ports.js';

export interface MakeInMemoryAuthProviderOptions {
  /** Token → user id */
  validTokens?: Map<string, string>;
  /** Tokens whose signature is fine but whose expiry has passed */
  expiredTokens?: Set<string>;
  /** Tokens whose session was logged out */
  revokedTokens?: Set<string>;
  /** Lifetime reported for valid tokens. Default: 24 hours */
  sessionTtlMs?: number;
}

const DEFAULT_SESSION_TTL_MS = 24 * 60 * 60 * 1000;

/**
 * @example
 * const authProvider = makeInMemoryAuthProvider({
 *   validTokens: new Map([['token-alice', 'user-alice']]),
 * });
 * await authProvider.verifyToken('token-alice'); // ok({ userId: 'user-alice', ... })
 */
export const makeInMemoryAuthProvider = (
  options: MakeInMemoryAuthProviderOptions = {}
): AuthProvider => {
  const tokens = options.validTokens ?? new Map<string, string>();
  const expiredTokens = options.expiredTokens ?? new Set<string>();
  const revokedTokens = options.revokedTokens ?? new Set<string>();
  const ttlMs = options.sessionTtlMs ?? DEFAULT_SESSION_TTL_MS;

  return {
    verifyToken(token: string): Promise<Result<AuthSession, AuthError>> {
      if (expiredTokens.has(token)) {
        return Promise.resolve(err(createTokenExpiredError(new Date(Date.now() - 1000))));
      }
      if (revokedTokens.has(token)) {
        return Promise.resolve(err(createSessionRevokedError()));
      }

      const userId = tokens.get(token);
      if (userId === undefined) {
        return Promise.resolve(err(createInvalidTokenError('Invalid or unknown token')));
      }

      return Promise.resolve(
        ok({ userId: toUserId(userId), expiresAt: new Date(Date.now() + ttlMs) })
      );
    },
  };
};

/**
 * Provider with two users and one expired token, shared by route tests.
 */
export const createTestAuthProvider = () => {
  const userIds = { alice: 'user-alice', bob: 'user-bob' };
  const tokens = { alice: 'token-alice', bob: 'token-bob', expired: 'token-expired' };

  const provider = makeInMemoryAuthProvider({
    validTokens: new Map([
      [tokens.alice, userIds.alice],
      [tokens.bob, userIds.bob],
    ]),
    expiredTokens: new Set([tokens.expired]),
  });

  return { provider, tokens, userIds };
};
