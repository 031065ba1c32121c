/**
 * Tests for resolving request tokens and gating owner-only operations.
 */

import { describe, expect, it } from 'vitest';

import {
  ANONYMOUS_SESSION,
  authenticate,
  createTestAuthProvider,
  createTokenExpiredError,
  requireAuth,
  toUserId,
} from '@/modules/auth/index.js';

describe('authenticate', () => {
  const { provider, tokens, userIds } = createTestAuthProvider();

  it('resolves a missing token to the anonymous session', async () => {
    const auth = await authenticate({ authProvider: provider }, { token: null });

    expect(auth).toEqual({ context: ANONYMOUS_SESSION, rejection: null });
  });

  it('treats an empty token as missing', async () => {
    const auth = await authenticate({ authProvider: provider }, { token: '' });

    expect(auth.rejection).toBeNull();
    expect(auth.context).toEqual(ANONYMOUS_SESSION);
  });

  it('returns the session for a valid token', async () => {
    const auth = await authenticate({ authProvider: provider }, { token: tokens.alice });

    expect(auth.rejection).toBeNull();
    expect(auth.context.userId).toBe(userIds.alice);
  });

  it('keeps the rejection of an expired token and stays anonymous', async () => {
    const auth = await authenticate({ authProvider: provider }, { token: tokens.expired });

    expect(auth.context).toEqual(ANONYMOUS_SESSION);
    expect(auth.rejection?.type).toBe('TokenExpiredError');
  });

  it('rejects unknown tokens with InvalidTokenError', async () => {
    const auth = await authenticate({ authProvider: provider }, { token: 'token-unknown' });

    expect(auth.rejection?.type).toBe('InvalidTokenError');
    expect(auth.rejection?.message).toBe('Invalid or unknown token');
  });
});

describe('requireAuth', () => {
  it('returns the user id of an authenticated session', () => {
    const result = requireAuth({
      context: { userId: toUserId('user-alice'), expiresAt: new Date() },
      rejection: null,
    });

    expect(result._unsafeUnwrap()).toBe('user-alice');
  });

  it('returns AuthenticationRequiredError when no token was sent', () => {
    const result = requireAuth({ context: ANONYMOUS_SESSION, rejection: null });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.type).toBe('AuthenticationRequiredError');
      expect(result.error.message).toBe('Authentication required');
    }
  });

  it('reports why a presented token was rejected', () => {
    const expiredAt = new Date('2024-01-01T00:00:00.000Z');
    const result = requireAuth({
      context: ANONYMOUS_SESSION,
      rejection: createTokenExpiredError(expiredAt),
    });

    expect(result._unsafeUnwrapErr()).toEqual({
      type: 'TokenExpiredError',
      message: 'Token expired at 2024-01-01T00:00:00.000Z',
      expiredAt,
    });
  });
});
