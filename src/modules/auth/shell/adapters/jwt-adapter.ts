/**
 * JWT Session Adapter
 *
 * HS256 session tokens signed and verified with `jose`. A token is only
 * accepted while its session record exists, so logging out revokes it
 * before the `exp` claim is reached.
 */

import { randomUUID } from 'crypto';

import { SignJWT, errors as joseErrors, jwtVerify } from 'jose';
import { ok, err, type Result } from 'neverthrow';

import {
  createAccountDisabledError,
  createAuthProviderError,
  createInvalidTokenError,
  createSessionRevokedError,
  createTokenExpiredError,
  createTokenSignatureError,
  type AuthError,
} from '../../core/errors.js';
import { toUserId, type AuthSession, type UserId } from '../../core/types.js';

import type {
  AuthProvider,
  SessionRepository,
  SignedToken,
  TokenSigner,
  UserRepository,
} from '../../core/ports.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

const ALGORITHM = 'HS256';

export interface MakeJwtTokenSignerOptions {
  /** HMAC secret shared with the verifier */
  secret: string;
  /** Token and session lifetime */
  ttlHours: number;
  /** Clock override for tests */
  now?: () => Date;
}

export interface MakeSessionAuthProviderOptions {
  secret: string;
  sessionRepo: SessionRepository;
  userRepo: UserRepository;
  logger: Logger;
  /**
   * Clock tolerance in seconds for expiration checks.
   * @default 5
   */
  clockToleranceSeconds?: number;
  /** Clock override for tests */
  now?: () => Date;
}

const encodeSecret = (secret: string): Uint8Array => new TextEncoder().encode(secret);

// ─────────────────────────────────────────────────────────────────────────────
// Token Signer
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates a signer for session tokens (`sub` = user id, unique `jti`).
 */
export const makeJwtTokenSigner = (options: MakeJwtTokenSignerOptions): TokenSigner => {
  const key = encodeSecret(options.secret);
  const now = options.now ?? (() => new Date());
  const ttlSeconds = Math.round(options.ttlHours * 60 * 60);

  return {
    async sign(userId: UserId): Promise<Result<SignedToken, AuthError>> {
      const issuedAt = Math.floor(now().getTime() / 1000);
      const expiresAtSeconds = issuedAt + ttlSeconds;

      try {
        const token = await new SignJWT({})
          .setProtectedHeader({ alg: ALGORITHM })
          .setSubject(userId)
          .setJti(randomUUID())
          .setIssuedAt(issuedAt)
          .setExpirationTime(expiresAtSeconds)
          .sign(key);

        return ok({ token, expiresAt: new Date(expiresAtSeconds * 1000) });
      } catch (error) {
        return err(createAuthProviderError('Failed to sign session token', error));
      }
    },
  };
};

// ─────────────────────────────────────────────────────────────────────────────
// Auth Provider
// ─────────────────────────────────────────────────────────────────────────────

const mapJoseError = (error: unknown): AuthError => {
  if (error instanceof joseErrors.JWTExpired) {
    return createTokenExpiredError(new Date());
  }
  if (error instanceof joseErrors.JWSSignatureVerificationFailed) {
    return createTokenSignatureError('Token signature verification failed');
  }
  if (error instanceof joseErrors.JOSEError) {
    return createInvalidTokenError(error.message, error);
  }
  return createInvalidTokenError('Token verification failed', error);
};

/**
 * Creates an AuthProvider that checks the signature, the session record and
 * the account state.
 */
export const makeSessionAuthProvider = (options: MakeSessionAuthProviderOptions): AuthProvider => {
  const { sessionRepo, userRepo, clockToleranceSeconds = 5 } = options;
  const key = encodeSecret(options.secret);
  const now = options.now ?? (() => new Date());
  const log = options.logger.child({ adapter: 'SessionAuthProvider' });

  return {
    async verifyToken(token: string): Promise<Result<AuthSession, AuthError>> {
      let subject: string | undefined;
      try {
        const { payload } = await jwtVerify(token, key, {
          algorithms: [ALGORITHM],
          clockTolerance: clockToleranceSeconds,
          currentDate: now(),
        });
        subject = payload.sub;
      } catch (error) {
        const mapped = mapJoseError(error);
        log.debug({ reason: mapped.type }, 'Rejected session token');
        return err(mapped);
      }

      if (subject === undefined || subject === '') {
        return err(createInvalidTokenError('Token missing subject (sub) claim'));
      }

      const sessionResult = await sessionRepo.getByToken(token);
      if (sessionResult.isErr()) {
        return err(sessionResult.error);
      }
      const session = sessionResult.value;
      if (session === null || session.expiresAt.getTime() <= now().getTime()) {
        return err(createSessionRevokedError());
      }

      const userResult = await userRepo.getById(subject);
      if (userResult.isErr()) {
        return err(userResult.error);
      }
      const user = userResult.value;
      if (user === null) {
        return err(createInvalidTokenError('Token subject does not exist'));
      }
      if (!user.isActive) {
        return err(createAccountDisabledError());
      }

      return ok({ userId: toUserId(subject), expiresAt: session.expiresAt });
    },
  };
};

