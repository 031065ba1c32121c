/**
 * Authentication Module - Port Interfaces
 *
 * Core depends only on these interfaces, never on concrete implementations.
 */

import type { AuthError } from './errors.js';
import type { AuthSession, SessionRecord, User, UserId } from './types.js';
import type { Result } from 'neverthrow';

// ─────────────────────────────────────────────────────────────────────────────
// Auth Provider Port
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Verifies bearer tokens.
 */
export interface AuthProvider {
  /**
   * Verify a bearer token and extract session information.
   *
   * @param token - Raw bearer token (without 'Bearer ' prefix)
   *
   * MUST:
   * - Validate token signature
   * - Check expiration
   * - Extract user ID from `sub` claim
   *
   * MUST NOT:
   * - Throw exceptions (return Result.err instead)
   *
   * Possible errors:
   * - InvalidTokenError: Token is malformed
   * - TokenExpiredError: Token has expired
   * - TokenSignatureError: Signature verification failed
   * - SessionRevokedError: No live session record for the token
   * - AccountDisabledError: The user was disabled after login
   * - AuthProviderError: Session lookup failed
   */
  verifyToken(token: string): Promise<Result<AuthSession, AuthError>>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Token Signer Port
// ─────────────────────────────────────────────────────────────────────────────

export interface SignedToken {
  token: string;
  expiresAt: Date;
}

/**
 * Issues signed session tokens.
 */
export interface TokenSigner {
  sign(userId: UserId): Promise<Result<SignedToken, AuthError>>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Password Hasher Port
// ─────────────────────────────────────────────────────────────────────────────

export interface PasswordHasher {
  hash(password: string): Promise<string>;
  /** Never throws for a malformed hash; returns false instead */
  verify(password: string, hash: string): Promise<boolean>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Repositories
// ─────────────────────────────────────────────────────────────────────────────

export interface UserRepository {
  /** UserExistsError when the email is already registered */
  create(input: { email: string; passwordHash: string }): Promise<Result<User, AuthError>>;
  getByEmail(email: string): Promise<Result<User | null, AuthError>>;
  getById(id: string): Promise<Result<User | null, AuthError>>;
}

export interface SessionRepository {
  create(input: {
    userId: UserId;
    token: string;
    expiresAt: Date;
  }): Promise<Result<SessionRecord, AuthError>>;
  getByToken(token: string): Promise<Result<SessionRecord | null, AuthError>>;
  /** Removing an unknown token is not an error */
  deleteByToken(token: string): Promise<Result<void, AuthError>>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Session Extractor Port
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Extracts bearer token from transport-specific request.
 *
 * @template T - Transport-specific request type
 */
export interface SessionExtractor<T> {
  /**
   * Extract bearer token from request.
   *
   * @param request - Transport-specific request object
   * @returns Token string if present, null if absent
   *
   * MUST:
   * - Return null for missing token (not error)
   * - Strip 'Bearer ' prefix if present
   * - Trim whitespace
   *
   * MUST NOT:
   * - Validate token (that's AuthProvider's job)
   * - Throw exceptions
   */
  extractToken(request: T): string | null;
}
