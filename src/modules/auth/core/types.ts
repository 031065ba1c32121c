/**
 * Authentication Module - Domain Types
 *
 * Users, sessions and the per-request authentication context.
 */

import type { AuthError } from './errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Branded Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Branded type for user identifiers.
 * Carried as the `sub` claim of session tokens.
 */
// eslint-disable-next-line @typescript-eslint/naming-convention -- __brand is the standard pattern for branded types in TypeScript
export type UserId = string & { readonly __brand: unique symbol };

/**
 * Type-safe constructor for UserId.
 */
export const toUserId = (id: string): UserId => id as UserId;

// ─────────────────────────────────────────────────────────────────────────────
// Account Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A registered account.
 */
export interface User {
  readonly id: UserId;
  readonly email: string;
  /** scrypt hash; null for accounts that cannot log in with a password */
  readonly passwordHash: string | null;
  readonly isActive: boolean;
  readonly createdAt: Date;
}

/**
 * Server-side record of an issued token. Deleting it revokes the token.
 */
export interface SessionRecord {
  readonly id: string;
  readonly userId: UserId;
  readonly token: string;
  readonly expiresAt: Date;
}

/**
 * Issued on login.
 */
export interface IssuedSession {
  readonly token: string;
  readonly userId: UserId;
  readonly expiresAt: Date;
}

// ─────────────────────────────────────────────────────────────────────────────
// Session Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Authenticated session.
 * Created after successful token verification.
 */
export interface AuthSession {
  readonly userId: UserId;
  /** Token expiration time */
  readonly expiresAt: Date;
}

/**
 * Anonymous session for unauthenticated requests.
 */
export interface AnonymousSession {
  /** No user identifier */
  readonly userId: null;
  /** Discriminator field */
  readonly isAnonymous: true;
}

/**
 * Authentication context available to all handlers.
 * Either authenticated or anonymous.
 */
export type AuthContext = AuthSession | AnonymousSession;

/**
 * Outcome of resolving a request's token.
 */
export interface RequestAuth {
  readonly context: AuthContext;
  /** Why a presented token was rejected; null when none was rejected */
  readonly rejection: AuthError | null;
}

// ─────────────────────────────────────────────────────────────────────────────
// Type Guards
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Check if context represents an authenticated session.
 */
export const isAuthenticated = (ctx: AuthContext): ctx is AuthSession => {
  return ctx.userId !== null;
};

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Default anonymous session.
 */
export const ANONYMOUS_SESSION: AnonymousSession = {
  userId: null,
  isAnonymous: true,
} as const;

/** Authorization header name (lowercase for HTTP headers) */
export const AUTH_HEADER = 'authorization' as const;

/** Bearer token prefix */
export const BEARER_PREFIX = 'Bearer ' as const;

/** Cookie carrying the session token for browser clients */
export const SESSION_COOKIE_NAME = 'auth_token' as const;

/** Minimum accepted password length on registration */
export const MIN_PASSWORD_LENGTH = 8;
