/**
 * Authentication Module - Domain Errors
 *
 * All authentication errors are discriminated unions with a 'type' field.
 * Follows neverthrow Result pattern - no thrown exceptions in core.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Token Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Token is malformed or invalid.
 */
export interface InvalidTokenError {
  readonly type: 'InvalidTokenError';
  readonly message: string;
  readonly cause?: unknown;
}

/**
 * Token has expired.
 */
export interface TokenExpiredError {
  readonly type: 'TokenExpiredError';
  readonly message: string;
  readonly expiredAt: Date;
}

/**
 * Token signature verification failed.
 */
export interface TokenSignatureError {
  readonly type: 'TokenSignatureError';
  readonly message: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Authorization Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Authentication required but not provided.
 */
export interface AuthenticationRequiredError {
  readonly type: 'AuthenticationRequiredError';
  readonly message: string;
}

/**
 * Session record is missing (logged out) or past its expiry.
 */
export interface SessionRevokedError {
  readonly type: 'SessionRevokedError';
  readonly message: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Account Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Unknown email or wrong password. Both cases share one message.
 */
export interface InvalidCredentialsError {
  readonly type: 'InvalidCredentialsError';
  readonly message: string;
}

export interface AccountDisabledError {
  readonly type: 'AccountDisabledError';
  readonly message: string;
}

export interface UserExistsError {
  readonly type: 'UserExistsError';
  readonly message: string;
  readonly email: string;
}

/**
 * Malformed registration input.
 */
export interface InvalidInputError {
  readonly type: 'InvalidInputError';
  readonly message: string;
  readonly field: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Infrastructure Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Token signing, hashing or session storage failed.
 */
export interface AuthProviderError {
  readonly type: 'AuthProviderError';
  readonly message: string;
  readonly retryable: boolean;
  readonly cause?: unknown;
}

// ─────────────────────────────────────────────────────────────────────────────
// Error Union
// ─────────────────────────────────────────────────────────────────────────────

/**
 * All possible authentication errors.
 */
export type AuthError =
  | InvalidTokenError
  | TokenExpiredError
  | TokenSignatureError
  | AuthenticationRequiredError
  | SessionRevokedError
  | InvalidCredentialsError
  | AccountDisabledError
  | UserExistsError
  | InvalidInputError
  | AuthProviderError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates an InvalidTokenError.
 */
export const createInvalidTokenError = (message: string, cause?: unknown): InvalidTokenError => ({
  type: 'InvalidTokenError',
  message,
  cause,
});

/**
 * Creates a TokenExpiredError.
 */
export const createTokenExpiredError = (expiredAt: Date): TokenExpiredError => ({
  type: 'TokenExpiredError',
  message: `Token expired at ${expiredAt.toISOString()}`,
  expiredAt,
});

/**
 * Creates a TokenSignatureError.
 */
export const createTokenSignatureError = (message: string): TokenSignatureError => ({
  type: 'TokenSignatureError',
  message,
});

/**
 * Creates an AuthenticationRequiredError.
 */
export const createAuthenticationRequiredError = (): AuthenticationRequiredError => ({
  type: 'AuthenticationRequiredError',
  message: 'Authentication required',
});

export const createSessionRevokedError = (): SessionRevokedError => ({
  type: 'SessionRevokedError',
  message: 'Session expired or revoked',
});

export const createInvalidCredentialsError = (): InvalidCredentialsError => ({
  type: 'InvalidCredentialsError',
  message: 'Invalid credentials',
});

export const createAccountDisabledError = (): AccountDisabledError => ({
  type: 'AccountDisabledError',
  message: 'Account is disabled',
});

export const createUserExistsError = (email: string): UserExistsError => ({
  type: 'UserExistsError',
  message: 'User already exists',
  email,
});

export const createInvalidInputError = (field: string, message: string): InvalidInputError => ({
  type: 'InvalidInputError',
  message,
  field,
});

/**
 * Creates an AuthProviderError.
 */
export const createAuthProviderError = (message: string, cause?: unknown): AuthProviderError => ({
  type: 'AuthProviderError',
  message,
  retryable: false,
  cause,
});

// ─────────────────────────────────────────────────────────────────────────────
// Error Mapping to HTTP Status
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Maps auth errors to HTTP status codes.
 * Used by shell layer for response generation.
 */
export const AUTH_ERROR_HTTP_STATUS: Record<AuthError['type'], number> = {
  InvalidTokenError: 401,
  TokenExpiredError: 401,
  TokenSignatureError: 401,
  AuthenticationRequiredError: 401,
  SessionRevokedError: 401,
  InvalidCredentialsError: 401,
  AccountDisabledError: 403,
  UserExistsError: 409,
  InvalidInputError: 400,
  AuthProviderError: 500,
} as const;

/**
 * Gets HTTP status code for an error.
 */
export const getHttpStatusForError = (error: AuthError): number => {
  return AUTH_ERROR_HTTP_STATUS[error.type];
};
