/**
 * Avatars Module - Domain Errors
 */

// ─────────────────────────────────────────────────────────────────────────────
// Error Types
// ─────────────────────────────────────────────────────────────────────────────

export interface DatabaseError {
  readonly type: 'DatabaseError';
  readonly message: string;
  readonly retryable: boolean;
  readonly cause?: unknown;
}

/**
 * Rejected upload. The message is shown to the client as is.
 */
export interface ValidationError {
  readonly type: 'ValidationError';
  readonly message: string;
}

/**
 * Filesystem failure. Clients only see the opaque message.
 */
export interface InternalError {
  readonly type: 'InternalError';
  readonly message: string;
  readonly cause?: unknown;
}

export type AvatarError = DatabaseError | ValidationError | InternalError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

export const createDatabaseError = (message: string, cause?: unknown): DatabaseError => ({
  type: 'DatabaseError',
  message,
  retryable: false,
  cause,
});

export const createValidationError = (message: string): ValidationError => ({
  type: 'ValidationError',
  message,
});

export const createInternalError = (message: string, cause?: unknown): InternalError => ({
  type: 'InternalError',
  message,
  cause,
});

// ─────────────────────────────────────────────────────────────────────────────
// HTTP Status Mapping
// ─────────────────────────────────────────────────────────────────────────────

export const AVATAR_ERROR_HTTP_STATUS: Record<AvatarError['type'], number> = {
  DatabaseError: 500,
  ValidationError: 400,
  InternalError: 500,
};

export const getHttpStatusForError = (error: AvatarError): number => {
  return AVATAR_ERROR_HTTP_STATUS[error.type];
};
