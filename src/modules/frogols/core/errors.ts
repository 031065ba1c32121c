/**
 * Frogols Module - Domain Errors
 *
 * All errors are discriminated unions with a 'type' field for easy matching.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Infrastructure Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Store failure. Details are logged; clients get a generic message.
 */
export interface DatabaseError {
  readonly type: 'DatabaseError';
  readonly message: string;
  readonly retryable: boolean;
  readonly cause?: unknown;
}

// ─────────────────────────────────────────────────────────────────────────────
// Domain Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * User-correctable input problem (empty or reserved slug, bad request shape).
 */
export interface InvalidInputError {
  readonly type: 'InvalidInputError';
  readonly message: string;
  readonly field: string;
}

/**
 * Slug already belongs to another profile.
 */
export interface SlugTakenError {
  readonly type: 'SlugTakenError';
  readonly message: string;
  readonly slug: string;
}

export interface FrogolNotFoundError {
  readonly type: 'FrogolNotFoundError';
  readonly message: string;
  readonly key: string;
}

export interface LinkNotFoundError {
  readonly type: 'LinkNotFoundError';
  readonly message: string;
  readonly linkId: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Error Union
// ─────────────────────────────────────────────────────────────────────────────

export type FrogolError =
  | DatabaseError
  | InvalidInputError
  | SlugTakenError
  | FrogolNotFoundError
  | LinkNotFoundError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

export const createDatabaseError = (message: string, cause?: unknown): DatabaseError => ({
  type: 'DatabaseError',
  message,
  retryable: false,
  cause,
});

export const createInvalidInputError = (field: string, message: string): InvalidInputError => ({
  type: 'InvalidInputError',
  message,
  field,
});

export const createSlugTakenError = (slug: string): SlugTakenError => ({
  type: 'SlugTakenError',
  message: `Slug '${slug}' is already taken`,
  slug,
});

export const createFrogolNotFoundError = (key: string): FrogolNotFoundError => ({
  type: 'FrogolNotFoundError',
  message: `Frogol '${key}' not found`,
  key,
});

export const createLinkNotFoundError = (linkId: string): LinkNotFoundError => ({
  type: 'LinkNotFoundError',
  message: `Link '${linkId}' not found`,
  linkId,
});

// ─────────────────────────────────────────────────────────────────────────────
// HTTP Status Mapping
// ─────────────────────────────────────────────────────────────────────────────

export const FROGOL_ERROR_HTTP_STATUS: Record<FrogolError['type'], number> = {
  DatabaseError: 500,
  InvalidInputError: 400,
  SlugTakenError: 409,
  FrogolNotFoundError: 404,
  LinkNotFoundError: 404,
};

/**
 * Gets HTTP status code for an error.
 */
export const getHttpStatusForError = (error: FrogolError): number => {
  return FROGOL_ERROR_HTTP_STATUS[error.type];
};
