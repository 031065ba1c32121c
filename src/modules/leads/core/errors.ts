/**
 * Leads Module - Domain Errors
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

export interface InvalidInputError {
  readonly type: 'InvalidInputError';
  readonly message: string;
  readonly field: string;
}

export interface LeadNotFoundError {
  readonly type: 'LeadNotFoundError';
  readonly message: string;
  readonly leadId: string;
}

export type LeadError = DatabaseError | InvalidInputError | LeadNotFoundError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

export const createDatabaseError = (message: string, cause?: unknown): DatabaseError => ({
  type: 'DatabaseError',
  message,
  retryable: false,
  cause,
});

export const createInvalidEmailError = (): InvalidInputError => ({
  type: 'InvalidInputError',
  message: 'Invalid email format',
  field: 'email',
});

export const createLeadNotFoundError = (leadId: string): LeadNotFoundError => ({
  type: 'LeadNotFoundError',
  message: `Lead '${leadId}' not found`,
  leadId,
});

// ─────────────────────────────────────────────────────────────────────────────
// HTTP Status Mapping
// ─────────────────────────────────────────────────────────────────────────────

export const LEAD_ERROR_HTTP_STATUS: Record<LeadError['type'], number> = {
  DatabaseError: 500,
  InvalidInputError: 400,
  LeadNotFoundError: 404,
};

export const getHttpStatusForError = (error: LeadError): number => {
  return LEAD_ERROR_HTTP_STATUS[error.type];
};
