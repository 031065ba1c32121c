/**
 * Leads Module - Domain Types
 */

/** Maximum accepted length of a lead message */
export const MAX_LEAD_MESSAGE_LENGTH = 2000;

/**
 * An email captured from a visitor of a profile.
 */
export interface Lead {
  id: string;
  frogolId: string;
  email: string;
  source: string | null;
  score: number | null;
  message: string | null;
  createdAt: Date;
}

export interface CreateLeadInput {
  frogolId: string;
  email: string;
  source: string | null;
  score: number;
  message: string | null;
}

/**
 * Full replacement of a lead's editable fields.
 */
export interface UpdateLeadInput {
  email: string;
  source: string | null;
  score: number | null;
  message: string | null;
}
