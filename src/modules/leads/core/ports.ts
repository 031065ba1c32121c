/**
 * Leads Module - Port Interfaces
 */

import type { LeadError } from './errors.js';
import type { CreateLeadInput, Lead, UpdateLeadInput } from './types.js';
import type { Result } from 'neverthrow';

export interface LeadRepository {
  create(input: CreateLeadInput): Promise<Result<Lead, LeadError>>;

  /** Leads of a profile, newest first. */
  listForFrogol(frogolId: string): Promise<Result<Lead[], LeadError>>;

  getById(id: string): Promise<Result<Lead | null, LeadError>>;

  /** @returns The updated lead, or null if not found */
  update(id: string, input: UpdateLeadInput): Promise<Result<Lead | null, LeadError>>;

  /** @returns false if nothing was deleted */
  delete(id: string): Promise<Result<boolean, LeadError>>;
}
