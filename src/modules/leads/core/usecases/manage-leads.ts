/**
 * Lead Management Use Cases
 *
 * Owner-side listing and editing of captured leads.
 */

import { ok, err, type Result } from 'neverthrow';

import {
  createInvalidEmailError,
  createLeadNotFoundError,
  type LeadError,
} from '../errors.js';
import { isPlausibleEmail } from '../scoring.js';

import type { LeadRepository } from '../ports.js';
import type { Lead, UpdateLeadInput } from '../types.js';

export interface ManageLeadsDeps {
  leadRepo: LeadRepository;
}

export const listLeads = async (
  deps: ManageLeadsDeps,
  input: { frogolId: string }
): Promise<Result<Lead[], LeadError>> => {
  return deps.leadRepo.listForFrogol(input.frogolId);
};

export const getLead = async (
  deps: ManageLeadsDeps,
  input: { id: string }
): Promise<Result<Lead, LeadError>> => {
  const result = await deps.leadRepo.getById(input.id);
  if (result.isErr()) {
    return err(result.error);
  }
  if (result.value === null) {
    return err(createLeadNotFoundError(input.id));
  }
  return ok(result.value);
};

/**
 * Replaces email, source, score and message. The email rule of capture applies.
 */
export const updateLead = async (
  deps: ManageLeadsDeps,
  input: UpdateLeadInput & { id: string }
): Promise<Result<Lead, LeadError>> => {
  const { id, ...changes } = input;
  const email = changes.email.trim();

  if (!isPlausibleEmail(email)) {
    return err(createInvalidEmailError());
  }

  const result = await deps.leadRepo.update(id, { ...changes, email });
  if (result.isErr()) {
    return err(result.error);
  }
  if (result.value === null) {
    return err(createLeadNotFoundError(id));
  }
  return ok(result.value);
};

export const deleteLead = async (
  deps: ManageLeadsDeps,
  input: { id: string }
): Promise<Result<void, LeadError>> => {
  const result = await deps.leadRepo.delete(input.id);
  if (result.isErr()) {
    return err(result.error);
  }
  if (!result.value) {
    return err(createLeadNotFoundError(input.id));
  }
  return ok(undefined);
};
