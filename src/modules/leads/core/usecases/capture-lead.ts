/**
 * Capture Lead Use Case
 *
 * Stores an email left by a visitor on a public profile.
 */

import { ok, err, type Result } from 'neverthrow';

import { createInvalidEmailError, type LeadError } from '../errors.js';
import { isPlausibleEmail, scoreForSource } from '../scoring.js';

import type { LeadRepository } from '../ports.js';
import type { Lead } from '../types.js';

export interface CaptureLeadDeps {
  leadRepo: LeadRepository;
}

export interface CaptureLeadInput {
  frogolId: string;
  email: string;
  source?: string;
  message?: string;
}

/**
 * Captures a lead.
 *
 * Flow:
 * 1. Reject emails without '@'
 * 2. Score by source
 * 3. Insert
 */
export const captureLead = async (
  deps: CaptureLeadDeps,
  input: CaptureLeadInput
): Promise<Result<Lead, LeadError>> => {
  const email = input.email.trim();
  if (!isPlausibleEmail(email)) {
    return err(createInvalidEmailError());
  }

  const result = await deps.leadRepo.create({
    frogolId: input.frogolId,
    email,
    source: input.source ?? null,
    score: scoreForSource(input.source),
    message: input.message ?? null,
  });
  if (result.isErr()) {
    return err(result.error);
  }

  return ok(result.value);
};
