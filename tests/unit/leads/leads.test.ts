/**
 * Unit tests for lead scoring and lead use cases
 *
 * Tests cover:
 * - Source-based scoring
 * - Capture validation and defaults
 * - Owner-side update and delete
 */

import { describe, expect, it } from 'vitest';

import {
  DEFAULT_LEAD_SCORE,
  captureLead,
  deleteLead,
  getLead,
  isPlausibleEmail,
  listLeads,
  scoreForSource,
  updateLead,
} from '@/modules/leads/index.js';

import { createTestLead } from '../../fixtures/builders.js';
import { makeFakeLeadRepo } from '../../fixtures/fakes.js';

describe('scoreForSource', () => {
  it('scores known sources', () => {
    expect(scoreForSource('direct')).toBe(100);
    expect(scoreForSource('referral')).toBe(90);
    expect(scoreForSource('social')).toBe(80);
  });

  it('falls back to the default score', () => {
    expect(DEFAULT_LEAD_SCORE).toBe(70);
    expect(scoreForSource(undefined)).toBe(70);
    expect(scoreForSource(null)).toBe(70);
    expect(scoreForSource('newsletter')).toBe(70);
  });

  it('matches sources case-sensitively', () => {
    expect(scoreForSource('Social')).toBe(70);
  });
});

describe('isPlausibleEmail', () => {
  it('accepts anything with an @', () => {
    expect(isPlausibleEmail('a@b')).toBe(true);
    expect(isPlausibleEmail('@')).toBe(true);
  });

  it('rejects strings without an @', () => {
    expect(isPlausibleEmail('not-an-email')).toBe(false);
  });
});

describe('captureLead use case', () => {
  it('stores the trimmed email with the source score', async () => {
    const leadRepo = makeFakeLeadRepo();

    const result = await captureLead(
      { leadRepo },
      { frogolId: 'f-1', email: ' fan@example.com ', source: 'social', message: 'Hi!' }
    );

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value).toMatchObject({
        frogolId: 'f-1',
        email: 'fan@example.com',
        source: 'social',
        score: 80,
        message: 'Hi!',
      });
    }
  });

  it('stores missing source and message as null with the default score', async () => {
    const leadRepo = makeFakeLeadRepo();

    const result = await captureLead({ leadRepo }, { frogolId: 'f-1', email: 'fan@example.com' });

    expect(result._unsafeUnwrap()).toMatchObject({ source: null, score: 70, message: null });
  });

  it('rejects an email without @', async () => {
    const leadRepo = makeFakeLeadRepo();

    const result = await captureLead({ leadRepo }, { frogolId: 'f-1', email: 'fan.example.com' });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.type).toBe('InvalidInputError');
      expect(result.error.message).toBe('Invalid email format');
    }
  });

  it('propagates database errors', async () => {
    const leadRepo = makeFakeLeadRepo({ simulateDbError: true });

    const result = await captureLead({ leadRepo }, { frogolId: 'f-1', email: 'fan@example.com' });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.type).toBe('DatabaseError');
    }
  });
});

describe('lead management use cases', () => {
  it('lists leads of a profile newest first', async () => {
    const leadRepo = makeFakeLeadRepo({
      leads: [
        createTestLead({ id: 'old', frogolId: 'f-1', createdAt: new Date('2024-01-01') }),
        createTestLead({ id: 'new', frogolId: 'f-1', createdAt: new Date('2024-02-01') }),
        createTestLead({ id: 'elsewhere', frogolId: 'f-2' }),
      ],
    });

    const result = await listLeads({ leadRepo }, { frogolId: 'f-1' });

    expect(result._unsafeUnwrap().map((lead) => lead.id)).toEqual(['new', 'old']);
  });

  it('replaces every editable field on update', async () => {
    const leadRepo = makeFakeLeadRepo({
      leads: [createTestLead({ id: 'lead-1', source: 'social', score: 80, message: 'Hi' })],
    });

    const result = await updateLead(
      { leadRepo },
      { id: 'lead-1', email: ' new@example.com', source: null, score: 95, message: null }
    );

    expect(result._unsafeUnwrap()).toMatchObject({
      id: 'lead-1',
      email: 'new@example.com',
      source: null,
      score: 95,
      message: null,
    });
  });

  it('rejects an invalid email on update', async () => {
    const leadRepo = makeFakeLeadRepo({ leads: [createTestLead({ id: 'lead-1' })] });

    const result = await updateLead(
      { leadRepo },
      { id: 'lead-1', email: 'nope', source: null, score: null, message: null }
    );

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.type).toBe('InvalidInputError');
    }
  });

  it('returns LeadNotFoundError for unknown ids', async () => {
    const leadRepo = makeFakeLeadRepo();

    const fetched = await getLead({ leadRepo }, { id: 'missing' });
    const deleted = await deleteLead({ leadRepo }, { id: 'missing' });

    expect(fetched.isErr() && fetched.error.type).toBe('LeadNotFoundError');
    expect(deleted.isErr() && deleted.error.type).toBe('LeadNotFoundError');
  });

  it('deletes a lead', async () => {
    const leadRepo = makeFakeLeadRepo({ leads: [createTestLead({ id: 'lead-1' })] });

    const result = await deleteLead({ leadRepo }, { id: 'lead-1' });
    const after = await getLead({ leadRepo }, { id: 'lead-1' });

    expect(result.isOk()).toBe(true);
    expect(after.isErr()).toBe(true);
  });
});
