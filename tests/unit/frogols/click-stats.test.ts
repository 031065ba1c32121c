/**
 * Unit tests for click tracking and aggregation
 *
 * Tests cover:
 * - Per-link map construction
 * - Totals and distinct IPs for a profile
 * - Recording a click before redirecting
 * - Account-wide analytics
 */

import { describe, expect, it } from 'vitest';

import {
  getClickStats,
  getUserAnalytics,
  listUserFrogols,
  toPerLinkClicks,
  trackClick,
} from '@/modules/frogols/index.js';

import { createTestFrogol, createTestLead, createTestLink } from '../../fixtures/builders.js';
import {
  createFakeStore,
  makeFakeClickRepo,
  makeFakeFrogolRepo,
  makeFakeLeadRepo,
  makeFakeLinkRepo,
} from '../../fixtures/fakes.js';

describe('toPerLinkClicks', () => {
  it('maps every reported link, including zero counts', () => {
    expect(
      toPerLinkClicks([
        { linkId: 'L1', count: 2 },
        { linkId: 'L2', count: 0 },
      ])
    ).toEqual({ L1: 2, L2: 0 });
  });

  it('sums repeated entries for the same link', () => {
    expect(
      toPerLinkClicks([
        { linkId: 'L1', count: 2 },
        { linkId: 'L1', count: 3 },
      ])
    ).toEqual({ L1: 5 });
  });

  it('returns an empty map for no links', () => {
    expect(toPerLinkClicks([])).toEqual({});
  });
});

describe('getClickStats use case', () => {
  const setup = () => {
    const store = createFakeStore();
    const linkRepo = makeFakeLinkRepo({
      store,
      links: [
        createTestLink({ id: 'L1', frogolId: 'f-1', sortOrder: 0 }),
        createTestLink({ id: 'L2', frogolId: 'f-1', sortOrder: 1, isActive: false }),
        createTestLink({ id: 'other', frogolId: 'f-2', sortOrder: 0 }),
      ],
    });
    const clickRepo = makeFakeClickRepo({ store });
    return { linkRepo, clickRepo };
  };

  it('counts total and distinct-IP clicks and maps every link', async () => {
    const { linkRepo, clickRepo } = setup();
    await trackClick({ linkRepo, clickRepo }, { linkId: 'L1', ipAddress: '10.0.0.1' });
    await trackClick({ linkRepo, clickRepo }, { linkId: 'L1', ipAddress: '10.0.0.1' });

    const result = await getClickStats({ clickRepo }, { frogolId: 'f-1' });

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value).toEqual({
        totalClicks: 2,
        uniqueClicks: 1,
        perLinkClicks: { L1: 2, L2: 0 },
      });
    }
  });

  it('ignores clicks without an IP when counting unique visitors', async () => {
    const { linkRepo, clickRepo } = setup();
    await trackClick({ linkRepo, clickRepo }, { linkId: 'L1' });
    await trackClick({ linkRepo, clickRepo }, { linkId: 'L2', ipAddress: '10.0.0.2' });

    const result = await getClickStats({ clickRepo }, { frogolId: 'f-1' });

    expect(result._unsafeUnwrap().totalClicks).toBe(2);
    expect(result._unsafeUnwrap().uniqueClicks).toBe(1);
  });

  it('does not count clicks of other profiles', async () => {
    const { linkRepo, clickRepo } = setup();
    await trackClick({ linkRepo, clickRepo }, { linkId: 'other', ipAddress: '10.0.0.3' });

    const result = await getClickStats({ clickRepo }, { frogolId: 'f-1' });

    expect(result._unsafeUnwrap()).toEqual({
      totalClicks: 0,
      uniqueClicks: 0,
      perLinkClicks: { L1: 0, L2: 0 },
    });
  });

  it('propagates database errors', async () => {
    const clickRepo = makeFakeClickRepo({ simulateDbError: true });

    const result = await getClickStats({ clickRepo }, { frogolId: 'f-1' });

    expect(result.isErr()).toBe(true);
  });
});

describe('trackClick use case', () => {
  it('records the visitor and returns the link', async () => {
    const store = createFakeStore();
    const linkRepo = makeFakeLinkRepo({
      store,
      links: [createTestLink({ id: 'L1', url: 'https://target.example' })],
    });
    const clickRepo = makeFakeClickRepo({ store });

    const result = await trackClick(
      { linkRepo, clickRepo },
      { linkId: 'L1', ipAddress: '10.0.0.1', userAgent: 'test-agent' }
    );

    expect(result._unsafeUnwrap().url).toBe('https://target.example');
    expect(store.clicks).toEqual([
      { id: 'click-1', linkId: 'L1', ipAddress: '10.0.0.1', userAgent: 'test-agent' },
    ]);
  });

  it('returns LinkNotFoundError without recording for unknown links', async () => {
    const store = createFakeStore();
    const linkRepo = makeFakeLinkRepo({ store });
    const clickRepo = makeFakeClickRepo({ store });

    const result = await trackClick({ linkRepo, clickRepo }, { linkId: 'missing' });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.type).toBe('LinkNotFoundError');
    }
    expect(store.clicks).toHaveLength(0);
  });
});

describe('user analytics', () => {
  const setup = async () => {
    const store = createFakeStore();
    const frogolRepo = makeFakeFrogolRepo({
      store,
      frogols: [
        createTestFrogol({ id: 'quiet', slug: 'quiet', createdAt: new Date('2024-01-03') }),
        createTestFrogol({ id: 'busy', slug: 'busy', createdAt: new Date('2024-01-01') }),
        createTestFrogol({ id: 'leady', slug: 'leady', createdAt: new Date('2024-01-02') }),
        createTestFrogol({ id: 'bobs', slug: 'bobs', userId: 'user-bob' }),
      ],
    });
    const linkRepo = makeFakeLinkRepo({
      store,
      links: [
        createTestLink({ id: 'busy-1', frogolId: 'busy' }),
        createTestLink({ id: 'busy-2', frogolId: 'busy', sortOrder: 1 }),
        createTestLink({ id: 'leady-1', frogolId: 'leady' }),
        createTestLink({ id: 'bobs-1', frogolId: 'bobs' }),
      ],
    });
    const clickRepo = makeFakeClickRepo({ store });
    makeFakeLeadRepo({
      store,
      leads: [
        createTestLead({ frogolId: 'leady' }),
        createTestLead({ frogolId: 'leady' }),
        createTestLead({ frogolId: 'bobs' }),
      ],
    });

    for (const linkId of ['busy-1', 'busy-1', 'busy-2', 'leady-1', 'bobs-1']) {
      await trackClick({ linkRepo, clickRepo }, { linkId });
    }

    return { frogolRepo };
  };

  it('lists the profiles of the user newest first with their counts', async () => {
    const { frogolRepo } = await setup();

    const result = await listUserFrogols({ frogolRepo }, { userId: 'user-alice' });

    const summaries = result._unsafeUnwrap();
    expect(summaries.map((s) => s.id)).toEqual(['quiet', 'leady', 'busy']);
    expect(summaries[2]).toMatchObject({ totalLinks: 2, totalLeads: 0, totalClicks: 3 });
    expect(summaries[1]).toMatchObject({ totalLinks: 1, totalLeads: 2, totalClicks: 1 });
  });

  it('totals the account and ranks profiles by clicks, then leads', async () => {
    const { frogolRepo } = await setup();

    const result = await getUserAnalytics({ frogolRepo }, { userId: 'user-alice' });

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.totalFrogols).toBe(3);
      expect(result.value.totalLinks).toBe(3);
      expect(result.value.totalLeads).toBe(2);
      expect(result.value.totalClicks).toBe(4);
      expect(result.value.topFrogols.map((s) => s.id)).toEqual(['busy', 'leady', 'quiet']);
    }
  });
});
