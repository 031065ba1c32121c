/**
 * Integration tests for Leads REST API
 *
 * Tests cover:
 * - Public lead capture with source scoring
 * - Capture on unknown profiles and invalid emails
 * - Owner-only listing, update and delete
 */

import fastifyLib, { type FastifyInstance } from 'fastify';
import { afterEach, describe, expect, it } from 'vitest';

import { createTestAuthProvider, makeAuthMiddleware } from '@/modules/auth/index.js';
import { makeLeadRoutes } from '@/modules/leads/index.js';

import { createTestFrogol, createTestLead } from '../fixtures/builders.js';
import {
  createFakeStore,
  makeFakeFrogolRepo,
  makeFakeLeadRepo,
  type FakeStore,
} from '../fixtures/fakes.js';

const createTestApp = async (store: FakeStore) => {
  const { provider } = createTestAuthProvider();

  const app = fastifyLib({ logger: false });
  app.addHook('preHandler', makeAuthMiddleware({ authProvider: provider }));
  await app.register(
    makeLeadRoutes({
      leadRepo: makeFakeLeadRepo({ store }),
      frogolRepo: makeFakeFrogolRepo({ store }),
    })
  );

  await app.ready();
  return app;
};

/**
 * Alice owns `f-alice` with lead `lead-a`; Bob owns `f-bob`.
 */
const seededStore = (): FakeStore => {
  const store = createFakeStore();
  makeFakeFrogolRepo({
    store,
    frogols: [
      createTestFrogol({ id: 'f-alice', slug: 'alice' }),
      createTestFrogol({ id: 'f-bob', slug: 'bob', userId: 'user-bob' }),
    ],
  });
  makeFakeLeadRepo({
    store,
    leads: [
      createTestLead({ id: 'lead-a', frogolId: 'f-alice', email: 'fan@example.com', score: 80 }),
    ],
  });
  return store;
};

describe('Leads REST API', () => {
  const { tokens } = createTestAuthProvider();
  let app: FastifyInstance | undefined;

  afterEach(async () => {
    if (app !== undefined) {
      await app.close();
      app = undefined;
    }
  });

  describe('POST /api/v1/public/frogols/:id/leads', () => {
    it('captures a lead without authentication', async () => {
      app = await createTestApp(seededStore());

      const response = await app.inject({
        method: 'POST',
        url: '/api/v1/public/frogols/f-alice/leads',
        payload: { email: ' new@example.com ', source: 'referral', message: 'Hello' },
      });

      expect(response.statusCode).toBe(201);
      expect(response.json().data.lead).toMatchObject({
        id: 'lead-1',
        frogolId: 'f-alice',
        email: 'new@example.com',
        source: 'referral',
        score: 90,
        message: 'Hello',
      });
    });

    it('scores leads without a source with the default', async () => {
      app = await createTestApp(seededStore());

      const response = await app.inject({
        method: 'POST',
        url: '/api/v1/public/frogols/f-alice/leads',
        payload: { email: 'new@example.com' },
      });

      expect(response.json().data.lead).toMatchObject({ source: null, score: 70, message: null });
    });

    it('returns 400 for an email without @', async () => {
      app = await createTestApp(seededStore());

      const response = await app.inject({
        method: 'POST',
        url: '/api/v1/public/frogols/f-alice/leads',
        payload: { email: 'new.example.com' },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({
        ok: false,
        error: 'InvalidInputError',
        message: 'Invalid email format',
      });
    });

    it('returns 404 for unknown profiles', async () => {
      const store = seededStore();
      app = await createTestApp(store);

      const response = await app.inject({
        method: 'POST',
        url: '/api/v1/public/frogols/f-missing/leads',
        payload: { email: 'new@example.com' },
      });

      expect(response.statusCode).toBe(404);
      expect(response.json().error).toBe('FrogolNotFoundError');
      expect(store.leads.size).toBe(1);
    });
  });

  describe('owner routes', () => {
    it('lists leads of an owned profile', async () => {
      app = await createTestApp(seededStore());

      const response = await app.inject({
        method: 'GET',
        url: '/api/v1/frogols/f-alice/leads',
        headers: { authorization: `Bearer ${tokens.alice}` },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json().data.leads.map((lead: { id: string }) => lead.id)).toEqual([
        'lead-a',
      ]);
    });

    it('returns 401 without a token', async () => {
      app = await createTestApp(seededStore());

      const response = await app.inject({ method: 'GET', url: '/api/v1/frogols/f-alice/leads' });

      expect(response.statusCode).toBe(401);
    });

    it("returns 404 for another user's leads", async () => {
      app = await createTestApp(seededStore());

      const list = await app.inject({
        method: 'GET',
        url: '/api/v1/frogols/f-alice/leads',
        headers: { authorization: `Bearer ${tokens.bob}` },
      });
      const remove = await app.inject({
        method: 'DELETE',
        url: '/api/v1/leads/lead-a',
        headers: { authorization: `Bearer ${tokens.bob}` },
      });

      expect(list.statusCode).toBe(404);
      expect(remove.statusCode).toBe(404);
      expect(remove.json().error).toBe('LeadNotFoundError');
    });

    it('updates a lead', async () => {
      app = await createTestApp(seededStore());

      const response = await app.inject({
        method: 'PUT',
        url: '/api/v1/leads/lead-a',
        headers: { authorization: `Bearer ${tokens.alice}` },
        payload: { email: 'fan@example.com', source: 'direct', score: 100, message: null },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json().data.lead).toMatchObject({ source: 'direct', score: 100 });
    });

    it('returns 400 for scores outside 0-100', async () => {
      app = await createTestApp(seededStore());

      const response = await app.inject({
        method: 'PUT',
        url: '/api/v1/leads/lead-a',
        headers: { authorization: `Bearer ${tokens.alice}` },
        payload: { email: 'fan@example.com', source: null, score: 101, message: null },
      });

      expect(response.statusCode).toBe(400);
    });

    it('deletes a lead', async () => {
      const store = seededStore();
      app = await createTestApp(store);

      const response = await app.inject({
        method: 'DELETE',
        url: '/api/v1/leads/lead-a',
        headers: { authorization: `Bearer ${tokens.alice}` },
      });

      expect(response.statusCode).toBe(200);
      expect(store.leads.size).toBe(0);
    });
  });
});
