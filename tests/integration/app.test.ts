/**
 * Integration tests for the composed application
 *
 * Tests cover:
 * - Health endpoints
 * - Not-found and validation error envelopes
 * - Multipart avatar upload and removal
 * - CORS and security headers
 * - Response compression
 * - CSRF tokens for cookie sessions
 */

import { gunzipSync } from 'node:zlib';

import { afterEach, describe, expect, it } from 'vitest';

import { createApp, type AppDeps } from '@/app/build-app.js';
import { createTestAuthProvider } from '@/modules/auth/index.js';

import {
  PNG_SIGNATURE,
  createTestFrogol,
  createTestLink,
  makeFailingHealthChecker,
  makeHealthChecker,
  makeTestConfig,
} from '../fixtures/builders.js';
import {
  makeFakeAvatarStorage,
  makeFakeMimeDetector,
  makeFakeRepos,
  makeFakeTokenSigner,
  testPasswordHasher,
  type FakeAvatarStorage,
  type FakeStore,
} from '../fixtures/fakes.js';

import type { Link } from '@/modules/frogols/index.js';
import type { FastifyInstance } from 'fastify';

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

interface TestApp {
  app: FastifyInstance;
  store: FakeStore;
  storage: FakeAvatarStorage;
}

const createTestApp = async (
  overrides: Partial<AppDeps> = {},
  links: Link[] = []
): Promise<TestApp> => {
  const repos = makeFakeRepos({
    frogols: [
      createTestFrogol({ id: 'f-alice', slug: 'alice' }),
      createTestFrogol({ id: 'f-bob', slug: 'bob', userId: 'user-bob' }),
    ],
    links,
  });
  const storage = makeFakeAvatarStorage();

  const app = await createApp({
    fastifyOptions: { logger: false },
    deps: {
      config: makeTestConfig(),
      repos,
      authProvider: createTestAuthProvider().provider,
      tokenSigner: makeFakeTokenSigner(),
      avatarStorage: storage,
      passwordHasher: testPasswordHasher,
      mimeDetector: makeFakeMimeDetector(),
      ...overrides,
    },
    version: '0.1.0-test',
  });

  return { app, store: repos.store, storage };
};

const BOUNDARY = 'frogolio-test-boundary';

interface Part {
  filename: string;
  contentType: string;
  data: Buffer;
}

const multipartBody = (parts: Part[]): Buffer =>
  Buffer.concat([
    ...parts.flatMap((part) => [
      Buffer.from(
        `--${BOUNDARY}\r\n` +
          `Content-Disposition: form-data; name="avatar"; filename="${part.filename}"\r\n` +
          `Content-Type: ${part.contentType}\r\n\r\n`
      ),
      part.data,
      Buffer.from('\r\n'),
    ]),
    Buffer.from(`--${BOUNDARY}--\r\n`),
  ]);

const uploadHeaders = (token: string) => ({
  authorization: `Bearer ${token}`,
  'content-type': `multipart/form-data; boundary=${BOUNDARY}`,
});

// ─────────────────────────────────────────────────────────────────────────────
// Tests
// ─────────────────────────────────────────────────────────────────────────────

describe('Application', () => {
  const { tokens } = createTestAuthProvider();
  let testApp: TestApp | undefined;

  afterEach(async () => {
    if (testApp !== undefined) {
      await testApp.app.close();
      testApp = undefined;
    }
  });

  describe('health', () => {
    it('reports liveness', async () => {
      testApp = await createTestApp();

      const response = await testApp.app.inject({ method: 'GET', url: '/health/live' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ status: 'ok' });
    });

    it('reports readiness with the version and check results', async () => {
      testApp = await createTestApp({ healthCheckers: [makeHealthChecker({ name: 'database' })] });

      const response = await testApp.app.inject({ method: 'GET', url: '/health/ready' });

      expect(response.statusCode).toBe(200);
      const body = response.json();
      expect(body.status).toBe('ok');
      expect(body.version).toBe('0.1.0-test');
      expect(body.checks).toEqual([{ name: 'database', status: 'healthy' }]);
    });

    it('returns 503 when a critical check fails', async () => {
      testApp = await createTestApp({
        healthCheckers: [makeFailingHealthChecker('Connection refused')],
      });

      const response = await testApp.app.inject({ method: 'GET', url: '/health/ready' });

      expect(response.statusCode).toBe(503);
      expect(response.json().status).toBe('unhealthy');
    });

    it('returns 200 with degraded status when only a non-critical check fails', async () => {
      testApp = await createTestApp({
        healthCheckers: [makeHealthChecker({ name: 'disk', status: 'unhealthy', critical: false })],
      });

      const response = await testApp.app.inject({ method: 'GET', url: '/health/ready' });

      expect(response.statusCode).toBe(200);
      expect(response.json().status).toBe('degraded');
    });
  });

  describe('error envelopes', () => {
    it('returns 404 for unknown routes', async () => {
      testApp = await createTestApp();

      const response = await testApp.app.inject({ method: 'GET', url: '/nowhere' });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toEqual({
        ok: false,
        error: 'NotFoundError',
        message: 'Route GET /nowhere not found',
      });
    });

    it('returns 400 ValidationError for invalid bodies', async () => {
      testApp = await createTestApp();

      const response = await testApp.app.inject({
        method: 'POST',
        url: '/api/v1/frogols',
        headers: { authorization: `Bearer ${tokens.alice}` },
        payload: { displayName: 'Alice' },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({ ok: false, error: 'ValidationError' });
    });
  });

  describe('avatars', () => {
    it('stores an uploaded image and sets the avatar URL', async () => {
      testApp = await createTestApp();
      const { app, store, storage } = testApp;

      const response = await app.inject({
        method: 'POST',
        url: '/api/v1/frogols/f-alice/avatar',
        headers: uploadHeaders(tokens.alice),
        payload: multipartBody([
          { filename: 'me.png', contentType: 'image/png', data: PNG_SIGNATURE },
        ]),
      });

      expect(response.statusCode).toBe(200);
      const { data } = response.json();
      expect(data.filenames).toHaveLength(1);
      expect(data.avatarUrl).toBe(`/static/avatars/${String(data.filenames[0])}`);
      expect(data.errors).toEqual([]);
      expect(store.frogols.get('f-alice')?.avatarUrl).toBe(data.avatarUrl);
      expect(storage.files.get(data.filenames[0])).toEqual(PNG_SIGNATURE);
    });

    it('returns 400 when every file is rejected', async () => {
      testApp = await createTestApp();

      const response = await testApp.app.inject({
        method: 'POST',
        url: '/api/v1/frogols/f-alice/avatar',
        headers: uploadHeaders(tokens.alice),
        payload: multipartBody([
          { filename: 'notes.txt', contentType: 'text/plain', data: Buffer.from('hello') },
        ]),
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({
        ok: false,
        error: 'ValidationError',
        message: 'Unsupported image type: text/plain. Only JPEG, PNG, GIF, and WebP are allowed.',
      });
    });

    it('rejects files over the configured size', async () => {
      testApp = await createTestApp();

      const response = await testApp.app.inject({
        method: 'POST',
        url: '/api/v1/frogols/f-alice/avatar',
        headers: uploadHeaders(tokens.alice),
        payload: multipartBody([
          { filename: 'big.png', contentType: 'image/png', data: Buffer.alloc(2048, 1) },
        ]),
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().message).toBe('Image big.png exceeds the limit of 1024 bytes');
    });

    it("returns 404 for another user's profile", async () => {
      testApp = await createTestApp();

      const response = await testApp.app.inject({
        method: 'POST',
        url: '/api/v1/frogols/f-bob/avatar',
        headers: uploadHeaders(tokens.alice),
        payload: multipartBody([
          { filename: 'me.png', contentType: 'image/png', data: PNG_SIGNATURE },
        ]),
      });

      expect(response.statusCode).toBe(404);
      expect(testApp.storage.files.size).toBe(0);
    });

    it('removes the avatar', async () => {
      testApp = await createTestApp();
      const { app, store, storage } = testApp;
      await app.inject({
        method: 'POST',
        url: '/api/v1/frogols/f-alice/avatar',
        headers: uploadHeaders(tokens.alice),
        payload: multipartBody([
          { filename: 'me.png', contentType: 'image/png', data: PNG_SIGNATURE },
        ]),
      });

      const response = await app.inject({
        method: 'DELETE',
        url: '/api/v1/frogols/f-alice/avatar',
        headers: { authorization: `Bearer ${tokens.alice}` },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ ok: true, data: { deleted: true } });
      expect(store.frogols.get('f-alice')?.avatarUrl).toBeNull();
      expect(store.avatars.size).toBe(0);
      expect(storage.files.size).toBe(0);
    });
  });

  describe('cross-origin and security headers', () => {
    it('allows listed origins', async () => {
      testApp = await createTestApp({
        config: makeTestConfig({
          cors: { allowedOrigins: 'https://app.example', clientBaseUrl: undefined },
        }),
      });

      const response = await testApp.app.inject({
        method: 'GET',
        url: '/health/live',
        headers: { origin: 'https://app.example' },
      });

      expect(response.headers['access-control-allow-origin']).toBe('https://app.example');
      expect(response.headers['access-control-allow-credentials']).toBe('true');
    });

    it('sets security headers outside the test environment', async () => {
      const config = makeTestConfig();
      testApp = await createTestApp({
        config: { ...config, server: { ...config.server, isTest: false } },
      });

      const response = await testApp.app.inject({ method: 'GET', url: '/health/live' });

      expect(response.headers['x-content-type-options']).toBe('nosniff');
      expect(response.headers['x-frame-options']).toBe('DENY');
      expect(response.headers['strict-transport-security']).toBeUndefined();
    });
  });

  describe('compression', () => {
    it('compresses bodies over 1 KB when the client accepts gzip', async () => {
      const links = Array.from({ length: 30 }, (_, index) =>
        createTestLink({
          frogolId: 'f-alice',
          sortOrder: index,
          url: `https://example.com/a-fairly-long-path/${String(index)}`,
        })
      );
      testApp = await createTestApp({}, links);

      const response = await testApp.app.inject({
        method: 'GET',
        url: '/api/v1/public/frogols/alice',
        headers: { 'accept-encoding': 'gzip' },
      });

      expect(response.statusCode).toBe(200);
      expect(response.headers['content-encoding']).toBe('gzip');
      const body = JSON.parse(gunzipSync(response.rawPayload).toString('utf8'));
      expect(body.data.links).toHaveLength(30);
    });

    it('sends small bodies uncompressed', async () => {
      testApp = await createTestApp();

      const response = await testApp.app.inject({
        method: 'GET',
        url: '/health/live',
        headers: { 'accept-encoding': 'gzip' },
      });

      expect(response.headers['content-encoding']).toBeUndefined();
      expect(response.json()).toEqual({ status: 'ok' });
    });
  });

  describe('csrf protection', () => {
    const newProfile = { slug: 'new-page', displayName: 'New' };

    const issueCsrf = async (app: FastifyInstance) => {
      const response = await app.inject({ method: 'GET', url: '/api/v1/auth/csrf' });
      expect(response.statusCode).toBe(200);
      const secret = response.cookies.find((c) => c.name === '_csrf')?.value ?? '';
      const token: string = response.json().data.token;
      return { secret, token };
    };

    it('rejects cookie-authenticated writes without a token', async () => {
      testApp = await createTestApp();

      const response = await testApp.app.inject({
        method: 'POST',
        url: '/api/v1/frogols',
        cookies: { auth_token: tokens.alice },
        payload: newProfile,
      });

      expect(response.statusCode).toBe(403);
      expect(response.json()).toEqual({
        ok: false,
        error: 'CsrfTokenError',
        message: 'Invalid or missing CSRF token',
      });
      expect(testApp.store.frogols.size).toBe(2);
    });

    it('rejects a token that does not match the secret cookie', async () => {
      testApp = await createTestApp();
      const { secret } = await issueCsrf(testApp.app);

      const response = await testApp.app.inject({
        method: 'POST',
        url: '/api/v1/frogols',
        cookies: { auth_token: tokens.alice, _csrf: secret },
        headers: { 'x-csrf-token': 'not-a-token' },
        payload: newProfile,
      });

      expect(response.statusCode).toBe(403);
    });

    it('accepts cookie-authenticated writes that echo the issued token', async () => {
      testApp = await createTestApp();
      const { secret, token } = await issueCsrf(testApp.app);

      const response = await testApp.app.inject({
        method: 'POST',
        url: '/api/v1/frogols',
        cookies: { auth_token: tokens.alice, _csrf: secret },
        headers: { 'x-csrf-token': token },
        payload: newProfile,
      });

      expect(response.statusCode).toBe(201);
      expect(response.json().data.frogol.slug).toBe('new-page');
    });

    it('does not require a token from bearer clients', async () => {
      testApp = await createTestApp();

      const response = await testApp.app.inject({
        method: 'POST',
        url: '/api/v1/frogols',
        headers: { authorization: `Bearer ${tokens.alice}` },
        payload: newProfile,
      });

      expect(response.statusCode).toBe(201);
    });

    it('leaves cookie-authenticated reads alone', async () => {
      testApp = await createTestApp();

      const response = await testApp.app.inject({
        method: 'GET',
        url: '/api/v1/frogols',
        cookies: { auth_token: tokens.alice },
      });

      expect(response.statusCode).toBe(200);
    });
  });
});
