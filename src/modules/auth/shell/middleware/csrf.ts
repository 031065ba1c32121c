/**
 * CSRF Protection
 *
 * Browser sessions ride on the `auth_token` cookie, so state-changing requests
 * authenticated by that cookie must carry a token from GET /api/v1/auth/csrf in
 * the `x-csrf-token` header. Bearer-token clients are not affected.
 *
 * The secret lives in the `_csrf` cookie (@fastify/csrf-protection); the token
 * is derived from it, so a page on another origin can neither read nor forge it.
 */

import csrfProtection from '@fastify/csrf-protection';

import { isAuthenticated } from '../../core/types.js';
import { usesSessionCookie } from '../extractors/http-extractor.js';

import type { FastifyInstance, preHandlerHookHandler } from 'fastify';

const SAFE_METHODS = new Set(['GET', 'HEAD', 'OPTIONS']);

export interface CsrfOptions {
  secureCookies: boolean;
}

/**
 * Registers the CSRF secret cookie, the token route and the guard hook.
 * Requires @fastify/cookie and must be registered after the auth hook.
 */
export async function registerCsrfProtection(
  app: FastifyInstance,
  options: CsrfOptions
): Promise<void> {
  await app.register(csrfProtection, {
    cookieOpts: { path: '/', httpOnly: true, sameSite: 'strict', secure: options.secureCookies },
  });

  const guard: preHandlerHookHandler = (request, reply, done) => {
    if (
      SAFE_METHODS.has(request.method) ||
      !isAuthenticated(request.auth) ||
      !usesSessionCookie(request)
    ) {
      done();
      return;
    }
    app.csrfProtection(request, reply, done);
  };
  app.addHook('preHandler', guard);

  app.get('/api/v1/auth/csrf', async (_request, reply) => {
    const token = reply.generateCsrf();
    return reply.status(200).send({ ok: true, data: { token } });
  });
}

/**
 * Errors raised by @fastify/csrf-protection carry these codes.
 */
export const isCsrfError = (error: { code?: string | undefined }): boolean =>
  error.code?.startsWith('FST_CSRF_') === true;
