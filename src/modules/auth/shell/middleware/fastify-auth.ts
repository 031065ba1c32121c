/**
 * Fastify Authentication Middleware
 *
 * Provides preHandler hooks for REST route authentication.
 */

import { AUTH_ERROR_HTTP_STATUS, type AuthError } from '../../core/errors.js';
import { authenticate, type AuthenticateDeps } from '../../core/usecases/authenticate.js';
import { requireAuth } from '../../core/usecases/require-auth.js';
import type { AuthContext } from '../../core/types.js';
import { httpSessionExtractor } from '../extractors/http-extractor.js';

import type { FastifyReply, FastifyRequest } from 'fastify';

// ─────────────────────────────────────────────────────────────────────────────
// Request Decoration
// ─────────────────────────────────────────────────────────────────────────────

declare module 'fastify' {
  interface FastifyRequest {
    /** Authentication context (set by auth middleware) */
    auth: AuthContext;
    /** Why a presented token was rejected; null when none was rejected */
    authError: AuthError | null;
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Dependencies for creating auth middleware.
 */
export type MakeAuthMiddlewareDeps = AuthenticateDeps;

export type AuthHook = (request: FastifyRequest, reply: FastifyReply) => Promise<void>;

// ─────────────────────────────────────────────────────────────────────────────
// Global Middleware
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Global hook that resolves `request.auth` and `request.authError` for every
 * request. It never fails the request itself.
 *
 * @example
 * app.addHook('preHandler', makeAuthMiddleware({ authProvider }));
 */
export function makeAuthMiddleware(deps: MakeAuthMiddlewareDeps): AuthHook {
  return async (request: FastifyRequest): Promise<void> => {
    const token = httpSessionExtractor.extractToken(request);
    const { context, rejection } = await authenticate(deps, { token });

    if (rejection !== null) {
      request.log.debug({ reason: rejection.type }, 'Ignoring rejected session token');
    }

    request.auth = context;
    request.authError = rejection;
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Route Guards
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Route-level guard that requires authentication.
 * Use as preHandler on protected routes.
 *
 * Assumes the global auth middleware has already run and set request.auth.
 *
 * @example
 * app.post('/api/v1/frogols', { preHandler: requireAuthHandler }, async (request) => {
 *   // request.auth is authenticated here
 * });
 */
export const requireAuthHandler: AuthHook = async (request, reply) => {
  const result = requireAuth({ context: request.auth, rejection: request.authError });

  if (result.isErr()) {
    await reply.status(AUTH_ERROR_HTTP_STATUS[result.error.type]).send({
      ok: false,
      error: result.error.type,
      message: result.error.message,
    });
  }
};
