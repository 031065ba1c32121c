/**
 * HTTP Session Extractor
 *
 * Extracts the session token from the Authorization header, falling back to
 * the session cookie set on login.
 */

import { AUTH_HEADER, BEARER_PREFIX, SESSION_COOKIE_NAME } from '../../core/types.js';

import type { SessionExtractor } from '../../core/ports.js';
import type { FastifyRequest } from 'fastify';

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

const extractBearerToken = (request: FastifyRequest): string | null => {
  const authHeader = request.headers[AUTH_HEADER];

  if (typeof authHeader !== 'string' || !authHeader.startsWith(BEARER_PREFIX)) {
    return null;
  }

  const token = authHeader.slice(BEARER_PREFIX.length).trim();
  return token !== '' ? token : null;
};

const extractCookieToken = (request: FastifyRequest): string | null => {
  // Undefined when the cookie plugin is not registered
  const token = request.cookies?.[SESSION_COOKIE_NAME]?.trim();
  return token !== undefined && token !== '' ? token : null;
};

/**
 * Extracts the session token from a Fastify request.
 *
 * Order: "Authorization: Bearer <token>", then the `auth_token` cookie.
 */
export const httpSessionExtractor: SessionExtractor<FastifyRequest> = {
  extractToken(request: FastifyRequest): string | null {
    return extractBearerToken(request) ?? extractCookieToken(request);
  },
};

/**
 * True when the session would come from the cookie: the browser attaches it
 * on its own, so the request needs a CSRF token.
 */
export const usesSessionCookie = (request: FastifyRequest): boolean =>
  extractBearerToken(request) === null && extractCookieToken(request) !== null;
