/**
 * Security Headers Plugin
 *
 * HTTP security headers via @fastify/helmet for a JSON and redirect API.
 */

import helmet from '@fastify/helmet';

import type { AppConfig } from '../config/env.js';
import type { FastifyInstance } from 'fastify';

// ─────────────────────────────────────────────────────────────────────────────
// Configuration
// ─────────────────────────────────────────────────────────────────────────────

// Nothing here renders HTML; avatars are served by the reverse proxy
const CSP_DIRECTIVES = {
  defaultSrc: ["'none'"],
  frameAncestors: ["'none'"],
  baseUri: ["'none'"],
  formAction: ["'none'"],
};

/** One year, subdomains included */
const HSTS_CONFIG = {
  maxAge: 31536000,
  includeSubDomains: true,
  preload: false,
};

// ─────────────────────────────────────────────────────────────────────────────
// Plugin
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Registers HTTP security headers. Skipped in the test environment.
 */
export async function registerSecurityHeaders(
  fastify: FastifyInstance,
  config: AppConfig
): Promise<void> {
  const { isProduction, isTest } = config.server;

  if (isTest) {
    fastify.log.debug('Security headers disabled in test environment');
    return;
  }

  await fastify.register(helmet, {
    contentSecurityPolicy: { directives: CSP_DIRECTIVES },
    dnsPrefetchControl: { allow: false },
    frameguard: { action: 'deny' },
    hsts: isProduction ? HSTS_CONFIG : false,
    permittedCrossDomainPolicies: { permittedPolicies: 'none' },
    referrerPolicy: { policy: 'strict-origin-when-cross-origin' },
    // Superseded by CSP
    xssFilter: false,
    hidePoweredBy: true,
    crossOriginEmbedderPolicy: false,
    crossOriginOpenerPolicy: false,
    // Public profiles are fetched from other origins
    crossOriginResourcePolicy: { policy: 'cross-origin' },
  });

  fastify.log.info({ production: isProduction }, 'Security headers plugin registered');
}
