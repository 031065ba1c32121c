/**
 * CORS plugin for Fastify
 * Allows the dashboard and public pages to call the API with the session cookie
 */

import cors from '@fastify/cors';

import type { AppConfig } from '../config/env.js';
import type { FastifyInstance } from 'fastify';

/**
 * Collects allowed origins from ALLOWED_ORIGINS and CLIENT_BASE_URL.
 */
export function parseAllowedOrigins(config: AppConfig): Set<string> {
  const listed = (config.cors.allowedOrigins ?? '').split(',');
  const origins = [...listed, config.cors.clientBaseUrl ?? '']
    .map((origin) => origin.trim())
    .filter((origin) => origin !== '');

  return new Set(origins);
}

function isLocalhostOrigin(origin: string): boolean {
  try {
    const url = new URL(origin);
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      return false;
    }

    // Match hostnames exactly (avoid `startsWith('http://localhost')` pitfalls)
    return url.hostname === 'localhost' || url.hostname === '127.0.0.1' || url.hostname === '::1';
  } catch {
    return false;
  }
}

/**
 * Register CORS plugin with Fastify
 *
 * Origins come from ALLOWED_ORIGINS (comma-separated) and CLIENT_BASE_URL.
 */
export async function registerCors(fastify: FastifyInstance, config: AppConfig): Promise<void> {
  const allowedOrigins = parseAllowedOrigins(config);

  await fastify.register(cors, {
    origin: (origin, cb) => {
      // Allow server-to-server or same-origin requests
      if (origin === undefined || origin === '') {
        cb(null, true);
        return;
      }

      // Localhost is only trusted in development; everything else must be listed
      if (config.server.isDevelopment && isLocalhostOrigin(origin)) {
        cb(null, true);
        return;
      }

      if (allowedOrigins.has(origin)) {
        cb(null, true);
        return;
      }

      cb(new Error('CORS origin not allowed'), false);
    },
    methods: ['GET', 'POST', 'PUT', 'OPTIONS', 'DELETE'],
    allowedHeaders: ['content-type', 'x-requested-with', 'authorization', 'accept', 'x-csrf-token'],
    exposedHeaders: ['content-length', 'location'],
    // Session cookie travels with cross-origin dashboard requests
    credentials: true,
  });
}
