/**
 * Fastify application factory
 * Creates and configures the Fastify instance with all plugins and routes
 */

import cookie from '@fastify/cookie';
import multipart from '@fastify/multipart';
import fastifyLib, {
  type FastifyError,
  type FastifyInstance,
  type FastifyServerOptions,
} from 'fastify';

import { registerCompression, registerCors, registerSecurityHeaders } from '../infra/plugins/index.js';
import {
  isCsrfError,
  makeAuthMiddleware,
  makeAuthRoutes,
  registerCsrfProtection,
  scryptPasswordHasher,
  type AuthProvider,
  type PasswordHasher,
  type SessionRepository,
  type TokenSigner,
  type UserRepository,
} from '../modules/auth/index.js';
import {
  fileTypeMimeDetector,
  makeAvatarRoutes,
  makeAvatarUrlWriter,
  type AvatarImageRepository,
  type AvatarStorage,
  type MimeDetector,
} from '../modules/avatars/index.js';
import {
  makeFrogolRoutes,
  type ClickRepository,
  type FrogolRepository,
  type LinkRepository,
} from '../modules/frogols/index.js';
import { makeHealthRoutes, type HealthChecker } from '../modules/health/index.js';
import { makeLeadRoutes, type LeadRepository } from '../modules/leads/index.js';

import type { AppConfig } from '../infra/config/env.js';

/**
 * Storage ports the routes run against
 */
export interface AppRepos {
  frogolRepo: FrogolRepository;
  linkRepo: LinkRepository;
  clickRepo: ClickRepository;
  leadRepo: LeadRepository;
  userRepo: UserRepository;
  sessionRepo: SessionRepository;
  avatarRepo: AvatarImageRepository;
}

/**
 * Application dependencies that can be injected
 */
export interface AppDeps {
  config: AppConfig;
  repos: AppRepos;
  authProvider: AuthProvider;
  tokenSigner: TokenSigner;
  avatarStorage: AvatarStorage;
  /** Default: scrypt */
  passwordHasher?: PasswordHasher;
  /** Default: magic-byte sniffing with file-type */
  mimeDetector?: MimeDetector;
  healthCheckers?: HealthChecker[];
}

/**
 * Application options combining Fastify options with our custom deps
 */
export interface AppOptions {
  fastifyOptions?: FastifyServerOptions;
  deps: AppDeps;
  version?: string | undefined;
}

/** Files accepted in one avatar upload request */
const MAX_AVATAR_FILES = 10;

/**
 * Creates and configures the Fastify application
 * This is the composition root where all modules are wired together
 */
export const buildApp = async (options: AppOptions): Promise<FastifyInstance> => {
  const { fastifyOptions = {}, deps, version } = options;
  const { config, repos } = deps;

  const app = fastifyLib({
    ...fastifyOptions,
  });

  await registerCors(app, config);
  await registerSecurityHeaders(app, config);
  await registerCompression(app);
  await app.register(cookie);
  await app.register(multipart, {
    // One byte over the limit is enough to tell an oversized file apart;
    // the avatar use case rejects it with a validation error
    limits: { fileSize: config.avatars.maxBytes + 1, files: MAX_AVATAR_FILES },
    throwFileSizeLimit: false,
  });

  await app.register(
    makeHealthRoutes({
      ...(version !== undefined && { version }),
      checkers: deps.healthCheckers ?? [],
    })
  );

  // ─────────────────────────────────────────────────────────────────────────────
  // Authentication
  // ─────────────────────────────────────────────────────────────────────────────
  // Every API request gets request.auth; protected routes add requireAuthHandler.
  app.addHook('preHandler', makeAuthMiddleware({ authProvider: deps.authProvider }));
  // Cookie-authenticated writes must echo the CSRF token
  await registerCsrfProtection(app, { secureCookies: config.auth.secureCookies });

  await app.register(
    makeAuthRoutes({
      userRepo: repos.userRepo,
      sessionRepo: repos.sessionRepo,
      passwordHasher: deps.passwordHasher ?? scryptPasswordHasher,
      tokenSigner: deps.tokenSigner,
      secureCookies: config.auth.secureCookies,
    })
  );

  // ─────────────────────────────────────────────────────────────────────────────
  // Profiles, links, leads, avatars
  // ─────────────────────────────────────────────────────────────────────────────
  await app.register(
    makeFrogolRoutes({
      frogolRepo: repos.frogolRepo,
      linkRepo: repos.linkRepo,
      clickRepo: repos.clickRepo,
    })
  );

  await app.register(
    makeLeadRoutes({
      leadRepo: repos.leadRepo,
      frogolRepo: repos.frogolRepo,
    })
  );

  await app.register(
    makeAvatarRoutes({
      frogolRepo: repos.frogolRepo,
      avatarRepo: repos.avatarRepo,
      storage: deps.avatarStorage,
      mimeDetector: deps.mimeDetector ?? fileTypeMimeDetector,
      maxBytes: config.avatars.maxBytes,
      avatarUrlWriter: makeAvatarUrlWriter(repos.frogolRepo),
    })
  );

  // Global error handler
  app.setErrorHandler((error: FastifyError, request, reply) => {
    // Handle validation errors
    if (error.validation != null) {
      request.log.debug({ err: error }, 'Request validation failed');
      return reply.status(400).send({
        ok: false,
        error: 'ValidationError',
        message: error.message,
      });
    }

    if (isCsrfError(error)) {
      request.log.warn({ err: error }, 'CSRF check failed');
      return reply.status(403).send({
        ok: false,
        error: 'CsrfTokenError',
        message: 'Invalid or missing CSRF token',
      });
    }

    // Handle known HTTP errors
    if (error.statusCode != null && error.statusCode < 500) {
      request.log.warn({ err: error }, 'Request error');
      return reply.status(error.statusCode).send({
        ok: false,
        error: error.name,
        message: error.message,
      });
    }

    // Handle unexpected errors
    request.log.error({ err: error }, 'Request error');
    return reply.status(500).send({
      ok: false,
      error: 'InternalServerError',
      message: 'An unexpected error occurred',
    });
  });

  // Not found handler
  app.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({
      ok: false,
      error: 'NotFoundError',
      message: `Route ${request.method} ${request.url} not found`,
    });
  });

  return app;
};

/**
 * Build app and prepare it (await all plugins)
 */
export const createApp = async (options: AppOptions): Promise<FastifyInstance> => {
  const app = await buildApp(options);
  await app.ready();
  return app;
};
