/**
 * API server entry point
 * Starts the Fastify HTTP server
 */

import { buildApp, type AppRepos } from './app/build-app.js';
import { parseEnv, createConfig } from './infra/config/index.js';
import { initDatabase, type DbClient } from './infra/database/client.js';
import { createLogger } from './infra/logger/index.js';
import {
  makeJwtTokenSigner,
  makeSessionAuthProvider,
  makeSessionRepo,
  makeUserRepo,
} from './modules/auth/index.js';
import { makeAvatarImageRepo, makeFsAvatarStorage } from './modules/avatars/index.js';
import { makeClickRepo, makeFrogolRepo, makeLinkRepo } from './modules/frogols/index.js';
import { makeDbHealthChecker } from './modules/health/index.js';
import { makeLeadRepo } from './modules/leads/index.js';

import type { Logger } from 'pino';

const getVersion = (): string => process.env['APP_VERSION'] ?? '0.1.0';

const makeRepos = (db: DbClient, logger: Logger): AppRepos => {
  const options = { db, logger };
  return {
    frogolRepo: makeFrogolRepo(options),
    linkRepo: makeLinkRepo(options),
    clickRepo: makeClickRepo(options),
    leadRepo: makeLeadRepo(options),
    userRepo: makeUserRepo(options),
    sessionRepo: makeSessionRepo(options),
    avatarRepo: makeAvatarImageRepo(options),
  };
};

const main = async (): Promise<void> => {
  // Parse and validate environment
  const env = parseEnv(process.env);
  const config = createConfig(env);

  const logger = createLogger({
    level: config.logger.level,
    name: 'frogolio-server',
    pretty: config.logger.pretty,
  });

  logger.info({ config: { server: config.server } }, 'Starting API server');

  const db = initDatabase(config);
  const repos = makeRepos(db, logger);

  const authProvider = makeSessionAuthProvider({
    secret: config.auth.jwtSecret,
    sessionRepo: repos.sessionRepo,
    userRepo: repos.userRepo,
    logger,
  });
  const tokenSigner = makeJwtTokenSigner({
    secret: config.auth.jwtSecret,
    ttlHours: config.auth.sessionTtlHours,
  });

  // Request logs share the redacting application logger
  const app = await buildApp({
    fastifyOptions: {
      loggerInstance: logger,
      // Client IPs come from X-Forwarded-For behind the reverse proxy
      trustProxy: config.server.isProduction,
    },
    deps: {
      config,
      repos,
      authProvider,
      tokenSigner,
      avatarStorage: makeFsAvatarStorage({ dir: config.avatars.dir, logger }),
      healthCheckers: [makeDbHealthChecker(db)],
    },
    version: getVersion(),
  });

  // Graceful shutdown handler
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Received shutdown signal');

    try {
      await app.close();
      await db.destroy();
      logger.info('Server closed gracefully');
      process.exit(0);
    } catch (error) {
      logger.error({ err: error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  // Start server
  try {
    const address = await app.listen({
      port: config.server.port,
      host: config.server.host,
    });

    logger.info({ address }, 'Server listening');
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start server');
    process.exit(1);
  }
};

// Start the server (top-level await)
await main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
