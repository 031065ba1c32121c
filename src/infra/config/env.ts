/**
 * Environment configuration with validation
 * Uses TypeBox for runtime type checking
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

/** Default maximum avatar upload size (5MB) */
const DEFAULT_MAX_AVATAR_BYTES = 5 * 1024 * 1024;

/**
 * Environment variable schema
 */
export const EnvSchema = Type.Object({
  // Server
  NODE_ENV: Type.Union(
    [Type.Literal('development'), Type.Literal('production'), Type.Literal('test')],
    { default: 'development' }
  ),
  PORT: Type.Number({ default: 3000, minimum: 1, maximum: 65535 }),
  HOST: Type.String({ default: '0.0.0.0' }),

  // Logging
  LOG_LEVEL: Type.Union(
    [
      Type.Literal('fatal'),
      Type.Literal('error'),
      Type.Literal('warn'),
      Type.Literal('info'),
      Type.Literal('debug'),
      Type.Literal('trace'),
      Type.Literal('silent'),
    ],
    { default: 'info' }
  ),

  DATABASE_URL: Type.String({ minLength: 1 }),

  // Sessions
  JWT_SECRET: Type.String({ minLength: 1 }),
  SESSION_TTL_HOURS: Type.Number({ default: 24, minimum: 1 }),

  // Avatars
  AVATAR_DIR: Type.String({ default: './static/avatars' }),
  MAX_AVATAR_BYTES: Type.Number({ default: DEFAULT_MAX_AVATAR_BYTES, minimum: 1 }),

  // CORS
  ALLOWED_ORIGINS: Type.Optional(Type.String()),
  CLIENT_BASE_URL: Type.Optional(Type.String()),
});

export type Env = Static<typeof EnvSchema>;

const parseNumber = (value: string | undefined, fallback: number): number =>
  value != null && value !== '' ? Number.parseInt(value, 10) : fallback;

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Env => {
  const rawEnv = {
    NODE_ENV: env['NODE_ENV'] ?? 'development',
    PORT: parseNumber(env['PORT'], 3000),
    HOST: env['HOST'] ?? '0.0.0.0',
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'info',
    DATABASE_URL: env['DATABASE_URL'],
    JWT_SECRET: env['JWT_SECRET'],
    SESSION_TTL_HOURS: parseNumber(env['SESSION_TTL_HOURS'], 24),
    AVATAR_DIR: env['AVATAR_DIR'] ?? './static/avatars',
    MAX_AVATAR_BYTES: parseNumber(env['MAX_AVATAR_BYTES'], DEFAULT_MAX_AVATAR_BYTES),
    ALLOWED_ORIGINS: env['ALLOWED_ORIGINS'],
    CLIENT_BASE_URL: env['CLIENT_BASE_URL'],
  };

  // Validate against schema
  if (!Value.Check(EnvSchema, rawEnv)) {
    const errors = [...Value.Errors(EnvSchema, rawEnv)];
    const errorMessages = errors.map((e) => `${e.path}: ${e.message}`).join(', ');
    throw new Error(`Invalid environment configuration: ${errorMessages}`);
  }

  return rawEnv;
};

/**
 * Create a typed configuration object from environment
 */
export const createConfig = (env: Env) => ({
  server: {
    port: env.PORT,
    host: env.HOST,
    isDevelopment: env.NODE_ENV === 'development',
    isProduction: env.NODE_ENV === 'production',
    isTest: env.NODE_ENV === 'test',
  },
  logger: {
    level: env.LOG_LEVEL,
    pretty: env.NODE_ENV !== 'production',
  },
  database: {
    url: env.DATABASE_URL,
  },
  cors: {
    allowedOrigins: env.ALLOWED_ORIGINS,
    clientBaseUrl: env.CLIENT_BASE_URL,
  },
  auth: {
    /** HMAC secret used to sign session tokens */
    jwtSecret: env.JWT_SECRET,
    sessionTtlHours: env.SESSION_TTL_HOURS,
    /** Session cookie is marked Secure outside development */
    secureCookies: env.NODE_ENV === 'production',
  },
  avatars: {
    dir: env.AVATAR_DIR,
    maxBytes: env.MAX_AVATAR_BYTES,
  },
});

export type AppConfig = ReturnType<typeof createConfig>;
