import { Kysely, PostgresDialect } from 'kysely';
import pg from 'pg';

import type { Database } from './types.js';
import type { AppConfig } from '../config/env.js';

const { Pool: PG_POOL } = pg;

export type DbClient = Kysely<Database>;

/** Postgres error code for unique constraint violations */
export const UNIQUE_VIOLATION = '23505';

/**
 * Create a Kysely instance for a database URL
 */
const createClient = (connectionString: string): DbClient => {
  return new Kysely<Database>({
    dialect: new PostgresDialect({
      pool: new PG_POOL({
        connectionString,
        max: 10, // connection pool size
      }),
    }),
  });
};

/**
 * Initialize the database client.
 * The pool is the only process-wide shared resource; it is passed explicitly to repositories.
 */
export const initDatabase = (config: AppConfig): DbClient => {
  const { url } = config.database;

  if (url === '') {
    throw new Error('Missing configuration for database (DATABASE_URL)');
  }

  return createClient(url);
};

/**
 * Checks whether a driver error is a unique constraint violation.
 */
export const isUniqueViolation = (error: unknown): boolean => {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === UNIQUE_VIOLATION
  );
};

export type * from './types.js';
