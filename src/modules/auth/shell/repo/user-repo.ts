/**
 * User Repository Implementation
 *
 * Kysely-based implementation for the users table.
 */

import { randomUUID } from 'crypto';

import { ok, err, type Result } from 'neverthrow';

import { isUniqueViolation } from '@/infra/database/client.js';

import {
  createAuthProviderError,
  createUserExistsError,
  type AuthError,
} from '../../core/errors.js';
import { toUserId, type User } from '../../core/types.js';

import type { UserRepository } from '../../core/ports.js';
import type { DbClient, Users } from '@/infra/database/client.js';
import type { Selectable } from 'kysely';
import type { Logger } from 'pino';

export interface UserRepoOptions {
  db: DbClient;
  logger: Logger;
}

const USER_COLUMNS = ['id', 'email', 'password_hash', 'is_active', 'created_at'] as const;

class KyselyUserRepo implements UserRepository {
  private readonly db: DbClient;
  private readonly log: Logger;

  constructor(options: UserRepoOptions) {
    this.db = options.db;
    this.log = options.logger.child({ repo: 'UserRepo' });
  }

  async create(input: { email: string; passwordHash: string }): Promise<Result<User, AuthError>> {
    this.log.debug('Creating user');

    try {
      const row = await this.db
        .insertInto('users')
        .values({ id: randomUUID(), email: input.email, password_hash: input.passwordHash })
        .returning(USER_COLUMNS)
        .executeTakeFirstOrThrow();

      return ok(this.mapRow(row));
    } catch (error) {
      if (isUniqueViolation(error)) {
        return err(createUserExistsError(input.email));
      }
      this.log.error({ err: error }, 'Failed to create user');
      return err(createAuthProviderError('Failed to create user', error));
    }
  }

  async getByEmail(email: string): Promise<Result<User | null, AuthError>> {
    try {
      const row = await this.db
        .selectFrom('users')
        .select(USER_COLUMNS)
        .where('email', '=', email)
        .executeTakeFirst();

      return ok(row !== undefined ? this.mapRow(row) : null);
    } catch (error) {
      this.log.error({ err: error }, 'Failed to find user by email');
      return err(createAuthProviderError('Failed to find user', error));
    }
  }

  async getById(id: string): Promise<Result<User | null, AuthError>> {
    try {
      const row = await this.db
        .selectFrom('users')
        .select(USER_COLUMNS)
        .where('id', '=', id)
        .executeTakeFirst();

      return ok(row !== undefined ? this.mapRow(row) : null);
    } catch (error) {
      this.log.error({ err: error, id }, 'Failed to find user by id');
      return err(createAuthProviderError('Failed to find user', error));
    }
  }

  private mapRow(row: Selectable<Users>): User {
    return {
      id: toUserId(row.id),
      email: row.email,
      passwordHash: row.password_hash,
      isActive: row.is_active,
      createdAt: new Date(row.created_at),
    };
  }
}

export const makeUserRepo = (options: UserRepoOptions): UserRepository => {
  return new KyselyUserRepo(options);
};
