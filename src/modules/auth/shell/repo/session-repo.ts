/**
 * Session Repository Implementation
 *
 * Kysely-based implementation for the sessions table.
 */

import { randomUUID } from 'crypto';

import { ok, err, type Result } from 'neverthrow';

import { createAuthProviderError, type AuthError } from '../../core/errors.js';
import { toUserId, type SessionRecord, type UserId } from '../../core/types.js';

import type { SessionRepository } from '../../core/ports.js';
import type { DbClient, Sessions } from '@/infra/database/client.js';
import type { Selectable } from 'kysely';
import type { Logger } from 'pino';

export interface SessionRepoOptions {
  db: DbClient;
  logger: Logger;
}

const SESSION_COLUMNS = ['id', 'user_id', 'token', 'expires_at', 'created_at'] as const;

class KyselySessionRepo implements SessionRepository {
  private readonly db: DbClient;
  private readonly log: Logger;

  constructor(options: SessionRepoOptions) {
    this.db = options.db;
    this.log = options.logger.child({ repo: 'SessionRepo' });
  }

  async create(input: {
    userId: UserId;
    token: string;
    expiresAt: Date;
  }): Promise<Result<SessionRecord, AuthError>> {
    this.log.debug({ userId: input.userId }, 'Creating session');

    try {
      const row = await this.db
        .insertInto('sessions')
        .values({
          id: randomUUID(),
          user_id: input.userId,
          token: input.token,
          expires_at: input.expiresAt,
        })
        .returning(SESSION_COLUMNS)
        .executeTakeFirstOrThrow();

      return ok(this.mapRow(row));
    } catch (error) {
      this.log.error({ err: error, userId: input.userId }, 'Failed to create session');
      return err(createAuthProviderError('Failed to create session', error));
    }
  }

  async getByToken(token: string): Promise<Result<SessionRecord | null, AuthError>> {
    try {
      const row = await this.db
        .selectFrom('sessions')
        .select(SESSION_COLUMNS)
        .where('token', '=', token)
        .executeTakeFirst();

      return ok(row !== undefined ? this.mapRow(row) : null);
    } catch (error) {
      this.log.error({ err: error }, 'Failed to find session');
      return err(createAuthProviderError('Failed to find session', error));
    }
  }

  async deleteByToken(token: string): Promise<Result<void, AuthError>> {
    try {
      await this.db.deleteFrom('sessions').where('token', '=', token).execute();
      return ok(undefined);
    } catch (error) {
      this.log.error({ err: error }, 'Failed to delete session');
      return err(createAuthProviderError('Failed to delete session', error));
    }
  }

  private mapRow(row: Selectable<Sessions>): SessionRecord {
    return {
      id: row.id,
      userId: toUserId(row.user_id),
      token: row.token,
      expiresAt: new Date(row.expires_at),
    };
  }
}

export const makeSessionRepo = (options: SessionRepoOptions): SessionRepository => {
  return new KyselySessionRepo(options);
};
