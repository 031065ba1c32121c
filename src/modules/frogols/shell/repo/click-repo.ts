/**
 * Click Repository Implementation
 *
 * Kysely-based implementation for the append-only clicks table.
 */

import { randomUUID } from 'crypto';

import { ok, err, type Result } from 'neverthrow';

import { createDatabaseError, type FrogolError } from '../../core/errors.js';

import type { ClickRepository } from '../../core/ports.js';
import type { LinkClickCount, RecordClickInput } from '../../core/types.js';
import type { DbClient } from '@/infra/database/client.js';
import type { Logger } from 'pino';

export interface ClickRepoOptions {
  db: DbClient;
  logger: Logger;
}

class KyselyClickRepo implements ClickRepository {
  private readonly db: DbClient;
  private readonly log: Logger;

  constructor(options: ClickRepoOptions) {
    this.db = options.db;
    this.log = options.logger.child({ repo: 'ClickRepo' });
  }

  async record(input: RecordClickInput): Promise<Result<void, FrogolError>> {
    this.log.debug({ linkId: input.linkId }, 'Recording click');

    try {
      await this.db
        .insertInto('clicks')
        .values({
          id: randomUUID(),
          link_id: input.linkId,
          ip_address: input.ipAddress,
          user_agent: input.userAgent,
        })
        .execute();

      return ok(undefined);
    } catch (error) {
      this.log.error({ err: error, linkId: input.linkId }, 'Failed to record click');
      return err(createDatabaseError('Failed to record click', error));
    }
  }

  async countClicks(frogolId: string): Promise<Result<number, FrogolError>> {
    try {
      const row = await this.db
        .selectFrom('clicks as c')
        .innerJoin('links as l', 'l.id', 'c.link_id')
        .select((eb) => eb.fn.countAll<string>().as('count'))
        .where('l.frogol_id', '=', frogolId)
        .executeTakeFirstOrThrow();

      return ok(Number(row.count));
    } catch (error) {
      this.log.error({ err: error, frogolId }, 'Failed to count clicks');
      return err(createDatabaseError('Failed to count clicks', error));
    }
  }

  async countUniqueIps(frogolId: string): Promise<Result<number, FrogolError>> {
    try {
      // COUNT(DISTINCT col) skips NULL addresses
      const row = await this.db
        .selectFrom('clicks as c')
        .innerJoin('links as l', 'l.id', 'c.link_id')
        .select((eb) => eb.fn.count<string>('c.ip_address').distinct().as('count'))
        .where('l.frogol_id', '=', frogolId)
        .executeTakeFirstOrThrow();

      return ok(Number(row.count));
    } catch (error) {
      this.log.error({ err: error, frogolId }, 'Failed to count unique click IPs');
      return err(createDatabaseError('Failed to count unique click IPs', error));
    }
  }

  async clicksPerLink(frogolId: string): Promise<Result<LinkClickCount[], FrogolError>> {
    try {
      const rows = await this.db
        .selectFrom('links as l')
        .leftJoin('clicks as c', 'c.link_id', 'l.id')
        .select((eb) => ['l.id', eb.fn.count<string>('c.id').as('count')])
        .where('l.frogol_id', '=', frogolId)
        .groupBy('l.id')
        .execute();

      return ok(rows.map((row) => ({ linkId: row.id, count: Number(row.count) })));
    } catch (error) {
      this.log.error({ err: error, frogolId }, 'Failed to count clicks per link');
      return err(createDatabaseError('Failed to count clicks per link', error));
    }
  }
}

export const makeClickRepo = (options: ClickRepoOptions): ClickRepository => {
  return new KyselyClickRepo(options);
};
