/**
 * Lead Repository Implementation
 *
 * Kysely-based implementation for the leads table.
 */

import { randomUUID } from 'crypto';

import { ok, err, type Result } from 'neverthrow';

import { createDatabaseError, type LeadError } from '../../core/errors.js';

import type { LeadRepository } from '../../core/ports.js';
import type { CreateLeadInput, Lead, UpdateLeadInput } from '../../core/types.js';
import type { DbClient, Leads } from '@/infra/database/client.js';
import type { Selectable } from 'kysely';
import type { Logger } from 'pino';

export interface LeadRepoOptions {
  db: DbClient;
  logger: Logger;
}

const LEAD_COLUMNS = [
  'id',
  'frogol_id',
  'email',
  'source',
  'score',
  'message',
  'created_at',
] as const;

class KyselyLeadRepo implements LeadRepository {
  private readonly db: DbClient;
  private readonly log: Logger;

  constructor(options: LeadRepoOptions) {
    this.db = options.db;
    this.log = options.logger.child({ repo: 'LeadRepo' });
  }

  async create(input: CreateLeadInput): Promise<Result<Lead, LeadError>> {
    this.log.debug({ frogolId: input.frogolId, source: input.source }, 'Creating lead');

    try {
      const row = await this.db
        .insertInto('leads')
        .values({
          id: randomUUID(),
          frogol_id: input.frogolId,
          email: input.email,
          source: input.source,
          score: input.score,
          message: input.message,
        })
        .returning(LEAD_COLUMNS)
        .executeTakeFirstOrThrow();

      return ok(this.mapRow(row));
    } catch (error) {
      this.log.error({ err: error, frogolId: input.frogolId }, 'Failed to create lead');
      return err(createDatabaseError('Failed to create lead', error));
    }
  }

  async listForFrogol(frogolId: string): Promise<Result<Lead[], LeadError>> {
    this.log.debug({ frogolId }, 'Listing leads');

    try {
      const rows = await this.db
        .selectFrom('leads')
        .select(LEAD_COLUMNS)
        .where('frogol_id', '=', frogolId)
        .orderBy('created_at', 'desc')
        .execute();

      return ok(rows.map((row) => this.mapRow(row)));
    } catch (error) {
      this.log.error({ err: error, frogolId }, 'Failed to list leads');
      return err(createDatabaseError('Failed to list leads', error));
    }
  }

  async getById(id: string): Promise<Result<Lead | null, LeadError>> {
    try {
      const row = await this.db
        .selectFrom('leads')
        .select(LEAD_COLUMNS)
        .where('id', '=', id)
        .executeTakeFirst();

      return ok(row !== undefined ? this.mapRow(row) : null);
    } catch (error) {
      this.log.error({ err: error, id }, 'Failed to find lead');
      return err(createDatabaseError('Failed to find lead', error));
    }
  }

  async update(id: string, input: UpdateLeadInput): Promise<Result<Lead | null, LeadError>> {
    this.log.debug({ id }, 'Updating lead');

    try {
      const row = await this.db
        .updateTable('leads')
        .set({
          email: input.email,
          source: input.source,
          score: input.score,
          message: input.message,
        })
        .where('id', '=', id)
        .returning(LEAD_COLUMNS)
        .executeTakeFirst();

      return ok(row !== undefined ? this.mapRow(row) : null);
    } catch (error) {
      this.log.error({ err: error, id }, 'Failed to update lead');
      return err(createDatabaseError('Failed to update lead', error));
    }
  }

  async delete(id: string): Promise<Result<boolean, LeadError>> {
    this.log.debug({ id }, 'Deleting lead');

    try {
      const result = await this.db.deleteFrom('leads').where('id', '=', id).executeTakeFirst();
      return ok(result.numDeletedRows > 0n);
    } catch (error) {
      this.log.error({ err: error, id }, 'Failed to delete lead');
      return err(createDatabaseError('Failed to delete lead', error));
    }
  }

  private mapRow(row: Selectable<Leads>): Lead {
    return {
      id: row.id,
      frogolId: row.frogol_id,
      email: row.email,
      source: row.source,
      score: row.score,
      message: row.message,
      createdAt: new Date(row.created_at),
    };
  }
}

export const makeLeadRepo = (options: LeadRepoOptions): LeadRepository => {
  return new KyselyLeadRepo(options);
};
