/**
 * Link Repository Implementation
 *
 * Kysely-based implementation for the links table.
 */

import { randomUUID } from 'crypto';

import { ok, err, type Result } from 'neverthrow';

import { createDatabaseError, type FrogolError } from '../../core/errors.js';
import { DEFAULT_LINK_KIND } from '../../core/types.js';

import type { LinkRepository } from '../../core/ports.js';
import type { CreateLinkInput, Link, UpdateLinkInput } from '../../core/types.js';
import type { DbClient, Links } from '@/infra/database/client.js';
import type { Selectable } from 'kysely';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface LinkRepoOptions {
  db: DbClient;
  logger: Logger;
}

const LINK_COLUMNS = [
  'id',
  'frogol_id',
  'url',
  'label',
  'sort_order',
  'is_active',
  'kind',
  'created_at',
] as const;

// ─────────────────────────────────────────────────────────────────────────────
// Repository Implementation
// ─────────────────────────────────────────────────────────────────────────────

class KyselyLinkRepo implements LinkRepository {
  private readonly db: DbClient;
  private readonly log: Logger;

  constructor(options: LinkRepoOptions) {
    this.db = options.db;
    this.log = options.logger.child({ repo: 'LinkRepo' });
  }

  async create(input: CreateLinkInput): Promise<Result<Link, FrogolError>> {
    this.log.debug({ frogolId: input.frogolId, sortOrder: input.sortOrder }, 'Creating link');

    try {
      const row = await this.db
        .insertInto('links')
        .values({
          id: randomUUID(),
          frogol_id: input.frogolId,
          url: input.url,
          label: input.label,
          sort_order: input.sortOrder,
          is_active: true,
          kind: DEFAULT_LINK_KIND,
        })
        .returning(LINK_COLUMNS)
        .executeTakeFirstOrThrow();

      return ok(this.mapRow(row));
    } catch (error) {
      this.log.error({ err: error, frogolId: input.frogolId }, 'Failed to create link');
      return err(createDatabaseError('Failed to create link', error));
    }
  }

  async nextSortOrder(frogolId: string): Promise<Result<number, FrogolError>> {
    try {
      const row = await this.db
        .selectFrom('links')
        .select((eb) => eb.fn.max<number | null>('sort_order').as('max_order'))
        .where('frogol_id', '=', frogolId)
        .executeTakeFirst();

      const maxOrder = row?.max_order ?? null;
      return ok(maxOrder === null ? 0 : Number(maxOrder) + 1);
    } catch (error) {
      this.log.error({ err: error, frogolId }, 'Failed to compute next sort order');
      return err(createDatabaseError('Failed to compute next sort order', error));
    }
  }

  async listActive(frogolId: string): Promise<Result<Link[], FrogolError>> {
    this.log.debug({ frogolId }, 'Listing active links');

    try {
      const rows = await this.db
        .selectFrom('links')
        .select(LINK_COLUMNS)
        .where('frogol_id', '=', frogolId)
        .where('is_active', '=', true)
        .orderBy('sort_order')
        .orderBy('id')
        .execute();

      return ok(rows.map((row) => this.mapRow(row)));
    } catch (error) {
      this.log.error({ err: error, frogolId }, 'Failed to list active links');
      return err(createDatabaseError('Failed to list active links', error));
    }
  }

  async listAll(frogolId: string): Promise<Result<Link[], FrogolError>> {
    this.log.debug({ frogolId }, 'Listing all links');

    try {
      const rows = await this.db
        .selectFrom('links')
        .select(LINK_COLUMNS)
        .where('frogol_id', '=', frogolId)
        .orderBy('sort_order')
        .orderBy('id')
        .execute();

      return ok(rows.map((row) => this.mapRow(row)));
    } catch (error) {
      this.log.error({ err: error, frogolId }, 'Failed to list links');
      return err(createDatabaseError('Failed to list links', error));
    }
  }

  async getById(id: string): Promise<Result<Link | null, FrogolError>> {
    try {
      const row = await this.db
        .selectFrom('links')
        .select(LINK_COLUMNS)
        .where('id', '=', id)
        .executeTakeFirst();

      return ok(row !== undefined ? this.mapRow(row) : null);
    } catch (error) {
      this.log.error({ err: error, id }, 'Failed to find link');
      return err(createDatabaseError('Failed to find link', error));
    }
  }

  async update(id: string, input: UpdateLinkInput): Promise<Result<Link | null, FrogolError>> {
    this.log.debug({ id }, 'Updating link');

    try {
      const row = await this.db
        .updateTable('links')
        .set({ url: input.url, label: input.label })
        .where('id', '=', id)
        .returning(LINK_COLUMNS)
        .executeTakeFirst();

      return ok(row !== undefined ? this.mapRow(row) : null);
    } catch (error) {
      this.log.error({ err: error, id }, 'Failed to update link');
      return err(createDatabaseError('Failed to update link', error));
    }
  }

  async setActive(id: string, isActive: boolean): Promise<Result<Link | null, FrogolError>> {
    this.log.debug({ id, isActive }, 'Setting link active flag');

    try {
      const row = await this.db
        .updateTable('links')
        .set({ is_active: isActive })
        .where('id', '=', id)
        .returning(LINK_COLUMNS)
        .executeTakeFirst();

      return ok(row !== undefined ? this.mapRow(row) : null);
    } catch (error) {
      this.log.error({ err: error, id }, 'Failed to set link active flag');
      return err(createDatabaseError('Failed to set link active flag', error));
    }
  }

  async delete(id: string): Promise<Result<boolean, FrogolError>> {
    this.log.debug({ id }, 'Deleting link');

    try {
      const result = await this.db.deleteFrom('links').where('id', '=', id).executeTakeFirst();
      return ok(result.numDeletedRows > 0n);
    } catch (error) {
      this.log.error({ err: error, id }, 'Failed to delete link');
      return err(createDatabaseError('Failed to delete link', error));
    }
  }

  async reassignSortOrders(
    frogolId: string,
    orderedIds: readonly string[]
  ): Promise<Result<void, FrogolError>> {
    this.log.debug({ frogolId, count: orderedIds.length }, 'Reassigning link sort orders');

    try {
      await this.db.transaction().execute(async (trx) => {
        for (const [index, id] of orderedIds.entries()) {
          await trx
            .updateTable('links')
            .set({ sort_order: index })
            .where('id', '=', id)
            .where('frogol_id', '=', frogolId)
            .execute();
        }
      });

      return ok(undefined);
    } catch (error) {
      this.log.error({ err: error, frogolId }, 'Failed to reassign link sort orders');
      return err(createDatabaseError('Failed to reorder links', error));
    }
  }

  private mapRow(row: Selectable<Links>): Link {
    return {
      id: row.id,
      frogolId: row.frogol_id,
      url: row.url,
      label: row.label,
      sortOrder: row.sort_order,
      isActive: row.is_active,
      kind: row.kind,
      createdAt: new Date(row.created_at),
    };
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Factory
// ─────────────────────────────────────────────────────────────────────────────

export const makeLinkRepo = (options: LinkRepoOptions): LinkRepository => {
  return new KyselyLinkRepo(options);
};
