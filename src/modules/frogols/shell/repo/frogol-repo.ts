/**
 * Frogol Repository Implementation
 *
 * Kysely-based implementation for the frogols table.
 */

import { randomUUID } from 'crypto';

import { ok, err, type Result } from 'neverthrow';

import { isUniqueViolation } from '@/infra/database/client.js';

import {
  createDatabaseError,
  createSlugTakenError,
  type FrogolError,
} from '../../core/errors.js';
import { DEFAULT_DISPLAY_NAME, TOP_FROGOLS_LIMIT } from '../../core/types.js';

import type { FrogolRepository } from '../../core/ports.js';
import type {
  CreateFrogolInput,
  Frogol,
  FrogolSummary,
  UpdateFrogolInput,
  UserAnalytics,
} from '../../core/types.js';
import type { DbClient, Frogols } from '@/infra/database/client.js';
import type { Selectable } from 'kysely';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface FrogolRepoOptions {
  db: DbClient;
  logger: Logger;
}

interface SummaryRow {
  id: string;
  slug: string;
  display_name: string | null;
  created_at: Date;
  total_links: string | number | bigint;
  total_leads: string | number | bigint;
  total_clicks: string | number | bigint;
}

const FROGOL_COLUMNS = [
  'id',
  'user_id',
  'slug',
  'display_name',
  'theme',
  'avatar_url',
  'bio',
  'created_at',
] as const;

// ─────────────────────────────────────────────────────────────────────────────
// Repository Implementation
// ─────────────────────────────────────────────────────────────────────────────

class KyselyFrogolRepo implements FrogolRepository {
  private readonly db: DbClient;
  private readonly log: Logger;

  constructor(options: FrogolRepoOptions) {
    this.db = options.db;
    this.log = options.logger.child({ repo: 'FrogolRepo' });
  }

  async create(input: CreateFrogolInput): Promise<Result<Frogol, FrogolError>> {
    this.log.debug({ userId: input.userId, slug: input.slug }, 'Creating frogol');

    try {
      const row = await this.db
        .insertInto('frogols')
        .values({
          id: randomUUID(),
          user_id: input.userId,
          slug: input.slug,
          display_name: input.displayName,
          theme: null,
          avatar_url: null,
          bio: null,
        })
        .returning(FROGOL_COLUMNS)
        .executeTakeFirstOrThrow();

      return ok(this.mapRow(row));
    } catch (error) {
      if (isUniqueViolation(error)) {
        this.log.debug({ slug: input.slug }, 'Slug taken by concurrent insert');
        return err(createSlugTakenError(input.slug));
      }
      this.log.error({ err: error, slug: input.slug }, 'Failed to create frogol');
      return err(createDatabaseError('Failed to create frogol', error));
    }
  }

  async getBySlug(slug: string): Promise<Result<Frogol | null, FrogolError>> {
    this.log.debug({ slug }, 'Finding frogol by slug');

    try {
      const row = await this.db
        .selectFrom('frogols')
        .select(FROGOL_COLUMNS)
        .where('slug', '=', slug)
        .executeTakeFirst();

      return ok(row !== undefined ? this.mapRow(row) : null);
    } catch (error) {
      this.log.error({ err: error, slug }, 'Failed to find frogol by slug');
      return err(createDatabaseError('Failed to find frogol by slug', error));
    }
  }

  async getById(id: string): Promise<Result<Frogol | null, FrogolError>> {
    this.log.debug({ id }, 'Finding frogol by id');

    try {
      const row = await this.db
        .selectFrom('frogols')
        .select(FROGOL_COLUMNS)
        .where('id', '=', id)
        .executeTakeFirst();

      return ok(row !== undefined ? this.mapRow(row) : null);
    } catch (error) {
      this.log.error({ err: error, id }, 'Failed to find frogol by id');
      return err(createDatabaseError('Failed to find frogol by id', error));
    }
  }

  async listSummariesForUser(userId: string): Promise<Result<FrogolSummary[], FrogolError>> {
    this.log.debug({ userId }, 'Listing frogols for user');

    try {
      const rows = await this.summaryQuery(userId).orderBy('f.created_at', 'desc').execute();
      return ok(rows.map((row) => this.mapSummaryRow(row)));
    } catch (error) {
      this.log.error({ err: error, userId }, 'Failed to list frogols for user');
      return err(createDatabaseError('Failed to list frogols for user', error));
    }
  }

  async update(id: string, input: UpdateFrogolInput): Promise<Result<Frogol | null, FrogolError>> {
    this.log.debug({ id }, 'Updating frogol');

    try {
      const row = await this.db
        .updateTable('frogols')
        .set({
          display_name: input.displayName,
          theme: input.theme,
          ...(input.avatarUrl !== undefined && { avatar_url: input.avatarUrl }),
          ...(input.bio !== undefined && { bio: input.bio }),
        })
        .where('id', '=', id)
        .returning(FROGOL_COLUMNS)
        .executeTakeFirst();

      return ok(row !== undefined ? this.mapRow(row) : null);
    } catch (error) {
      this.log.error({ err: error, id }, 'Failed to update frogol');
      return err(createDatabaseError('Failed to update frogol', error));
    }
  }

  async setAvatarUrl(
    id: string,
    avatarUrl: string | null
  ): Promise<Result<Frogol | null, FrogolError>> {
    this.log.debug({ id, avatarUrl }, 'Setting frogol avatar URL');

    try {
      const row = await this.db
        .updateTable('frogols')
        .set({ avatar_url: avatarUrl })
        .where('id', '=', id)
        .returning(FROGOL_COLUMNS)
        .executeTakeFirst();

      return ok(row !== undefined ? this.mapRow(row) : null);
    } catch (error) {
      this.log.error({ err: error, id }, 'Failed to set frogol avatar URL');
      return err(createDatabaseError('Failed to set frogol avatar URL', error));
    }
  }

  async delete(id: string): Promise<Result<boolean, FrogolError>> {
    this.log.debug({ id }, 'Deleting frogol');

    try {
      const result = await this.db.deleteFrom('frogols').where('id', '=', id).executeTakeFirst();
      return ok(result.numDeletedRows > 0n);
    } catch (error) {
      this.log.error({ err: error, id }, 'Failed to delete frogol');
      return err(createDatabaseError('Failed to delete frogol', error));
    }
  }

  async getUserAnalytics(userId: string): Promise<Result<UserAnalytics, FrogolError>> {
    this.log.debug({ userId }, 'Computing user analytics');

    try {
      const [frogols, links, leads, clicks, top] = await Promise.all([
        this.db
          .selectFrom('frogols')
          .select((eb) => eb.fn.countAll<string>().as('count'))
          .where('user_id', '=', userId)
          .executeTakeFirstOrThrow(),
        this.db
          .selectFrom('links as l')
          .innerJoin('frogols as f', 'f.id', 'l.frogol_id')
          .select((eb) => eb.fn.countAll<string>().as('count'))
          .where('f.user_id', '=', userId)
          .executeTakeFirstOrThrow(),
        this.db
          .selectFrom('leads as ld')
          .innerJoin('frogols as f', 'f.id', 'ld.frogol_id')
          .select((eb) => eb.fn.countAll<string>().as('count'))
          .where('f.user_id', '=', userId)
          .executeTakeFirstOrThrow(),
        this.db
          .selectFrom('clicks as c')
          .innerJoin('links as l', 'l.id', 'c.link_id')
          .innerJoin('frogols as f', 'f.id', 'l.frogol_id')
          .select((eb) => eb.fn.countAll<string>().as('count'))
          .where('f.user_id', '=', userId)
          .executeTakeFirstOrThrow(),
        this.summaryQuery(userId)
          .orderBy('total_clicks', 'desc')
          .orderBy('total_leads', 'desc')
          .limit(TOP_FROGOLS_LIMIT)
          .execute(),
      ]);

      return ok({
        totalFrogols: Number(frogols.count),
        totalLinks: Number(links.count),
        totalLeads: Number(leads.count),
        totalClicks: Number(clicks.count),
        topFrogols: top.map((row) => this.mapSummaryRow(row)),
      });
    } catch (error) {
      this.log.error({ err: error, userId }, 'Failed to compute user analytics');
      return err(createDatabaseError('Failed to compute user analytics', error));
    }
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Helpers
  // ───────────────────────────────────────────────────────────────────────────

  private summaryQuery(userId: string) {
    return this.db
      .selectFrom('frogols as f')
      .leftJoin('links as l', 'l.frogol_id', 'f.id')
      .leftJoin('leads as ld', 'ld.frogol_id', 'f.id')
      .leftJoin('clicks as c', 'c.link_id', 'l.id')
      .select((eb) => [
        'f.id',
        'f.slug',
        'f.display_name',
        'f.created_at',
        eb.fn.count<string>('l.id').distinct().as('total_links'),
        eb.fn.count<string>('ld.id').distinct().as('total_leads'),
        eb.fn.count<string>('c.id').distinct().as('total_clicks'),
      ])
      .where('f.user_id', '=', userId)
      .groupBy(['f.id', 'f.slug', 'f.display_name', 'f.created_at']);
  }

  private mapRow(row: Selectable<Frogols>): Frogol {
    return {
      id: row.id,
      userId: row.user_id,
      slug: row.slug,
      displayName: row.display_name,
      theme: row.theme,
      avatarUrl: row.avatar_url,
      bio: row.bio,
      createdAt: new Date(row.created_at),
    };
  }

  private mapSummaryRow(row: SummaryRow): FrogolSummary {
    return {
      id: row.id,
      slug: row.slug,
      displayName: row.display_name ?? DEFAULT_DISPLAY_NAME,
      totalLinks: Number(row.total_links),
      totalLeads: Number(row.total_leads),
      totalClicks: Number(row.total_clicks),
      createdAt: new Date(row.created_at),
    };
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Factory
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates a Kysely-backed frogol repository.
 */
export const makeFrogolRepo = (options: FrogolRepoOptions): FrogolRepository => {
  return new KyselyFrogolRepo(options);
};
