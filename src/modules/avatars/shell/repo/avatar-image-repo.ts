/**
 * Avatar Image Repository Implementation
 *
 * Kysely-based implementation for the frogol_avatar_images table.
 */

import { randomUUID } from 'crypto';

import { ok, err, type Result } from 'neverthrow';

import { createDatabaseError, type AvatarError } from '../../core/errors.js';

import type { AvatarImageRepository } from '../../core/ports.js';
import type { AvatarImage } from '../../core/types.js';
import type { DbClient, FrogolAvatarImages } from '@/infra/database/client.js';
import type { Selectable } from 'kysely';
import type { Logger } from 'pino';

export interface AvatarImageRepoOptions {
  db: DbClient;
  logger: Logger;
}

const AVATAR_IMAGE_COLUMNS = ['id', 'frogol_id', 'image_filename', 'created_at'] as const;

class KyselyAvatarImageRepo implements AvatarImageRepository {
  private readonly db: DbClient;
  private readonly log: Logger;

  constructor(options: AvatarImageRepoOptions) {
    this.db = options.db;
    this.log = options.logger.child({ repo: 'AvatarImageRepo' });
  }

  async create(input: {
    frogolId: string;
    imageFilename: string;
  }): Promise<Result<AvatarImage, AvatarError>> {
    try {
      const row = await this.db
        .insertInto('frogol_avatar_images')
        .values({
          id: randomUUID(),
          frogol_id: input.frogolId,
          image_filename: input.imageFilename,
        })
        .returning(AVATAR_IMAGE_COLUMNS)
        .executeTakeFirstOrThrow();

      return ok(this.mapRow(row));
    } catch (error) {
      this.log.error({ err: error, frogolId: input.frogolId }, 'Failed to record avatar image');
      return err(createDatabaseError('Failed to record avatar image', error));
    }
  }

  async listForFrogol(frogolId: string): Promise<Result<AvatarImage[], AvatarError>> {
    try {
      const rows = await this.db
        .selectFrom('frogol_avatar_images')
        .select(AVATAR_IMAGE_COLUMNS)
        .where('frogol_id', '=', frogolId)
        .orderBy('created_at', 'desc')
        .execute();

      return ok(rows.map((row) => this.mapRow(row)));
    } catch (error) {
      this.log.error({ err: error, frogolId }, 'Failed to list avatar images');
      return err(createDatabaseError('Failed to list avatar images', error));
    }
  }

  async deleteForFrogol(frogolId: string): Promise<Result<number, AvatarError>> {
    this.log.debug({ frogolId }, 'Deleting avatar image records');

    try {
      const result = await this.db
        .deleteFrom('frogol_avatar_images')
        .where('frogol_id', '=', frogolId)
        .executeTakeFirst();

      return ok(Number(result.numDeletedRows));
    } catch (error) {
      this.log.error({ err: error, frogolId }, 'Failed to delete avatar image records');
      return err(createDatabaseError('Failed to delete avatar image records', error));
    }
  }

  private mapRow(row: Selectable<FrogolAvatarImages>): AvatarImage {
    return {
      id: row.id,
      frogolId: row.frogol_id,
      imageFilename: row.image_filename,
      createdAt: new Date(row.created_at),
    };
  }
}

export const makeAvatarImageRepo = (options: AvatarImageRepoOptions): AvatarImageRepository => {
  return new KyselyAvatarImageRepo(options);
};
