/**
 * Filesystem storage for avatar files.
 */

import fs from 'node:fs/promises';
import path from 'node:path';

import { ok, err } from 'neverthrow';

import { createInternalError } from '../../core/errors.js';

import type { AvatarStorage } from '../../core/ports.js';
import type { Logger } from 'pino';

export interface FsAvatarStorageOptions {
  /** Directory the files are written to; created on first save */
  dir: string;
  logger: Logger;
}

const isMissingFile = (error: unknown): boolean =>
  typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';

export const makeFsAvatarStorage = (options: FsAvatarStorageOptions): AvatarStorage => {
  const { dir } = options;
  const log = options.logger.child({ storage: 'FsAvatarStorage' });

  return {
    async save(filename, data) {
      const target = path.join(dir, filename);

      try {
        await fs.mkdir(dir, { recursive: true });
        await fs.writeFile(target, data);
      } catch (error) {
        log.error({ err: error, target }, 'Failed to save avatar file');
        return err(createInternalError('Failed to save uploaded image.', error));
      }

      log.debug({ filename }, 'Saved avatar file');
      return ok(undefined);
    },

    async remove(filename) {
      const target = path.join(dir, filename);

      try {
        await fs.unlink(target);
      } catch (error) {
        if (isMissingFile(error)) {
          log.warn({ filename }, 'Avatar file not found for deletion');
          return ok(undefined);
        }
        log.error({ err: error, target }, 'Failed to delete avatar file');
        return err(createInternalError(`Failed to delete image file: ${filename}`, error));
      }

      log.info({ filename }, 'Deleted avatar file');
      return ok(undefined);
    },
  };
};
