/**
 * Avatar URL writer backed by the frogols repository.
 */

import { ok, err } from 'neverthrow';

import { createDatabaseError } from '../../core/errors.js';

import type { FrogolRepository } from '../../../frogols/core/ports.js';
import type { AvatarUrlWriter } from '../../core/ports.js';

export const makeAvatarUrlWriter = (
  frogolRepo: Pick<FrogolRepository, 'setAvatarUrl'>
): AvatarUrlWriter => ({
  async setAvatarUrl(frogolId, avatarUrl) {
    const result = await frogolRepo.setAvatarUrl(frogolId, avatarUrl);
    if (result.isErr()) {
      return err(createDatabaseError(result.error.message, result.error));
    }
    return ok(undefined);
  },
});
