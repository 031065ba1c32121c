/**
 * Clear Avatar Use Case
 */

import { ok, err, type Result } from 'neverthrow';

import { deleteAvatars, type DeleteAvatarsDeps } from './delete-avatars.js';

import type { AvatarError } from '../errors.js';
import type { AvatarUrlWriter } from '../ports.js';

export interface ClearAvatarDeps extends DeleteAvatarsDeps {
  avatarUrlWriter: AvatarUrlWriter;
}

/**
 * Removes the avatar images and unsets the profile's avatar URL.
 * The URL is unset even when some files could not be removed.
 */
export const clearAvatar = async (
  deps: ClearAvatarDeps,
  input: { frogolId: string }
): Promise<Result<void, AvatarError>> => {
  const deleted = await deleteAvatars(deps, input);

  const written = await deps.avatarUrlWriter.setAvatarUrl(input.frogolId, null);
  if (deleted.isErr()) {
    return err(deleted.error);
  }
  if (written.isErr()) {
    return err(written.error);
  }

  return ok(undefined);
};
