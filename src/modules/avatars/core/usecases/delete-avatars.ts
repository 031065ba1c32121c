/**
 * Delete Avatars Use Case
 */

import { ok, err, type Result } from 'neverthrow';

import { mapInBatches } from '../batch.js';
import { DELETE_BATCH_SIZE } from '../types.js';

import type { AvatarError } from '../errors.js';
import type { AvatarImageRepository, AvatarStorage } from '../ports.js';

export interface DeleteAvatarsDeps {
  avatarRepo: AvatarImageRepository;
  storage: AvatarStorage;
}

/**
 * Removes every avatar file and record of a profile.
 *
 * Keeps going after a failed file so one bad file does not strand the rest;
 * the first failure is reported once everything was attempted.
 */
export const deleteAvatars = async (
  deps: DeleteAvatarsDeps,
  input: { frogolId: string }
): Promise<Result<void, AvatarError>> => {
  const imagesResult = await deps.avatarRepo.listForFrogol(input.frogolId);
  if (imagesResult.isErr()) {
    return err(imagesResult.error);
  }

  const images = imagesResult.value;
  if (images.length === 0) {
    return ok(undefined);
  }

  const removals = await mapInBatches(images, DELETE_BATCH_SIZE, (image) =>
    deps.storage.remove(image.imageFilename)
  );
  const recordsResult = await deps.avatarRepo.deleteForFrogol(input.frogolId);

  let firstError: AvatarError | null = null;
  for (const removal of removals) {
    if (removal.isErr()) {
      firstError ??= removal.error;
    }
  }
  if (recordsResult.isErr()) {
    firstError ??= recordsResult.error;
  }

  if (firstError !== null) {
    return err(firstError);
  }

  return ok(undefined);
};
