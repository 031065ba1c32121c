/**
 * Upload Avatars Use Case
 */

import { ok, err, type Result } from 'neverthrow';

import { deleteAvatars, type DeleteAvatarsDeps } from './delete-avatars.js';
import { processAvatar, type ProcessAvatarDeps } from './process-avatar.js';
import { mapInBatches } from '../batch.js';
import { createValidationError, type AvatarError } from '../errors.js';
import {
  DELETE_BATCH_SIZE,
  PROCESS_BATCH_SIZE,
  toAvatarUrl,
  type AvatarUpload,
  type UploadAvatarsResult,
} from '../types.js';

import type { AvatarUrlWriter } from '../ports.js';

export interface UploadAvatarsDeps extends DeleteAvatarsDeps, ProcessAvatarDeps {
  avatarUrlWriter: AvatarUrlWriter;
}

/**
 * Removes stored files that have no record. Failures are ignored: the
 * caller already has an error to report.
 */
const discardFiles = async (deps: UploadAvatarsDeps, filenames: readonly string[]): Promise<void> => {
  await mapInBatches(filenames, DELETE_BATCH_SIZE, (filename) => deps.storage.remove(filename));
};

/**
 * Replaces a profile's avatar with a batch of uploaded images.
 *
 * Flow:
 * 1. Process uploads in batches; a rejected file does not stop the others
 * 2. If nothing was stored, stop: the current avatar stays as it is
 * 3. Remove the previous avatar files and records
 * 4. Record each stored file
 * 5. Point the profile at the last recorded file
 *
 * The avatar URL always names a recorded file or is null.
 */
export const uploadAvatars = async (
  deps: UploadAvatarsDeps,
  input: { frogolId: string; files: readonly AvatarUpload[] }
): Promise<Result<UploadAvatarsResult, AvatarError>> => {
  if (input.files.length === 0) {
    return err(createValidationError('No avatar file found in upload'));
  }

  const processed = await mapInBatches(input.files, PROCESS_BATCH_SIZE, (upload, index) =>
    processAvatar(deps, { upload, index })
  );

  const stored: string[] = [];
  const errors: UploadAvatarsResult['errors'] = [];

  for (const [index, result] of processed.entries()) {
    if (result.isErr()) {
      errors.push({
        filename: input.files[index]?.filename ?? null,
        type: result.error.type,
        message: result.error.message,
      });
      continue;
    }
    stored.push(result.value);
  }

  if (stored.length === 0) {
    return ok({ filenames: [], avatarUrl: null, errors });
  }

  const cleared = await deleteAvatars(deps, { frogolId: input.frogolId });
  if (cleared.isErr()) {
    await discardFiles(deps, stored);
    // Old records are gone, so the old URL may name a removed file
    // The cleanup failure is the error reported, as in clearAvatar
    await deps.avatarUrlWriter.setAvatarUrl(input.frogolId, null);
    return err(cleared.error);
  }

  const filenames: string[] = [];
  let recordError: AvatarError | null = null;

  for (const [index, filename] of stored.entries()) {
    const recorded = await deps.avatarRepo.create({ frogolId: input.frogolId, imageFilename: filename });
    if (recorded.isErr()) {
      recordError = recorded.error;
      await discardFiles(deps, stored.slice(index));
      break;
    }
    filenames.push(filename);
  }

  const lastFilename = filenames.at(-1);
  const avatarUrl = lastFilename === undefined ? null : toAvatarUrl(lastFilename);
  const written = await deps.avatarUrlWriter.setAvatarUrl(input.frogolId, avatarUrl);

  if (recordError !== null) {
    return err(recordError);
  }
  if (written.isErr()) {
    return err(written.error);
  }

  return ok({ filenames, avatarUrl, errors });
};
