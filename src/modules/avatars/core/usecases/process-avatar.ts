/**
 * Process Avatar Use Case
 *
 * Validates one uploaded image and stores it under a fresh name.
 */

import { randomUUID } from 'crypto';

import { ok, err, type Result } from 'neverthrow';

import { createValidationError, type AvatarError } from '../errors.js';
import { extensionFor, usableClientType } from '../mime.js';
import { ALLOWED_AVATAR_TYPES, type AvatarUpload } from '../types.js';

import type { AvatarStorage, MimeDetector } from '../ports.js';

export interface ProcessAvatarDeps {
  storage: AvatarStorage;
  mimeDetector: MimeDetector;
  maxBytes: number;
}

/**
 * Processes one upload.
 *
 * Flow:
 * 1. Require a filename and non-empty content within the size limit
 * 2. Take the client type, or sniff the bytes when the client type is generic
 * 3. Reject types outside the allow list
 * 4. Store as `<uuid>.<ext>`
 *
 * @returns The stored filename
 */
export const processAvatar = async (
  deps: ProcessAvatarDeps,
  input: { upload: AvatarUpload; index: number }
): Promise<Result<string, AvatarError>> => {
  const { upload, index } = input;

  if (upload.filename === null || upload.filename === '') {
    return err(createValidationError(`Image at index ${String(index)} has no filename`));
  }
  const name = upload.filename;

  if (upload.data.length === 0) {
    return err(createValidationError(`Image ${name} is empty`));
  }
  if (upload.data.length > deps.maxBytes) {
    return err(
      createValidationError(`Image ${name} exceeds the limit of ${String(deps.maxBytes)} bytes`)
    );
  }

  const mimeType =
    usableClientType(upload.contentType) ?? (await deps.mimeDetector.detect(upload.data));
  if (mimeType === null) {
    return err(
      createValidationError('Could not determine image type. Please upload a valid image.')
    );
  }
  if (!ALLOWED_AVATAR_TYPES.includes(mimeType)) {
    return err(
      createValidationError(
        `Unsupported image type: ${mimeType}. Only JPEG, PNG, GIF, and WebP are allowed.`
      )
    );
  }

  const filename = `${randomUUID()}.${extensionFor(name, mimeType)}`;
  const saved = await deps.storage.save(filename, upload.data);
  if (saved.isErr()) {
    return err(saved.error);
  }

  return ok(filename);
};
