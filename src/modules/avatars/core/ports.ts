/**
 * Avatars Module - Port Interfaces
 */

import type { AvatarError } from './errors.js';
import type { AvatarImage } from './types.js';
import type { Result } from 'neverthrow';

/**
 * Avatar metadata rows.
 */
export interface AvatarImageRepository {
  create(input: { frogolId: string; imageFilename: string }): Promise<Result<AvatarImage, AvatarError>>;

  listForFrogol(frogolId: string): Promise<Result<AvatarImage[], AvatarError>>;

  /** @returns Number of removed rows */
  deleteForFrogol(frogolId: string): Promise<Result<number, AvatarError>>;
}

/**
 * Where avatar files live.
 */
export interface AvatarStorage {
  save(filename: string, data: Buffer): Promise<Result<void, AvatarError>>;

  /** Removing a missing file succeeds. */
  remove(filename: string): Promise<Result<void, AvatarError>>;
}

/**
 * Detects a MIME type from file content.
 */
export interface MimeDetector {
  detect(data: Uint8Array): Promise<string | null>;
}

/**
 * Writes the public avatar URL onto the profile.
 */
export interface AvatarUrlWriter {
  setAvatarUrl(frogolId: string, avatarUrl: string | null): Promise<Result<void, AvatarError>>;
}
