/**
 * Avatars Module - Domain Types
 */

/** Image types accepted as avatars */
export const ALLOWED_AVATAR_TYPES: readonly string[] = [
  'image/jpeg',
  'image/png',
  'image/gif',
  'image/webp',
];

/** Content type that says nothing about the file; the bytes are sniffed instead */
export const GENERIC_CONTENT_TYPE = 'application/octet-stream';

/** Default upper bound for one avatar file (5MB) */
export const DEFAULT_MAX_AVATAR_BYTES = 5 * 1024 * 1024;

/** Files processed at once during an upload */
export const PROCESS_BATCH_SIZE = 4;

/** Files removed at once during a cleanup */
export const DELETE_BATCH_SIZE = 8;

/** Public path under which stored avatars are served */
export const AVATAR_URL_PREFIX = '/static/avatars/';

/**
 * An uploaded file as received from the client.
 */
export interface AvatarUpload {
  /** Original filename; null when the client sent none */
  filename: string | null;
  /** Client-declared content type */
  contentType: string | null;
  data: Buffer;
}

/**
 * Stored avatar metadata.
 */
export interface AvatarImage {
  id: string;
  frogolId: string;
  imageFilename: string;
  createdAt: Date;
}

export interface UploadAvatarsResult {
  /** Stored filenames in upload order */
  filenames: string[];
  /** Public URL of the avatar now set on the profile; null when nothing was stored */
  avatarUrl: string | null;
  /** Per-file failures, in upload order */
  errors: { filename: string | null; type: string; message: string }[];
}

export const toAvatarUrl = (filename: string): string => `${AVATAR_URL_PREFIX}${filename}`;
