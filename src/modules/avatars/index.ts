/**
 * Avatars Module - Public API
 *
 * Profile images: validation, storage on disk and metadata records.
 */

export type { AvatarUpload, AvatarImage, UploadAvatarsResult } from './core/types.js';
export {
  ALLOWED_AVATAR_TYPES,
  DEFAULT_MAX_AVATAR_BYTES,
  PROCESS_BATCH_SIZE,
  DELETE_BATCH_SIZE,
  AVATAR_URL_PREFIX,
  toAvatarUrl,
} from './core/types.js';

export type { AvatarError, DatabaseError, ValidationError, InternalError } from './core/errors.js';
export {
  createDatabaseError,
  createValidationError,
  createInternalError,
  AVATAR_ERROR_HTTP_STATUS,
  getHttpStatusForError,
} from './core/errors.js';

export type {
  AvatarImageRepository,
  AvatarStorage,
  MimeDetector,
  AvatarUrlWriter,
} from './core/ports.js';

export { usableClientType, extensionFor } from './core/mime.js';
export { mapInBatches } from './core/batch.js';

export { processAvatar, type ProcessAvatarDeps } from './core/usecases/process-avatar.js';
export { deleteAvatars, type DeleteAvatarsDeps } from './core/usecases/delete-avatars.js';
export { uploadAvatars, type UploadAvatarsDeps } from './core/usecases/upload-avatars.js';
export { clearAvatar, type ClearAvatarDeps } from './core/usecases/clear-avatar.js';

export { makeAvatarImageRepo, type AvatarImageRepoOptions } from './shell/repo/avatar-image-repo.js';
export { makeAvatarUrlWriter } from './shell/repo/avatar-url-writer.js';
export { makeFsAvatarStorage, type FsAvatarStorageOptions } from './shell/storage/fs-storage.js';
export { fileTypeMimeDetector } from './shell/mime/file-type-detector.js';

export { makeAvatarRoutes, type MakeAvatarRoutesDeps } from './shell/rest/routes.js';
