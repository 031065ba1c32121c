/**
 * Content type and filename helpers for uploaded images.
 */

import { GENERIC_CONTENT_TYPE } from './types.js';

const EXTENSION_BY_TYPE = new Map([
  ['image/jpeg', 'jpg'],
  ['image/png', 'png'],
  ['image/gif', 'gif'],
  ['image/webp', 'webp'],
]);

const EXTENSION_PATTERN = /^[a-z0-9]{1,8}$/;

/**
 * Returns the client-declared type when it carries information.
 * Missing, empty and generic binary types return null.
 */
export const usableClientType = (contentType: string | null): string | null => {
  const trimmed = contentType?.trim().toLowerCase() ?? '';
  if (trimmed === '' || trimmed === GENERIC_CONTENT_TYPE) {
    return null;
  }
  return trimmed;
};

/**
 * Picks the stored file extension: the original one when it is a plain
 * alphanumeric suffix, otherwise the one of the effective type.
 *
 * @example
 * extensionFor('Me.PNG', 'image/png') // 'png'
 * extensionFor('avatar', 'image/jpeg') // 'jpg'
 */
export const extensionFor = (filename: string, mimeType: string): string => {
  const dot = filename.lastIndexOf('.');
  if (dot > 0) {
    const ext = filename.slice(dot + 1).toLowerCase();
    if (EXTENSION_PATTERN.test(ext)) {
      return ext;
    }
  }
  return EXTENSION_BY_TYPE.get(mimeType) ?? 'bin';
};
