/**
 * Slug normalization.
 *
 * Turns free-form input (a name, a pasted URL) into a canonical `[a-z0-9-]+`
 * path segment. Uniqueness is checked by the caller against the store.
 */

import { err, ok, type Result } from 'neverthrow';

import { createInvalidInputError, type InvalidInputError } from './errors.js';
import { RESERVED_SLUGS } from './types.js';

const PROTOCOL_PREFIXES = ['https://', 'http://'] as const;
const WWW_PREFIX = 'www.';

const stripProtocol = (value: string): string => {
  for (const prefix of PROTOCOL_PREFIXES) {
    if (value.startsWith(prefix)) {
      return value.slice(prefix.length);
    }
  }
  return value;
};

const isSlugChar = (char: string): boolean => /^[a-z0-9-]$/.test(char);

/**
 * Normalizes raw input into a slug.
 *
 * @example
 * normalizeSlug('HTTPS://WWW.Example.com/abc'); // ok('example-com')
 * normalizeSlug('___');                         // err(InvalidInputError)
 */
export const normalizeSlug = (raw: string): Result<string, InvalidInputError> => {
  let value = stripProtocol(raw.trim().toLowerCase());

  if (value.startsWith(WWW_PREFIX)) {
    value = value.slice(WWW_PREFIX.length);
  }

  const slashIndex = value.indexOf('/');
  if (slashIndex !== -1) {
    value = value.slice(0, slashIndex);
  }

  value = value.replaceAll('.', '-').replace(/\s+/g, '-');

  let filtered = '';
  for (const char of value) {
    if (char === '_') {
      filtered += '-';
    } else if (isSlugChar(char)) {
      filtered += char;
    }
  }

  const slug = filtered.replace(/-+/g, '-').replace(/^-+|-+$/g, '');

  if (slug === '') {
    return err(createInvalidInputError('slug', 'Slug must contain at least one letter or digit'));
  }

  if (RESERVED_SLUGS.has(slug)) {
    return err(createInvalidInputError('slug', `Slug '${slug}' is reserved`));
  }

  return ok(slug);
};
