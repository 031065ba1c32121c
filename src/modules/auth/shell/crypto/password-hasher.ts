/**
 * Password Hasher Implementation
 *
 * scrypt from Node.js crypto. Stored format: `scrypt$<salt hex>$<key hex>`.
 */

import { randomBytes, scrypt, timingSafeEqual } from 'crypto';

import type { PasswordHasher } from '../../core/ports.js';

const SCHEME = 'scrypt';
const SALT_BYTES = 16;
const KEY_LENGTH = 64;

const deriveKey = (password: string, salt: Buffer): Promise<Buffer> =>
  new Promise((resolve, reject) => {
    scrypt(password, salt, KEY_LENGTH, (error, derivedKey) => {
      if (error !== null) {
        reject(error);
        return;
      }
      resolve(derivedKey);
    });
  });

export const scryptPasswordHasher: PasswordHasher = {
  async hash(password: string): Promise<string> {
    const salt = randomBytes(SALT_BYTES);
    const key = await deriveKey(password, salt);
    return [SCHEME, salt.toString('hex'), key.toString('hex')].join('$');
  },

  async verify(password: string, hash: string): Promise<boolean> {
    const [scheme, saltHex, keyHex] = hash.split('$');
    if (scheme !== SCHEME || saltHex === undefined || keyHex === undefined) {
      return false;
    }

    const expected = Buffer.from(keyHex, 'hex');
    if (expected.length !== KEY_LENGTH) {
      return false;
    }

    const actual = await deriveKey(password, Buffer.from(saltHex, 'hex'));
    return timingSafeEqual(actual, expected);
  },
};
