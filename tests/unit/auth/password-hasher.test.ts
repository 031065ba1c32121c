import { describe, expect, it } from 'vitest';

import { scryptPasswordHasher } from '@/modules/auth/index.js';

describe('scryptPasswordHasher', () => {
  it('verifies the password it hashed', async () => {
    const hash = await scryptPasswordHasher.hash('password123');

    expect(hash.startsWith('scrypt$')).toBe(true);
    expect(await scryptPasswordHasher.verify('password123', hash)).toBe(true);
  });

  it('rejects a different password', async () => {
    const hash = await scryptPasswordHasher.hash('password123');

    expect(await scryptPasswordHasher.verify('password124', hash)).toBe(false);
  });

  it('salts every hash', async () => {
    const first = await scryptPasswordHasher.hash('password123');
    const second = await scryptPasswordHasher.hash('password123');

    expect(first).not.toBe(second);
  });

  it('returns false for hashes in another format', async () => {
    expect(await scryptPasswordHasher.verify('password123', 'plain:password123')).toBe(false);
    expect(await scryptPasswordHasher.verify('password123', 'scrypt$00$abcd')).toBe(false);
  });
});
