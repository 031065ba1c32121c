/**
 * Global test setup file
 * Runs before all tests
 */

import { beforeAll } from 'vitest';

beforeAll(() => {
  process.env['NODE_ENV'] = 'test';
  process.env['LOG_LEVEL'] = 'silent';
  process.env['JWT_SECRET'] ??= 'test-secret';
});
