/**
 * Test utilities exports
 */

export {
  initTestDatabase,
  getTestDatabase,
  closeTestDatabase,
  resetTestDatabase,
  seedEmployee,
  createTestClock,
  testHasher,
} from './test-database';

export type { TestClock } from './test-database';
