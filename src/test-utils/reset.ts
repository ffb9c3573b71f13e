/**
 * Test Utilities - Unified Reset
 *
 * Resets every process-wide singleton for test isolation.
 *
 * ORDER MATTERS:
 * 1. Drop the cached environment
 * 2. Reset the database operations singleton
 * 3. Close the database connection last
 *
 * @example
 * ```typescript
 * import { resetAll } from '../test-utils/index.js';
 *
 * beforeEach(() => {
 *   resetAll();
 *   vi.clearAllMocks();
 * });
 * ```
 */

import { _clearEnvCache } from '../config/env.js';
import { resetDatabase, closeDb } from '../database/index.js';

export function resetAll(): void {
  _clearEnvCache();

  // The operations singleton holds the connection; drop it before closing
  resetDatabase();
  closeDb();
}
