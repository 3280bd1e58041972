/**
 * Reset process-wide state between tests.
 *
 * Order: forget migrated connections, close the shared connection, then
 * drop the cached environment so stubbed variables are re-read.
 */

import { closeDb, resetMigrationState } from '../database/index.js';
import { _clearEnvCache } from '../config/env.js';

export function resetAll(): void {
  resetMigrationState();
  closeDb();
  _clearEnvCache();
}
