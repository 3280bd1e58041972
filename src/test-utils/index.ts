/**
 * Test Utilities
 *
 * @example
 * ```typescript
 * import { resetAll, scriptedClient, completed } from '../../test-utils/index.js';
 *
 * beforeEach(() => {
 *   resetAll();
 * });
 * ```
 */

export { resetAll } from './reset.js';
export {
  scriptedClient,
  completed,
  toolCalls,
  call,
  fakeCatalog,
  type ScriptedClient,
  type FakeCatalog,
} from './fakes.js';
