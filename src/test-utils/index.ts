/**
 * Test Utilities Module
 *
 * Shared utilities for testing across the codebase.
 *
 * @example
 * ```typescript
 * import { resetAll, ScriptedBackend, textReply } from '../test-utils/index.js';
 *
 * beforeEach(() => {
 *   resetAll();
 * });
 *
 * const backend = new ScriptedBackend([textReply('高血压是...')]);
 * ```
 */

export { resetAll } from './reset.js';
export { ScriptedBackend, textReply, toolReply, type ScriptStep } from './fake-backend.js';
