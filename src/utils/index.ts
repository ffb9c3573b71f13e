/**
 * Utilities Module
 *
 * Shared utility functions used across the codebase.
 */

export { type Logger, consoleLogger, silentLogger } from './logger.js';

export { safeJsonParse, isJsonObject } from './json.js';

export { withTimeout, TimeoutError } from './timeout.js';
