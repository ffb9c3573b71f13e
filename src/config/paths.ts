/**
 * Centralized Path Definitions
 *
 * ~/.medqa/
 * ├── knowledge.db    (SQLite knowledge base)
 * └── config.toml     (User configuration)
 *
 * MEDQA_HOME overrides the directory. It is read on every call so tests
 * can point it at a temp dir.
 */

import { join } from 'node:path';
import { homedir } from 'node:os';

/**
 * @returns Absolute path to the medqa directory
 */
export function getMedqaDir(): string {
  const override = process.env.MEDQA_HOME?.trim();
  return override ? override : join(homedir(), '.medqa');
}

export function getDbPath(): string {
  return join(getMedqaDir(), 'knowledge.db');
}

export function getConfigPath(): string {
  return join(getMedqaDir(), 'config.toml');
}
