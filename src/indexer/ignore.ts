/**
 * Ignore Pattern Handling
 *
 * Gitignore-style exclusion for the document scanner, using the 'ignore'
 * package. Patterns come from DEFAULT_IGNORE_PATTERNS, the root's
 * .gitignore and .medqaignore, then caller-supplied patterns.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join, relative, sep } from 'node:path';
import ignore, { type Ignore } from 'ignore';

import { DEFAULT_IGNORE_PATTERNS } from './types.js';

/** Knowledge-base specific exclusions, same syntax as .gitignore */
export const MEDQA_IGNORE_FILE = '.medqaignore';

export interface IgnoreFilterOptions {
  /** Root directory containing .gitignore / .medqaignore */
  rootPath: string;

  additionalPatterns?: string[];

  /** @default true */
  useDefaults?: boolean;
}

/**
 * Returns true if a path should be IGNORED.
 */
export type IgnoreFilter = (filePath: string) => boolean;

/**
 * Load patterns from an ignore file. A missing file yields no patterns.
 */
export function loadIgnoreFile(path: string): string[] {
  if (!existsSync(path)) {
    return [];
  }
  return parseIgnoreContent(readFileSync(path, 'utf-8'));
}

/**
 * Drop blank lines and comments. Negations (`!pattern`) are kept.
 */
export function parseIgnoreContent(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== '' && !line.startsWith('#'));
}

/**
 * @example
 * ```ts
 * const shouldIgnore = createIgnoreFilter({ rootPath: '/data/kb', additionalPatterns: ['drafts/'] });
 * shouldIgnore('drafts/hypertension.md'); // true
 * ```
 */
export function createIgnoreFilter(options: IgnoreFilterOptions): IgnoreFilter {
  const { rootPath, additionalPatterns = [], useDefaults = true } = options;

  const ig: Ignore = ignore();

  if (useDefaults) {
    ig.add(DEFAULT_IGNORE_PATTERNS);
  }
  ig.add(loadIgnoreFile(join(rootPath, '.gitignore')));
  ig.add(loadIgnoreFile(join(rootPath, MEDQA_IGNORE_FILE)));
  if (additionalPatterns.length > 0) {
    ig.add(additionalPatterns);
  }

  // The ignore library expects root-relative paths with forward slashes
  return (filePath: string): boolean => {
    let relativePath = filePath.startsWith(rootPath) ? relative(rootPath, filePath) : filePath;

    if (sep === '\\') {
      relativePath = relativePath.split(sep).join('/');
    }

    if (relativePath === '') {
      return false;
    }

    return ig.ignores(relativePath);
  };
}
