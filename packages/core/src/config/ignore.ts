// packages/core/src/config/ignore.ts - .armportignore + path-segment filtering

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import ignore, { type Ignore } from 'ignore';

export const IGNORE_FILE_NAME = '.armportignore';

/**
 * Compile the project's .armportignore (gitignore syntax) into a matcher.
 * A project without the file gets an empty matcher.
 */
export function createIgnoreFilter(projectDir: string): Ignore {
  const ig = ignore();
  const ignorePath = join(projectDir, IGNORE_FILE_NAME);
  if (existsSync(ignorePath)) {
    ig.add(readFileSync(ignorePath, 'utf-8'));
  }
  return ig;
}

/**
 * True when any entry appears in the relative path as a whole path segment
 * (or a run of whole segments, e.g. `third_party/sse`).
 */
export function shouldIgnore(relativePath: string, entries: readonly string[]): boolean {
  const normalized = relativePath.replace(/\\/g, '/');
  for (const entry of entries) {
    if (!entry) continue;
    if (
      normalized === entry ||
      normalized.startsWith(`${entry}/`) ||
      normalized.includes(`/${entry}/`) ||
      normalized.endsWith(`/${entry}`)
    ) {
      return true;
    }
  }
  return false;
}
