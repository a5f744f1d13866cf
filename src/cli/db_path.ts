/**
 * @fileoverview Database path resolution
 */

import * as path from 'node:path';

/**
 * Resolve the configured database path against the working directory.
 * `:memory:` is passed through untouched.
 */
export function resolveDbPath(dbPath: string, cwd: string): string {
  if (dbPath === ':memory:') return dbPath;
  return path.resolve(cwd, dbPath);
}
