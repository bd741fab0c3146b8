/**
 * Test fixture lookup
 */

import { existsSync, statSync } from 'node:fs';
import { dirname, join } from 'node:path';

/**
 * Walk up from `startDir` until a `test/fixtures` directory is found.
 * Returns `undefined` when the filesystem root is reached first.
 */
export function findFixturesDir(startDir: string = process.cwd()): string | undefined {
  let current = startDir;

  for (;;) {
    const candidate = join(current, 'test', 'fixtures');
    if (existsSync(candidate) && statSync(candidate).isDirectory()) {
      return candidate;
    }

    const parent = dirname(current);
    if (parent === current) {
      return undefined;
    }
    current = parent;
  }
}

/**
 * Locate a named fixture file under the nearest `test/fixtures` directory.
 */
export function findFixture(fileName: string, startDir?: string): string | undefined {
  const dir = findFixturesDir(startDir);
  if (!dir) {
    return undefined;
  }
  const path = join(dir, fileName);
  return existsSync(path) ? path : undefined;
}
