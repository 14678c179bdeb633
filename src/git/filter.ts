/**
 * Staged path filter
 * Drops files matching the configured ignore patterns before any diff is read
 */

import { minimatch } from 'minimatch';

/**
 * Check whether a path matches a single ignore pattern
 *
 * - `dir/` matches everything below `dir` at any depth
 * - patterns without a slash match the file name anywhere in the tree
 * - other patterns are matched against the full path
 */
export function matchesIgnorePattern(path: string, pattern: string): boolean {
  const trimmed = pattern.trim();
  if (!trimmed) {
    return false;
  }

  if (trimmed.endsWith('/')) {
    const dir = trimmed.slice(0, -1);
    return path === dir || path.startsWith(`${dir}/`) || path.includes(`/${dir}/`);
  }

  return minimatch(path, trimmed, { dot: true, matchBase: true });
}

/**
 * Check whether a path should be left out of the change set
 */
export function isIgnoredPath(path: string, patterns: readonly string[]): boolean {
  return patterns.some((pattern) => matchesIgnorePattern(path, pattern));
}

/**
 * Filter a list of items by their path
 */
export function filterIgnored<T extends { path: string }>(
  items: readonly T[],
  patterns: readonly string[]
): T[] {
  if (patterns.length === 0) {
    return [...items];
  }
  return items.filter((item) => !isIgnoredPath(item.path, patterns));
}
