// Glob matching for watch/ignore patterns and specification lookup

import { minimatch } from 'minimatch';

const MATCH_OPTIONS = { dot: true, matchBase: false } as const;

/**
 * Include/exclude filter over project-relative paths
 */
export interface PathMatcher {
  /**
   * True when the path matches an include pattern and no exclude pattern
   */
  matches(filePath: string): boolean;
}

/**
 * Tests one path against one glob
 */
export function matchesGlob(filePath: string, pattern: string): boolean {
  return minimatch(filePath.replace(/\\/g, '/'), pattern, MATCH_OPTIONS);
}

/**
 * Creates a PathMatcher.
 *
 * An empty include list includes everything; exclude patterns always win.
 */
export function createPathMatcher(include: string[] = [], exclude: string[] = []): PathMatcher {
  const matches = (filePath: string): boolean => {
    const normalized = filePath.replace(/\\/g, '/');

    if (include.length > 0 && !include.some(pattern => matchesGlob(normalized, pattern))) {
      return false;
    }

    return !exclude.some(pattern => matchesGlob(normalized, pattern));
  };

  return { matches };
}
