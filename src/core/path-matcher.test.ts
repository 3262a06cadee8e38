// Tests for glob matching

import { describe, it, expect } from 'vitest';
import { createPathMatcher, matchesGlob } from './path-matcher.js';

describe('matchesGlob', () => {
  it('should match nested paths and dotfiles', () => {
    expect(matchesGlob('src/services/calc.ts', 'src/**/*.ts')).toBe(true);
    expect(matchesGlob('.driftwatch/config.yaml', '.driftwatch/**')).toBe(true);
    expect(matchesGlob('src/calc.js', 'src/**/*.ts')).toBe(false);
  });

  it('should normalize backslashes', () => {
    expect(matchesGlob('src\\calc.ts', 'src/*.ts')).toBe(true);
  });
});

describe('createPathMatcher', () => {
  it('should include everything when no include patterns are given', () => {
    expect(createPathMatcher().matches('any/file.txt')).toBe(true);
  });

  it('should let exclude patterns win', () => {
    const matcher = createPathMatcher(['**/*.ts'], ['**/node_modules/**']);

    expect(matcher.matches('src/a.ts')).toBe(true);
    expect(matcher.matches('node_modules/x/index.ts')).toBe(false);
    expect(matcher.matches('README.md')).toBe(false);
  });
});
