// Signature helper tests

import { describe, it, expect } from 'vitest';
import { countParameters, normalizeSignature, normalizeVersion, ownEntry, signaturesEqual } from './signatures.js';

describe('normalizeSignature', () => {
  it('should remove spacing around punctuation', () => {
    expect(normalizeSignature('calc( a ,  b ) : number')).toBe('calc(a,b):number');
  });

  it('should collapse inner whitespace', () => {
    expect(normalizeSignature('async   function\tload()')).toBe('async function load()');
  });
});

describe('signaturesEqual', () => {
  it('should ignore formatting differences', () => {
    expect(signaturesEqual('calc(a, b)', 'calc(a,b)')).toBe(true);
    expect(signaturesEqual('calc(a, b)', 'calc(a)')).toBe(false);
  });
});

describe('ownEntry', () => {
  it('should return own entries only', () => {
    const record: Record<string, string> = { calc: 'calc(a)' };

    expect(ownEntry(record, 'calc')).toBe('calc(a)');
    expect(ownEntry(record, 'constructor')).toBeUndefined();
    expect(ownEntry(record, 'toString')).toBeUndefined();
  });
});

describe('countParameters', () => {
  it('should count top-level parameters', () => {
    expect(countParameters('calc(a, b)')).toBe(2);
    expect(countParameters('calc()')).toBe(0);
    expect(countParameters('calc(a)')).toBe(1);
  });

  it('should not count commas inside nested types', () => {
    expect(countParameters('merge(a: Map<string, number>, b: [number, number])')).toBe(2);
    expect(countParameters('on(cb: (err: Error, data: string) => void)')).toBe(1);
  });

  it('should return null without a parameter list', () => {
    expect(countParameters('VERSION')).toBeNull();
  });
});

describe('normalizeVersion', () => {
  it('should strip range operators', () => {
    expect(normalizeVersion('^1.2.0')).toBe('1.2.0');
    expect(normalizeVersion('~1.2.0')).toBe('1.2.0');
    expect(normalizeVersion('>=v2.0.0')).toBe('2.0.0');
    expect(normalizeVersion(' 3.0.0 ')).toBe('3.0.0');
  });
});
