// Baseline store tests

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { BaselineStore } from './baseline-store.js';
import { StorageError } from '../../core/errors.js';
import type { Specification } from '../../models/specification.js';

const specification: Specification = {
  name: 'math',
  sourceRef: 'docs/math.md',
  revision: 'r1',
  elements: [
    { id: 'calc', signature: 'calc(a, b)', isBreakingIfRemoved: true, kind: 'symbol' },
    { id: 'round', signature: 'round(x)', isBreakingIfRemoved: false, kind: 'symbol' }
  ]
};

describe('BaselineStore', () => {
  let store: BaselineStore;

  beforeEach(() => {
    store = new BaselineStore();
  });

  describe('observe', () => {
    it('should record only signatures that match the specification', () => {
      const baseline = store.observe('src/calc.ts', {
        calc: { signature: 'calc(a,b)' },
        round: { signature: 'round(x, digits)' }
      }, specification);

      expect(baseline.stableSignatures).toEqual({ calc: 'calc(a,b)' });
      expect(baseline.specRevision).toBe('r1');
      expect(Object.keys(baseline.elementDocHashes).sort()).toEqual(['calc', 'round']);
    });

    it('should keep a stable signature after the code drifts', () => {
      store.observe('src/calc.ts', { calc: { signature: 'calc(a, b)' } }, specification);
      const baseline = store.observe('src/calc.ts', { calc: { signature: 'calc(a)' } }, specification);

      expect(baseline.stableSignatures.calc).toBe('calc(a, b)');
    });

    it('should keep the first observed behavior hash', () => {
      store.observe('src/calc.ts', { calc: { signature: 'calc(a, b)', behaviorHash: 'h1' } }, specification);
      const baseline = store.observe('src/calc.ts', { calc: { signature: 'calc(a, b)', behaviorHash: 'h2' } }, specification);

      expect(baseline.behaviorHashes.calc).toBe('h1');
    });

    it('should not read inherited members for element IDs such as constructor', () => {
      const classSpec: Specification = {
        name: 'classes',
        sourceRef: 'docs/classes.md',
        elements: [{ id: 'constructor', signature: 'constructor(name)', isBreakingIfRemoved: true, kind: 'symbol' }]
      };

      const missing = store.observe('src/cls.ts', {}, classSpec);
      expect(missing.stableSignatures).toEqual({});

      const present = store.observe('src/cls.ts', {
        constructor: { signature: 'constructor(name)', behaviorHash: 'h1' }
      }, classSpec);
      expect(present.stableSignatures).toEqual({ constructor: 'constructor(name)' });
      expect(present.behaviorHashes).toEqual({ constructor: 'h1' });
    });

    it('should return a frozen snapshot', () => {
      const baseline = store.observe('src/calc.ts', {}, specification);
      expect(Object.isFrozen(baseline)).toBe(true);
      expect(Object.isFrozen(baseline.stableSignatures)).toBe(true);
    });
  });

  describe('accept', () => {
    it('should replace behavior hashes with the current ones', () => {
      store.observe('src/calc.ts', { calc: { signature: 'calc(a, b)', behaviorHash: 'h1' } }, specification);
      const baseline = store.accept('src/calc.ts', { calc: { signature: 'calc(a, b)', behaviorHash: 'h2' } }, specification);

      expect(baseline.behaviorHashes).toEqual({ calc: 'h2' });
    });
  });

  describe('forget', () => {
    it('should drop the baseline for a file', () => {
      store.observe('src/calc.ts', {}, specification);
      expect(store.forget('src/calc.ts')).toBe(true);
      expect(store.get('src/calc.ts')).toBeUndefined();
      expect(store.forget('src/calc.ts')).toBe(false);
    });
  });

  describe('persistence', () => {
    let testDir: string;

    beforeEach(async () => {
      testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'driftwatch-baselines-'));
    });

    afterEach(async () => {
      await fs.rm(testDir, { recursive: true, force: true });
    });

    it('should round-trip baselines through the file', async () => {
      const filePath = path.join(testDir, 'nested', 'baselines.json');
      const writer = new BaselineStore({ filePath });
      const saved = writer.observe('src/calc.ts', { calc: { signature: 'calc(a, b)', behaviorHash: 'h1' } }, specification);
      await writer.save();

      const reader = new BaselineStore({ filePath });
      await reader.load();

      expect(reader.size()).toBe(1);
      expect(reader.get('src/calc.ts')).toEqual(saved);
    });

    it('should start empty when the file does not exist', async () => {
      const reader = new BaselineStore({ filePath: path.join(testDir, 'missing.json') });
      await reader.load();
      expect(reader.size()).toBe(0);
    });

    it('should reject a corrupt file', async () => {
      const filePath = path.join(testDir, 'baselines.json');
      await fs.writeFile(filePath, '{ not json');

      const reader = new BaselineStore({ filePath });
      await expect(reader.load()).rejects.toThrow(StorageError);
    });
  });
});
