// JSON signature extractor tests

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { JsonSignatureExtractor } from './json-signature-extractor.js';
import { ScanError } from '../../core/errors.js';

describe('JsonSignatureExtractor', () => {
  let testDir: string;
  let indexFile: string;

  beforeEach(async () => {
    testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'driftwatch-signatures-'));
    indexFile = path.join(testDir, 'signatures.json');
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  it('should return the signatures recorded for a file', async () => {
    await fs.writeFile(indexFile, JSON.stringify({
      files: { 'src/calc.ts': { calc: { signature: 'calc(a)', line: 4 } } }
    }));

    const extractor = new JsonSignatureExtractor(indexFile);

    expect(await extractor.extract('src/calc.ts')).toEqual({ calc: { signature: 'calc(a)', line: 4 } });
    expect(await extractor.extract('src/other.ts')).toEqual({});
  });

  it('should return no signatures when the index is missing', async () => {
    const extractor = new JsonSignatureExtractor(indexFile);
    expect(await extractor.extract('src/calc.ts')).toEqual({});
  });

  it('should raise ScanError for an invalid index', async () => {
    await fs.writeFile(indexFile, JSON.stringify({ files: { 'src/calc.ts': { calc: { line: 'x' } } } }));

    const extractor = new JsonSignatureExtractor(indexFile);
    await expect(extractor.extract('src/calc.ts')).rejects.toThrow(ScanError);
  });

  it('should list indexed paths in order', async () => {
    await fs.writeFile(indexFile, JSON.stringify({
      files: { 'src/b.ts': {}, 'src/a.ts': { a: { signature: 'a()' } } }
    }));

    const extractor = new JsonSignatureExtractor(indexFile);

    expect(await extractor.listFiles()).toEqual(['src/a.ts', 'src/b.ts']);
  });
});
