// Per-file signature baselines used for behavior, stability and staleness checks

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { StorageError, describeError } from '../../core/errors.js';
import { computeDocHash, computeSignatureDigest } from '../../core/fingerprint.js';
import type { SignatureBaseline } from '../../models/drift.js';
import type { CurrentSignatures, Specification } from '../../models/specification.js';
import { ownEntry, signaturesEqual } from './signatures.js';

const BaselineFileSchema = z.object({
  version: z.literal(1),
  files: z.record(z.object({
    stableSignatures: z.record(z.string()),
    behaviorHashes: z.record(z.string()),
    elementDocHashes: z.record(z.string()),
    specRevision: z.string().optional(),
    codeDigest: z.string().optional()
  }))
});

export interface BaselineStoreConfig {
  /** JSON file for persistence; in-memory only when omitted */
  filePath?: string;
}

const EMPTY_BASELINE: SignatureBaseline = Object.freeze({
  stableSignatures: Object.freeze({}),
  behaviorHashes: Object.freeze({}),
  elementDocHashes: Object.freeze({})
});

function freeze(baseline: SignatureBaseline): SignatureBaseline {
  return Object.freeze({
    ...baseline,
    stableSignatures: Object.freeze({ ...baseline.stableSignatures }),
    behaviorHashes: Object.freeze({ ...baseline.behaviorHashes }),
    elementDocHashes: Object.freeze({ ...baseline.elementDocHashes })
  });
}

/**
 * Holds one immutable baseline snapshot per file.
 *
 * Behavior hashes keep their first observation until `accept()` replaces
 * them; stable signatures track the last observation that matched the
 * specification.
 */
export class BaselineStore {
  private baselines = new Map<string, SignatureBaseline>();
  private readonly filePath?: string;

  constructor(config: BaselineStoreConfig = {}) {
    this.filePath = config.filePath;
  }

  get(filePath: string): SignatureBaseline | undefined {
    return this.baselines.get(filePath);
  }

  /**
   * Records the state seen during a scan
   */
  observe(filePath: string, current: CurrentSignatures, specification: Specification): SignatureBaseline {
    const previous = this.baselines.get(filePath) ?? EMPTY_BASELINE;
    const stableSignatures = { ...previous.stableSignatures };
    const behaviorHashes = { ...previous.behaviorHashes };
    const elementDocHashes: Record<string, string> = {};

    for (const element of specification.elements) {
      const observed = ownEntry(current, element.id);

      if (observed && signaturesEqual(observed.signature, element.signature)) {
        stableSignatures[element.id] = observed.signature;
      }
      if (observed?.behaviorHash && ownEntry(behaviorHashes, element.id) === undefined) {
        behaviorHashes[element.id] = observed.behaviorHash;
      }
      elementDocHashes[element.id] = computeDocHash(element.signature, element.description, element.behaviorHash);
    }

    const next = freeze({
      stableSignatures,
      behaviorHashes,
      elementDocHashes,
      specRevision: specification.revision,
      codeDigest: computeSignatureDigest(current)
    });
    this.baselines.set(filePath, next);
    return next;
  }

  /**
   * Accepts the current behavior as the new baseline
   */
  accept(filePath: string, current: CurrentSignatures, specification: Specification): SignatureBaseline {
    const behaviorHashes: Record<string, string> = {};
    for (const [id, observed] of Object.entries(current)) {
      if (observed.behaviorHash) {
        behaviorHashes[id] = observed.behaviorHash;
      }
    }

    const previous = this.baselines.get(filePath) ?? EMPTY_BASELINE;
    this.baselines.set(filePath, freeze({ ...previous, behaviorHashes }));
    return this.observe(filePath, current, specification);
  }

  forget(filePath: string): boolean {
    return this.baselines.delete(filePath);
  }

  size(): number {
    return this.baselines.size;
  }

  /**
   * Loads persisted baselines; a missing file leaves the store empty
   */
  async load(): Promise<void> {
    if (!this.filePath) return;

    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return;
      }
      throw new StorageError(`Cannot read baselines: ${describeError(error)}`, { filePath: this.filePath });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new StorageError(`Baseline file is not valid JSON: ${describeError(error)}`, { filePath: this.filePath });
    }

    const result = BaselineFileSchema.safeParse(parsed);
    if (!result.success) {
      throw new StorageError('Baseline file has an unexpected shape', { filePath: this.filePath });
    }

    this.baselines = new Map(
      Object.entries(result.data.files).map(([file, baseline]) => [file, freeze(baseline)])
    );
  }

  async save(): Promise<void> {
    if (!this.filePath) return;

    const files: Record<string, SignatureBaseline> = {};
    for (const file of [...this.baselines.keys()].sort()) {
      const baseline = this.baselines.get(file);
      if (baseline) {
        files[file] = baseline;
      }
    }

    const tmpPath = `${this.filePath}.tmp`;
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(tmpPath, JSON.stringify({ version: 1, files }, null, 2), 'utf-8');
    await fs.rename(tmpPath, this.filePath);
  }
}
