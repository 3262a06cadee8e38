// Signature extractor backed by an index file written by an external analyzer

import * as fs from 'fs/promises';
import { ScanError, describeError } from '../../core/errors.js';
import { SignatureIndexSchema, formatZodIssues } from '../../core/schemas.js';
import type { CurrentSignatures, SignatureExtractor } from '../../models/specification.js';

/**
 * Reads `{ files: { [path]: { [id]: { signature, behaviorHash?, line? } } } }`.
 *
 * The index is re-read when its modification time changes. Paths missing
 * from the index yield no signatures.
 */
export class JsonSignatureExtractor implements SignatureExtractor {
  private cache: { mtimeMs: number; files: Record<string, CurrentSignatures> } | null = null;

  constructor(private readonly indexFile: string) {}

  async extract(filePath: string): Promise<CurrentSignatures> {
    const files = await this.readIndex(filePath);
    return files[filePath.replace(/\\/g, '/')] ?? {};
  }

  /**
   * Paths present in the index, sorted
   */
  async listFiles(): Promise<string[]> {
    return Object.keys(await this.readIndex(this.indexFile)).sort();
  }

  private async readIndex(filePath: string): Promise<Record<string, CurrentSignatures>> {
    let mtimeMs: number;
    try {
      mtimeMs = (await fs.stat(this.indexFile)).mtimeMs;
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return {};
      }
      throw new ScanError(filePath, error);
    }

    if (this.cache && this.cache.mtimeMs === mtimeMs) {
      return this.cache.files;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(await fs.readFile(this.indexFile, 'utf-8'));
    } catch (error) {
      throw new ScanError(filePath, new Error(`Signature index ${this.indexFile} is unreadable: ${describeError(error)}`));
    }

    const result = SignatureIndexSchema.safeParse(raw);
    if (!result.success) {
      throw new ScanError(filePath, new Error(`Signature index is invalid: ${formatZodIssues(result.error).join('; ')}`));
    }

    this.cache = { mtimeMs, files: result.data.files };
    return result.data.files;
  }
}
