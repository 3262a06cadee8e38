// Stable hashing for alert fingerprints and report digests

import { createHash } from 'crypto';
import type { AlertType, DriftType } from '../models/types.js';
import type { CurrentSignatures } from '../models/specification.js';
import type { DriftReport } from '../models/drift.js';

/**
 * Parts that identify a recurring alert
 */
export interface FingerprintParts {
  type: AlertType;
  filePath: string;
  specReference: string | null;
  driftType?: DriftType;
}

function sha256(content: string): string {
  return createHash('sha256').update(content, 'utf8').digest('hex');
}

/**
 * Computes the suppression fingerprint for an alert.
 * Path separators are normalized so the same file hashes the same on every platform.
 */
export function computeFingerprint(parts: FingerprintParts): string {
  const normalized = [
    parts.type,
    parts.filePath.replace(/\\/g, '/'),
    parts.specReference ?? '',
    parts.driftType ?? ''
  ];
  return sha256(JSON.stringify(normalized));
}

/**
 * Digest of observed code for one file, independent of key order
 */
export function computeSignatureDigest(signatures: CurrentSignatures): string {
  const entries = Object.keys(signatures)
    .sort()
    .map(id => {
      const observed = signatures[id];
      return [id, observed.signature.replace(/\s+/g, ' ').trim(), observed.behaviorHash ?? ''];
    });
  return sha256(JSON.stringify(entries));
}

/**
 * Digest of a drift report's content, used as a cache key
 */
export function computeReportDigest(report: DriftReport): string {
  return sha256(JSON.stringify({
    filePath: report.filePath,
    specReference: report.specReference,
    items: report.items.map(item => [
      item.driftType,
      item.severity,
      item.elementId,
      item.expected ?? '',
      item.actual ?? '',
      item.lineNumber ?? 0,
      item.confidence
    ])
  }));
}

/**
 * Short hash of an element's documented contract
 */
export function computeDocHash(signature: string, description: string | undefined, behaviorHash: string | undefined): string {
  return sha256(JSON.stringify([signature.replace(/\s+/g, ' ').trim(), description ?? '', behaviorHash ?? ''])).slice(0, 16);
}
