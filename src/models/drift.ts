// Drift report model

import { DriftSeverity, DriftType } from './types.js';

/**
 * A single detected deviation, tied to exactly one specification element
 */
export interface DriftItem {
  readonly driftType: DriftType;
  readonly severity: DriftSeverity;
  readonly description: string;
  /** 0..1 */
  readonly confidence: number;
  readonly elementId: string;
  readonly expected?: string;
  readonly actual?: string;
  readonly lineNumber?: number;
}

export type DriftNoticeCode = 'NO_SPECIFICATION' | 'SPEC_LOAD_FAILED';

/**
 * INFO-level note attached to a report that could not be checked
 */
export interface DriftNotice {
  readonly code: DriftNoticeCode;
  readonly level: 'INFO';
  readonly message: string;
}

/**
 * Immutable result of checking one file
 */
export interface DriftReport {
  readonly filePath: string;
  readonly specReference: string | null;
  readonly items: readonly DriftItem[];
  readonly notice?: DriftNotice;
}

/**
 * Per-file baseline snapshot handed to the detector
 */
export interface SignatureBaseline {
  /** Last observed signature per element that matched the specification */
  readonly stableSignatures: Readonly<Record<string, string>>;
  /** First observed behavior hash per element */
  readonly behaviorHashes: Readonly<Record<string, string>>;
  /** Documentation hash per element when last seen */
  readonly elementDocHashes: Readonly<Record<string, string>>;
  readonly specRevision?: string;
  /** Digest of the observed code when last seen */
  readonly codeDigest?: string;
}
