/**
 * Drift Detector
 *
 * Compares the signatures extracted from a file against the elements of its
 * specification and classifies every deviation.
 */

import { computeDocHash, computeSignatureDigest } from '../../core/fingerprint.js';
import { DRIFT_TYPES, DriftSeverity, DriftType } from '../../models/types.js';
import type {
  CurrentSignatures,
  ExpectedElement,
  ObservedSignature,
  Specification
} from '../../models/specification.js';
import type {
  DriftItem,
  DriftNoticeCode,
  DriftReport,
  SignatureBaseline
} from '../../models/drift.js';
import {
  countParameters,
  normalizeVersion,
  ownEntry,
  signaturesEqual
} from './signatures.js';

/**
 * Default confidence weight per drift type
 */
export const DEFAULT_DRIFT_WEIGHTS: Readonly<Record<DriftType, number>> = {
  API_BREAKING_CHANGE: 0.95,
  MISSING_IMPLEMENTATION: 0.9,
  SIGNATURE_MISMATCH: 0.85,
  DEPENDENCY_DRIFT: 0.8,
  BEHAVIOR_DEVIATION: 0.6,
  DOCUMENTATION_STALE: 0.5
};

/** Applied to signature changes that keep the parameter count */
const TYPE_ONLY_CHANGE_FACTOR = 0.9;

export interface DriftDetectorOptions {
  /** Overrides for the default weight table */
  weights?: Partial<Record<DriftType, number>>;
  /** Items scoring below this are dropped (default 0.5) */
  minConfidence?: number;
  /** Drift types to report (default: all) */
  enabledChecks?: readonly DriftType[];
}

/**
 * Drift Detector Interface
 */
export interface IDriftDetector {
  check(
    filePath: string,
    currentSignatures: CurrentSignatures,
    specification: Specification | undefined,
    baseline?: SignatureBaseline
  ): DriftReport;
  unchecked(filePath: string, code: DriftNoticeCode, message: string): DriftReport;
}

type Candidate = Omit<DriftItem, 'confidence'> & { confidenceFactor: number };

function deepFreeze(report: DriftReport): DriftReport {
  for (const item of report.items) {
    Object.freeze(item);
  }
  Object.freeze(report.items);
  if (report.notice) {
    Object.freeze(report.notice);
  }
  return Object.freeze(report);
}

/**
 * Drift Detector Implementation
 *
 * Stateless: the same inputs always produce an equal report.
 */
export class DriftDetector implements IDriftDetector {
  private readonly weights: Record<DriftType, number>;
  private readonly minConfidence: number;
  private readonly enabledChecks: ReadonlySet<DriftType>;

  constructor(options: DriftDetectorOptions = {}) {
    this.weights = { ...DEFAULT_DRIFT_WEIGHTS, ...options.weights };
    this.minConfidence = options.minConfidence ?? 0.5;
    this.enabledChecks = new Set(options.enabledChecks ?? DRIFT_TYPES);
  }

  /**
   * Classify every deviation between a file and its specification
   */
  check(
    filePath: string,
    currentSignatures: CurrentSignatures,
    specification: Specification | undefined,
    baseline?: SignatureBaseline
  ): DriftReport {
    if (!specification) {
      return this.unchecked(filePath, 'NO_SPECIFICATION', `No specification covers ${filePath}`);
    }

    const codeDigest = computeSignatureDigest(currentSignatures);
    const items: DriftItem[] = [];

    for (const element of specification.elements) {
      const observed = ownEntry(currentSignatures, element.id);

      const candidate = element.kind === 'dependency'
        ? this.classifyDependency(element, observed)
        : this.classifySymbol(element, observed, specification, baseline, codeDigest);

      if (!candidate || !this.enabledChecks.has(candidate.driftType)) {
        continue;
      }

      const { confidenceFactor, ...rest } = candidate;
      const confidence = Math.round(this.weights[candidate.driftType] * confidenceFactor * 100) / 100;
      if (confidence < this.minConfidence) {
        continue;
      }

      items.push({ ...rest, confidence });
    }

    return deepFreeze({
      filePath,
      specReference: specification.sourceRef,
      items
    });
  }

  /**
   * Empty INFO-level report for a file that could not be checked
   */
  unchecked(filePath: string, code: DriftNoticeCode, message: string): DriftReport {
    return deepFreeze({
      filePath,
      specReference: null,
      items: [],
      notice: { code, level: 'INFO', message }
    });
  }

  private classifySymbol(
    element: ExpectedElement,
    observed: ObservedSignature | undefined,
    specification: Specification,
    baseline: SignatureBaseline | undefined,
    codeDigest: string
  ): Candidate | null {
    const stable = baseline ? ownEntry(baseline.stableSignatures, element.id) : undefined;
    const wasStable = stable !== undefined && signaturesEqual(stable, element.signature);
    const base = {
      elementId: element.id,
      expected: element.signature,
      ...(observed?.line !== undefined ? { lineNumber: observed.line } : {})
    };

    if (!observed) {
      if (element.isBreakingIfRemoved && wasStable) {
        return {
          ...base,
          driftType: 'API_BREAKING_CHANGE',
          severity: 'CRITICAL',
          description: `Public API ${element.id} was removed; previously implemented as ${element.signature}`,
          confidenceFactor: 1
        };
      }
      return {
        ...base,
        driftType: 'MISSING_IMPLEMENTATION',
        severity: 'HIGH',
        description: `Expected ${element.id} (${element.signature}) is not implemented`,
        confidenceFactor: 1
      };
    }

    if (!signaturesEqual(observed.signature, element.signature)) {
      const expectedArity = countParameters(element.signature);
      const actualArity = countParameters(observed.signature);
      const arityChanged = expectedArity !== actualArity;

      if (element.isBreakingIfRemoved && wasStable) {
        return {
          ...base,
          actual: observed.signature,
          driftType: 'API_BREAKING_CHANGE',
          severity: 'CRITICAL',
          description: `Public API ${element.id} changed incompatibly: expected ${element.signature}, found ${observed.signature}`,
          confidenceFactor: 1
        };
      }

      const severity: DriftSeverity = element.isBreakingIfRemoved ? 'HIGH' : 'MEDIUM';
      const arityNote = arityChanged && expectedArity !== null && actualArity !== null
        ? ` (${expectedArity} parameter(s) expected, ${actualArity} found)`
        : '';

      return {
        ...base,
        actual: observed.signature,
        driftType: 'SIGNATURE_MISMATCH',
        severity,
        description: `Signature of ${element.id} differs: expected ${element.signature}, found ${observed.signature}${arityNote}`,
        confidenceFactor: arityChanged ? 1 : TYPE_ONLY_CHANGE_FACTOR
      };
    }

    const expectedBehavior = element.behaviorHash ?? (baseline ? ownEntry(baseline.behaviorHashes, element.id) : undefined);
    if (expectedBehavior && observed.behaviorHash && observed.behaviorHash !== expectedBehavior) {
      return {
        ...base,
        expected: expectedBehavior,
        actual: observed.behaviorHash,
        driftType: 'BEHAVIOR_DEVIATION',
        severity: 'MEDIUM',
        description: `Behavior of ${element.id} deviates from its baseline`,
        confidenceFactor: 1
      };
    }

    if (this.isDocumentationStale(element, specification, baseline, codeDigest)) {
      return {
        ...base,
        driftType: 'DOCUMENTATION_STALE',
        severity: 'LOW',
        description: `Documentation for ${element.id} changed in revision ${specification.revision} without a matching code change`,
        confidenceFactor: 1
      };
    }

    return null;
  }

  private isDocumentationStale(
    element: ExpectedElement,
    specification: Specification,
    baseline: SignatureBaseline | undefined,
    codeDigest: string
  ): boolean {
    if (!baseline || !specification.revision || !baseline.specRevision) {
      return false;
    }
    if (specification.revision === baseline.specRevision || baseline.codeDigest !== codeDigest) {
      return false;
    }

    const lastSeen = ownEntry(baseline.elementDocHashes, element.id);
    const current = computeDocHash(element.signature, element.description, element.behaviorHash);
    return lastSeen !== undefined && lastSeen !== current;
  }

  private classifyDependency(
    element: ExpectedElement,
    observed: ObservedSignature | undefined
  ): Candidate | null {
    if (!observed) {
      return {
        elementId: element.id,
        expected: element.signature,
        driftType: 'DEPENDENCY_DRIFT',
        severity: 'MEDIUM',
        description: `Declared dependency ${element.id} (${element.signature}) is not installed`,
        confidenceFactor: 1
      };
    }

    if (normalizeVersion(observed.signature) === normalizeVersion(element.signature)) {
      return null;
    }

    return {
      elementId: element.id,
      expected: element.signature,
      actual: observed.signature,
      ...(observed.line !== undefined ? { lineNumber: observed.line } : {}),
      driftType: 'DEPENDENCY_DRIFT',
      severity: 'MEDIUM',
      description: `Dependency ${element.id} is at ${observed.signature}, expected ${element.signature}`,
      confidenceFactor: 1
    };
  }

  /**
   * Counts report items by type and severity
   */
  getSummary(report: DriftReport): {
    total: number;
    byType: Partial<Record<DriftType, number>>;
    bySeverity: Partial<Record<DriftSeverity, number>>;
  } {
    const byType: Partial<Record<DriftType, number>> = {};
    const bySeverity: Partial<Record<DriftSeverity, number>> = {};

    for (const item of report.items) {
      byType[item.driftType] = (byType[item.driftType] ?? 0) + 1;
      bySeverity[item.severity] = (bySeverity[item.severity] ?? 0) + 1;
    }

    return { total: report.items.length, byType, bySeverity };
  }

  /**
   * Format drift report for display
   */
  formatReport(report: DriftReport): string {
    if (report.notice) {
      return `[INFO] ${report.notice.message}`;
    }
    if (report.items.length === 0) {
      return `No drift detected in ${report.filePath}.`;
    }

    const lines: string[] = [];
    lines.push(`Drift Report: ${report.filePath}`);
    lines.push(`${'='.repeat(50)}`);
    lines.push(`Specification: ${report.specReference}`);
    lines.push(`Found ${report.items.length} drift item(s)\n`);

    for (const item of report.items) {
      const location = item.lineNumber !== undefined ? `:${item.lineNumber}` : '';
      lines.push(`[${item.severity}] ${item.driftType} ${item.elementId}${location}`);
      lines.push(`  ${item.description}`);
      lines.push(`  confidence ${item.confidence.toFixed(2)}`);
    }

    return lines.join('\n');
  }
}

