/**
 * Realignment Engine Tests
 */

import { describe, it, expect, beforeAll, vi } from 'vitest';
import * as fc from 'fast-check';
import { RealignmentEngine, rankSuggestions } from './realignment-engine.js';
import { reportToAlertContext } from './report-context.js';
import { ConfigError, ValidationError } from '../../core/errors.js';
import { Logger, LogLevel } from '../../core/logger.js';
import { DRIFT_SEVERITIES, DRIFT_TYPES } from '../../models/types.js';
import type { Alert } from '../../models/alert.js';
import type { DriftItem, DriftReport } from '../../models/drift.js';
import type { Suggestion, SuggestionEnricher } from '../../models/suggestion.js';

const signatureItem: DriftItem = {
  driftType: 'SIGNATURE_MISMATCH',
  severity: 'HIGH',
  description: 'Signature of calc differs',
  confidence: 0.85,
  elementId: 'calc',
  expected: 'calc(a, b)',
  actual: 'calc(a)',
  lineNumber: 3
};

function report(items: DriftItem[]): DriftReport {
  return { filePath: 'src/calc.ts', specReference: 'docs/math.md', items };
}

function enricherOf(fn: SuggestionEnricher['enrich']) {
  return { enrich: vi.fn(fn) };
}

function alertFor(drift: DriftReport): Alert {
  return {
    id: 'ALERT-000001',
    createdAt: '2026-01-01T00:00:00.000Z',
    type: 'drift',
    severity: 'ERROR',
    title: 'Drift in src/calc.ts',
    message: '1 drift item(s)',
    context: reportToAlertContext(drift, drift.items),
    fingerprint: 'fp',
    occurrenceCount: 1,
    lastSeenAt: '2026-01-01T00:00:00.000Z',
    lastDeliveredAt: null,
    resolved: false,
    resolvedAt: null,
    resolutionNote: null,
    deliveryLog: {}
  };
}

describe('RealignmentEngine', () => {
  beforeAll(() => {
    Logger.configure({ level: LogLevel.SILENT });
  });

  describe('suggest - rule templates', () => {
    it('should return nothing for a report without items', async () => {
      const engine = new RealignmentEngine();
      expect(await engine.suggest(report([]))).toEqual([]);
    });

    it('should propose a code change and a specification update for a signature mismatch', async () => {
      const engine = new RealignmentEngine();
      const suggestions = await engine.suggest(report([signatureItem]));

      expect(suggestions).toHaveLength(2);
      expect(suggestions[0]).toEqual({
        category: 'CODE_CHANGE',
        title: 'Align signature of calc',
        description: 'Change calc(a) to match calc(a, b)',
        priority: 4,
        effort: 1,
        confidence: 0.85,
        driftType: 'SIGNATURE_MISMATCH',
        source: 'rule',
        filePath: 'src/calc.ts',
        lineNumber: 3,
        codeSnippet: 'calc(a, b)',
        steps: [
          'Update the declaration of calc to calc(a, b)',
          'Update every caller of calc',
          'Re-run driftwatch check'
        ]
      });
      expect(suggestions[1].category).toBe('DOCUMENTATION_UPDATE');
      expect(suggestions[1].title).toBe('Update specification for calc');
      expect(suggestions[1].priority).toBe(3);
      expect(suggestions[1].confidence).toBe(0.68);
    });

    it('should raise effort for wide signatures', async () => {
      const engine = new RealignmentEngine();
      const [suggestion] = await engine.suggest(report([{
        driftType: 'MISSING_IMPLEMENTATION',
        severity: 'MEDIUM',
        description: 'build is missing',
        confidence: 0.9,
        elementId: 'build',
        expected: 'build(a, b, c, d, e)'
      }]));

      expect(suggestion.title).toBe('Implement build');
      expect(suggestion.priority).toBe(3);
      expect(suggestion.effort).toBe(4);
    });

    it('should rank by priority, then effort, keeping ties in report order', async () => {
      const engine = new RealignmentEngine();
      const suggestions = await engine.suggest(report([
        { driftType: 'BEHAVIOR_DEVIATION', severity: 'HIGH', description: 'd', confidence: 0.6, elementId: 'calc', expected: 'h1', actual: 'h2' },
        { driftType: 'DOCUMENTATION_STALE', severity: 'LOW', description: 'd', confidence: 0.5, elementId: 'sum' },
        { driftType: 'DEPENDENCY_DRIFT', severity: 'MEDIUM', description: 'd', confidence: 0.8, elementId: 'pkg:zod', expected: '^3.22.0', actual: '3.21.4' }
      ]));

      expect(suggestions.map(s => s.title)).toEqual([
        'Restore expected behavior of calc',
        'Accept new behavior of calc as baseline',
        'Align dependency pkg:zod',
        'Review documentation for sum'
      ]);
      expect(suggestions[2].description).toBe('Installed 3.21.4, specification expects ^3.22.0');
      expect(suggestions[0].codeSnippet).toBeUndefined();
    });
  });

  describe('suggest - enrichment', () => {
    const extra: Suggestion = {
      category: 'REFACTORING',
      title: 'Extract calc into its own module',
      description: 'calc has grown',
      priority: 2,
      effort: 2,
      confidence: 0.7,
      driftType: 'SIGNATURE_MISMATCH',
      source: 'ai',
      steps: ['Move calc']
    };

    it('should add enricher suggestions marked as ai', async () => {
      const engine = new RealignmentEngine({ enricher: enricherOf(async () => [extra]) });
      const suggestions = await engine.suggest(report([signatureItem]));

      expect(suggestions).toHaveLength(3);
      expect(suggestions[2]).toEqual({ ...extra, aiConfidence: 0.7, filePath: 'src/calc.ts' });
    });

    it('should merge a duplicate into the rule suggestion', async () => {
      const duplicate: Suggestion = {
        ...extra,
        category: 'CODE_CHANGE',
        title: '  ALIGN signature of calc ',
        filePath: 'src/calc.ts',
        confidence: 0.95,
        steps: ['Update every caller of calc', 'Bump the minor version']
      };
      const engine = new RealignmentEngine();
      const suggestions = await engine.suggest(report([signatureItem]), enricherOf(async () => [duplicate]));

      expect(suggestions).toHaveLength(2);
      expect(suggestions[0].source).toBe('rule');
      expect(suggestions[0].aiConfidence).toBe(0.95);
      expect(suggestions[0].steps).toEqual([
        'Update the declaration of calc to calc(a, b)',
        'Update every caller of calc',
        'Re-run driftwatch check',
        'Bump the minor version'
      ]);
    });

    it('should fall back to rule suggestions when the enricher throws', async () => {
      const engine = new RealignmentEngine();
      const expected = await engine.suggest(report([signatureItem]));
      const failing = enricherOf(async () => {
        throw new Error('model unavailable');
      });

      expect(await engine.suggest(report([signatureItem]), failing)).toEqual(expected);
      expect(failing.enrich).toHaveBeenCalledTimes(1);
    });

    it('should fall back when the enricher exceeds its time budget', async () => {
      const engine = new RealignmentEngine({ settings: { enrichmentTimeoutMs: 20 } });
      const stalled = enricherOf(() => new Promise<Suggestion[]>(() => undefined));

      const suggestions = await engine.suggest(report([signatureItem]), stalled);

      expect(suggestions.map(s => s.source)).toEqual(['rule', 'rule']);
    });

    it('should reject enricher output that fails validation', async () => {
      const engine = new RealignmentEngine();
      const suggestions = await engine.suggest(
        report([signatureItem]),
        enricherOf(async () => [{ ...extra, priority: 9 }])
      );

      expect(suggestions).toHaveLength(2);
    });

    it('should cache enrichment per report until the entry expires', async () => {
      let now = 1_000;
      const enricher = enricherOf(async () => [extra]);
      const engine = new RealignmentEngine({ enricher, settings: { cacheTtlMs: 100 }, now: () => now });

      await engine.suggest(report([signatureItem]));
      await engine.suggest(report([signatureItem]));
      expect(enricher.enrich).toHaveBeenCalledTimes(1);

      now += 101;
      await engine.suggest(report([signatureItem]));
      expect(enricher.enrich).toHaveBeenCalledTimes(2);
    });

    it('should not cache when the cache TTL is zero', async () => {
      const enricher = enricherOf(async () => [extra]);
      const engine = new RealignmentEngine({ enricher, settings: { cacheTtlMs: 0 } });

      await engine.suggest(report([signatureItem]));
      await engine.suggest(report([signatureItem]));

      expect(enricher.enrich).toHaveBeenCalledTimes(2);
    });
  });

  describe('suggestForAlert', () => {
    it('should rebuild the report from alert context', async () => {
      const engine = new RealignmentEngine();
      const drift = report([signatureItem]);

      expect(await engine.suggestForAlert(alertFor(drift))).toEqual(await engine.suggest(drift));
    });

    it('should reject alerts that carry no drift report', async () => {
      const engine = new RealignmentEngine();
      const alert = { ...alertFor(report([signatureItem])), context: { reason: 'scan failed' } };

      await expect(engine.suggestForAlert(alert)).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('buildPlan', () => {
    it('should total effort and group suggestions', async () => {
      const engine = new RealignmentEngine();
      const plan = await engine.buildPlan(report([signatureItem]));

      expect(plan.filePath).toBe('src/calc.ts');
      expect(plan.totalEffort).toBe(2);
      expect(plan.byCategory).toEqual({ CODE_CHANGE: 1, DOCUMENTATION_UPDATE: 1 });
      expect(plan.byPriority).toEqual({ '4': 1, '3': 1 });
    });
  });

  describe('configuration', () => {
    it('should reject invalid settings', () => {
      expect(() => new RealignmentEngine({ settings: { enrichmentTimeoutMs: 0 } })).toThrow(ConfigError);
    });
  });

  describe('properties', () => {
    const itemArb: fc.Arbitrary<DriftItem> = fc.record({
      driftType: fc.constantFrom(...DRIFT_TYPES),
      severity: fc.constantFrom(...DRIFT_SEVERITIES),
      description: fc.string(),
      confidence: fc.double({ min: 0, max: 1, noNaN: true }),
      elementId: fc.stringMatching(/^[a-z]{1,8}$/)
    });

    it('should always return ranked rule suggestions when enrichment fails', async () => {
      const engine = new RealignmentEngine();
      const failing: SuggestionEnricher = {
        enrich: async () => {
          throw new Error('down');
        }
      };

      await fc.assert(
        fc.asyncProperty(fc.array(itemArb, { minLength: 1, maxLength: 6 }), async items => {
          const suggestions = await engine.suggest(report(items), failing);

          expect(suggestions.length).toBeGreaterThanOrEqual(items.length);
          expect(suggestions.every(s => s.source === 'rule')).toBe(true);
          expect(rankSuggestions(suggestions)).toEqual(suggestions);
          for (const suggestion of suggestions) {
            expect(suggestion.effort).toBeGreaterThanOrEqual(1);
            expect(suggestion.effort).toBeLessThanOrEqual(5);
          }
        }),
        { numRuns: 50 }
      );
    });
  });
});
