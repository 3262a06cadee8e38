/**
 * Realignment Engine
 *
 * Turns drift reports into ranked corrective suggestions. Rule templates
 * always produce a result; an optional enricher may add suggestions within
 * a time budget.
 */

import { z } from 'zod';
import { withTimeout } from '../../core/async.js';
import { ConfigError, SuggestionGenerationError, describeError } from '../../core/errors.js';
import { computeReportDigest } from '../../core/fingerprint.js';
import { Logger } from '../../core/logger.js';
import {
  RealignmentSettingsSchema,
  SuggestionSchema,
  formatZodIssues,
  type RealignmentSettings,
  type RealignmentSettingsInput
} from '../../core/schemas.js';
import type { DriftSeverity, DriftType, SuggestionCategory } from '../../models/types.js';
import type { Alert } from '../../models/alert.js';
import type { DriftItem, DriftReport } from '../../models/drift.js';
import type { RealignmentPlan, Suggestion, SuggestionEnricher } from '../../models/suggestion.js';
import { countParameters } from '../drift/signatures.js';
import { TtlCache } from '../storage/cache.js';
import { reportFromAlert } from './report-context.js';

/**
 * Suggestion priority per drift severity
 */
export const SEVERITY_PRIORITY: Readonly<Record<DriftSeverity, number>> = {
  CRITICAL: 5,
  HIGH: 4,
  MEDIUM: 3,
  LOW: 2
};

interface SuggestionTemplate {
  category: SuggestionCategory;
  title: (item: DriftItem) => string;
  description: (item: DriftItem) => string;
  steps: (item: DriftItem) => string[];
  baseEffort: number;
  /** Alternative fixes rank one priority step below the primary one */
  alternative?: boolean;
}

const TEMPLATES: Record<DriftType, SuggestionTemplate[]> = {
  MISSING_IMPLEMENTATION: [
    {
      category: 'CODE_CHANGE',
      title: item => `Implement ${item.elementId}`,
      description: item => `Add ${item.elementId} as declared by the specification: ${item.expected ?? item.elementId}`,
      steps: item => [
        `Add ${item.elementId} with signature ${item.expected ?? '(see specification)'}`,
        `Cover ${item.elementId} with a test`,
        'Re-run driftwatch check'
      ],
      baseEffort: 2
    }
  ],
  SIGNATURE_MISMATCH: [
    {
      category: 'CODE_CHANGE',
      title: item => `Align signature of ${item.elementId}`,
      description: item => `Change ${item.actual ?? item.elementId} to match ${item.expected ?? 'the specification'}`,
      steps: item => [
        `Update the declaration of ${item.elementId} to ${item.expected ?? 'the specified signature'}`,
        `Update every caller of ${item.elementId}`,
        'Re-run driftwatch check'
      ],
      baseEffort: 1
    },
    {
      category: 'DOCUMENTATION_UPDATE',
      title: item => `Update specification for ${item.elementId}`,
      description: item => `If ${item.actual ?? 'the new signature'} is intended, record it in the specification`,
      steps: item => [
        `Change the documented signature of ${item.elementId} to ${item.actual ?? 'the implemented one'}`,
        'Note the change in the specification revision history'
      ],
      baseEffort: 1,
      alternative: true
    }
  ],
  BEHAVIOR_DEVIATION: [
    {
      category: 'REFACTORING',
      title: item => `Restore expected behavior of ${item.elementId}`,
      description: item => `${item.elementId} no longer behaves as its baseline; review the recent change`,
      steps: item => [
        `Compare the current implementation of ${item.elementId} with the last accepted version`,
        'Add a regression test for the expected behavior',
        'Revert or fix the behavioral change'
      ],
      baseEffort: 3
    },
    {
      category: 'CONFIGURATION_CHANGE',
      title: item => `Accept new behavior of ${item.elementId} as baseline`,
      description: item => `If the new behavior of ${item.elementId} is intended, update its behavior hash`,
      steps: item => [
        `Update the behavior hash of ${item.elementId} in the specification`,
        'Or accept the current baseline for the file'
      ],
      baseEffort: 1,
      alternative: true
    }
  ],
  DOCUMENTATION_STALE: [
    {
      category: 'DOCUMENTATION_UPDATE',
      title: item => `Review documentation for ${item.elementId}`,
      description: item => `The documented contract of ${item.elementId} changed while its code did not`,
      steps: item => [
        `Check whether the new documentation of ${item.elementId} requires a code change`,
        'Either implement the change or revert the documentation'
      ],
      baseEffort: 1
    }
  ],
  DEPENDENCY_DRIFT: [
    {
      category: 'DEPENDENCY_UPDATE',
      title: item => `Align dependency ${item.elementId}`,
      description: item => item.actual
        ? `Installed ${item.actual}, specification expects ${item.expected ?? 'another version'}`
        : `Install ${item.elementId} ${item.expected ?? ''}`.trim(),
      steps: item => [
        `Set ${item.elementId} to ${item.expected ?? 'the specified version'} in the manifest`,
        'Reinstall dependencies and run the test suite'
      ],
      baseEffort: 1
    }
  ],
  API_BREAKING_CHANGE: [
    {
      category: 'API_UPDATE',
      title: item => `Restore public API ${item.elementId}`,
      description: item => `Consumers rely on ${item.expected ?? item.elementId}; restore it or add a compatible overload`,
      steps: item => [
        `Reintroduce ${item.expected ?? item.elementId}`,
        'Delegate the old entry point to the new implementation',
        'Mark the old entry point deprecated'
      ],
      baseEffort: 3
    },
    {
      category: 'DOCUMENTATION_UPDATE',
      title: item => `Announce breaking change to ${item.elementId}`,
      description: () => 'If the break is intended, publish a migration note and bump the major version',
      steps: () => ['Write a migration note', 'Bump the major version'],
      baseEffort: 2,
      alternative: true
    }
  ]
};

const EnricherOutputSchema = z.array(SuggestionSchema);

/**
 * Extra effort for wide signatures
 */
function sizeBucket(signature: string | undefined): number {
  const params = signature ? countParameters(signature) : null;
  if (params === null || params <= 2) return 0;
  if (params <= 4) return 1;
  return 2;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

function dedupeKey(suggestion: Suggestion): string {
  return `${suggestion.category}|${suggestion.filePath ?? ''}|${suggestion.title.trim().toLowerCase()}`;
}

/**
 * Priority descending, then effort ascending; ties keep their order
 */
export function rankSuggestions(suggestions: Suggestion[]): Suggestion[] {
  return suggestions
    .map((suggestion, index) => ({ suggestion, index }))
    .sort((a, b) =>
      b.suggestion.priority - a.suggestion.priority ||
      a.suggestion.effort - b.suggestion.effort ||
      a.index - b.index
    )
    .map(entry => entry.suggestion);
}

export interface RealignmentEngineOptions {
  settings?: RealignmentSettingsInput;
  /** Used when a call does not pass its own enricher */
  enricher?: SuggestionEnricher;
  /** Milliseconds clock for the enrichment cache */
  now?: () => number;
}

/**
 * Realignment Engine Implementation
 */
export class RealignmentEngine {
  private readonly settings: RealignmentSettings;
  private readonly defaultEnricher?: SuggestionEnricher;
  private readonly cache: TtlCache<Suggestion[]>;
  private readonly log = Logger.getInstance().child('realignment');

  constructor(options: RealignmentEngineOptions = {}) {
    const parsed = RealignmentSettingsSchema.safeParse(options.settings ?? {});
    if (!parsed.success) {
      const issues = formatZodIssues(parsed.error);
      throw new ConfigError(`Invalid realignment settings: ${issues.join('; ')}`, issues);
    }
    this.settings = parsed.data;
    this.defaultEnricher = options.enricher;
    this.cache = new TtlCache<Suggestion[]>(
      { ttl: this.settings.cacheTtlMs, maxEntries: this.settings.cacheMaxEntries, enabled: this.settings.cacheTtlMs > 0 },
      options.now
    );
  }

  /**
   * Ranked suggestions for a report. Never empty when the report has items.
   */
  async suggest(report: DriftReport, enricher: SuggestionEnricher | undefined = this.defaultEnricher): Promise<Suggestion[]> {
    if (report.items.length === 0) {
      return [];
    }

    const suggestions = report.items.flatMap(item => this.fromTemplates(report, item));
    if (!enricher) {
      return rankSuggestions(suggestions);
    }

    try {
      const enriched = await this.enrich(report, enricher);
      return rankSuggestions(this.merge(suggestions, enriched));
    } catch (error) {
      const failure = error instanceof SuggestionGenerationError
        ? error
        : new SuggestionGenerationError(describeError(error), error);
      this.log.warn(`${failure.message}; using rule-based suggestions`, { filePath: report.filePath });
      return rankSuggestions(suggestions);
    }
  }

  /**
   * Suggestions for the drift report stored on an alert
   */
  async suggestForAlert(alert: Readonly<Alert>, enricher?: SuggestionEnricher): Promise<Suggestion[]> {
    return this.suggest(reportFromAlert(alert), enricher ?? this.defaultEnricher);
  }

  async buildPlan(report: DriftReport, enricher?: SuggestionEnricher): Promise<RealignmentPlan> {
    const suggestions = await this.suggest(report, enricher ?? this.defaultEnricher);
    const byCategory: RealignmentPlan['byCategory'] = {};
    const byPriority: Record<string, number> = {};

    for (const suggestion of suggestions) {
      byCategory[suggestion.category] = (byCategory[suggestion.category] ?? 0) + 1;
      byPriority[String(suggestion.priority)] = (byPriority[String(suggestion.priority)] ?? 0) + 1;
    }

    return {
      filePath: report.filePath,
      suggestions,
      totalEffort: suggestions.reduce((sum, suggestion) => sum + suggestion.effort, 0),
      byCategory,
      byPriority
    };
  }

  private fromTemplates(report: DriftReport, item: DriftItem): Suggestion[] {
    const priority = SEVERITY_PRIORITY[item.severity];
    const bucket = sizeBucket(item.expected);

    return TEMPLATES[item.driftType].map(template => ({
      category: template.category,
      title: template.title(item),
      description: template.description(item),
      priority: template.alternative ? Math.max(1, priority - 1) : priority,
      effort: clamp(template.baseEffort + bucket, 1, 5),
      confidence: template.alternative ? Math.round(item.confidence * 80) / 100 : item.confidence,
      driftType: item.driftType,
      source: 'rule' as const,
      filePath: report.filePath,
      ...(item.lineNumber !== undefined ? { lineNumber: item.lineNumber } : {}),
      ...(item.expected !== undefined && item.driftType !== 'BEHAVIOR_DEVIATION' ? { codeSnippet: item.expected } : {}),
      steps: template.steps(item)
    }));
  }

  private async enrich(report: DriftReport, enricher: SuggestionEnricher): Promise<Suggestion[]> {
    const key = computeReportDigest(report);
    const cached = this.cache.get(key);
    if (cached) {
      return cached;
    }

    const raw: unknown = await withTimeout(
      enricher.enrich(report),
      this.settings.enrichmentTimeoutMs,
      'Suggestion enrichment'
    );

    const parsed = EnricherOutputSchema.safeParse(raw);
    if (!parsed.success) {
      throw new SuggestionGenerationError(`invalid enricher output: ${formatZodIssues(parsed.error).join('; ')}`);
    }

    const suggestions = parsed.data.map((suggestion): Suggestion => ({
      ...suggestion,
      source: 'ai',
      aiConfidence: suggestion.confidence,
      filePath: suggestion.filePath ?? report.filePath
    }));
    this.cache.set(key, suggestions);
    return suggestions;
  }

  private merge(rules: Suggestion[], enriched: Suggestion[]): Suggestion[] {
    const merged = rules.map(suggestion => ({ ...suggestion, steps: [...suggestion.steps] }));
    const byKey = new Map(merged.map(suggestion => [dedupeKey(suggestion), suggestion]));

    for (const suggestion of enriched) {
      const existing = byKey.get(dedupeKey(suggestion));
      if (existing) {
        existing.aiConfidence = suggestion.confidence;
        for (const step of suggestion.steps) {
          if (!existing.steps.includes(step)) {
            existing.steps.push(step);
          }
        }
        continue;
      }
      const added = { ...suggestion, steps: [...suggestion.steps] };
      byKey.set(dedupeKey(added), added);
      merged.push(added);
    }

    return merged;
  }
}
