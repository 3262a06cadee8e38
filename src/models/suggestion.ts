// Realignment suggestion model

import { DriftType, SuggestionCategory, SuggestionSource } from './types.js';
import { DriftReport } from './drift.js';

export interface Suggestion {
  category: SuggestionCategory;
  title: string;
  description: string;
  /** 1 (lowest) .. 5 (highest) */
  priority: number;
  /** 1 (trivial) .. 5 (large) */
  effort: number;
  /** 0..1 */
  confidence: number;
  driftType: DriftType;
  source: SuggestionSource;
  /** Confidence reported by the enricher for this suggestion */
  aiConfidence?: number;
  filePath?: string;
  lineNumber?: number;
  codeSnippet?: string;
  steps: string[];
}

/**
 * Optional collaborator that proposes extra suggestions
 */
export interface SuggestionEnricher {
  enrich(report: DriftReport): Promise<Suggestion[]>;
}

export interface RealignmentPlan {
  filePath: string;
  suggestions: Suggestion[];
  /** Sum of suggestion efforts */
  totalEffort: number;
  byCategory: Partial<Record<SuggestionCategory, number>>;
  byPriority: Record<string, number>;
}
