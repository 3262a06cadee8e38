// Core type definitions for driftwatch

// Drift classification
export const DRIFT_TYPES = [
  'MISSING_IMPLEMENTATION',
  'SIGNATURE_MISMATCH',
  'BEHAVIOR_DEVIATION',
  'DOCUMENTATION_STALE',
  'DEPENDENCY_DRIFT',
  'API_BREAKING_CHANGE'
] as const;
export type DriftType = (typeof DRIFT_TYPES)[number];

export const DRIFT_SEVERITIES = ['LOW', 'MEDIUM', 'HIGH', 'CRITICAL'] as const;
export type DriftSeverity = (typeof DRIFT_SEVERITIES)[number];

// Alerting
export const ALERT_SEVERITIES = ['INFO', 'WARNING', 'ERROR', 'CRITICAL'] as const;
export type AlertSeverity = (typeof ALERT_SEVERITIES)[number];

export const ALERT_TYPES = ['drift', 'scan_error', 'monitor'] as const;
export type AlertType = (typeof ALERT_TYPES)[number];

// File changes
export type ChangeKind = 'created' | 'modified' | 'deleted';
export type OverflowPolicy = 'drop-oldest' | 'drop-newest';

// Suggestions
export const SUGGESTION_CATEGORIES = [
  'CODE_CHANGE',
  'API_UPDATE',
  'DOCUMENTATION_UPDATE',
  'DEPENDENCY_UPDATE',
  'REFACTORING',
  'CONFIGURATION_CHANGE'
] as const;
export type SuggestionCategory = (typeof SUGGESTION_CATEGORIES)[number];
export type SuggestionSource = 'rule' | 'ai';

/**
 * Numeric rank of an alert severity, for threshold comparisons
 */
export function alertSeverityRank(severity: AlertSeverity): number {
  return ALERT_SEVERITIES.indexOf(severity);
}

/**
 * Numeric rank of a drift severity
 */
export function driftSeverityRank(severity: DriftSeverity): number {
  return DRIFT_SEVERITIES.indexOf(severity);
}

/**
 * Maps drift severity onto the alert scale
 */
export function toAlertSeverity(severity: DriftSeverity): AlertSeverity {
  switch (severity) {
    case 'CRITICAL':
      return 'CRITICAL';
    case 'HIGH':
      return 'ERROR';
    case 'MEDIUM':
      return 'WARNING';
    case 'LOW':
      return 'INFO';
  }
}
