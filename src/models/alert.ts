// Alert model

import { AlertSeverity, AlertType, DriftType } from './types.js';

/**
 * JSON-compatible value stored in alert context
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type AlertContext = { [key: string]: JsonValue };

/**
 * Outcome of one channel delivery attempt
 */
export interface DeliveryResult {
  success: boolean;
  error?: string;
}

/**
 * Latest delivery outcome for one channel
 */
export interface DeliveryRecord extends DeliveryResult {
  attemptedAt: string;
  durationMs: number;
  attempts: number;
}

export interface Alert {
  id: string;
  createdAt: string;
  type: AlertType;
  severity: AlertSeverity;
  title: string;
  message: string;
  context: AlertContext;
  fingerprint: string;
  occurrenceCount: number;
  lastSeenAt: string;
  lastDeliveredAt: string | null;
  resolved: boolean;
  resolvedAt: string | null;
  resolutionNote: string | null;
  deliveryLog: Record<string, DeliveryRecord>;
}

/**
 * Input to AlertSystem.createAlert
 */
export interface AlertEvent {
  type: AlertType;
  severity: AlertSeverity;
  title: string;
  message: string;
  filePath: string;
  specReference: string | null;
  driftType?: DriftType;
  context?: AlertContext;
}

export type CreateAlertResult =
  | { status: 'created'; alert: Alert }
  | { status: 'redelivered'; alert: Alert }
  | { status: 'suppressed'; alert: Alert };

/**
 * Routes alerts of matching type and severity to channels
 */
export interface AlertRule {
  name: string;
  /** Alert types this rule applies to; all types when omitted */
  types?: AlertType[];
  minSeverity: AlertSeverity;
  channels: string[];
  suppressionWindowSeconds: number;
}

/**
 * Pluggable delivery channel
 */
export interface AlertChannel {
  readonly name: string;
  send(alert: Readonly<Alert>): Promise<DeliveryResult>;
}

export interface AlertFilters {
  resolved?: boolean;
  severity?: AlertSeverity;
  minSeverity?: AlertSeverity;
  type?: AlertType;
  filePath?: string;
  since?: Date;
}

export interface AlertSummary {
  total: number;
  open: number;
  resolved: number;
  totalOccurrences: number;
  bySeverity: Record<AlertSeverity, number>;
  byType: Record<AlertType, number>;
  failedDeliveries: Record<string, number>;
  timeline: Array<{ hour: string; count: number }>;
}
