// Conversion between drift reports and the JSON context stored on alerts

import { z } from 'zod';
import { ValidationError } from '../../core/errors.js';
import { DriftItemSchema } from '../../core/schemas.js';
import type { Alert, AlertContext, JsonValue } from '../../models/alert.js';
import type { DriftItem, DriftReport } from '../../models/drift.js';

const AlertReportContextSchema = z.object({
  filePath: z.string().min(1),
  specReference: z.string().nullable(),
  items: z.array(DriftItemSchema)
});

function itemToJson(item: DriftItem): { [key: string]: JsonValue } {
  return {
    driftType: item.driftType,
    severity: item.severity,
    description: item.description,
    confidence: item.confidence,
    elementId: item.elementId,
    ...(item.expected !== undefined ? { expected: item.expected } : {}),
    ...(item.actual !== undefined ? { actual: item.actual } : {}),
    ...(item.lineNumber !== undefined ? { lineNumber: item.lineNumber } : {})
  };
}

/**
 * Alert context carrying the given items of a report
 */
export function reportToAlertContext(report: DriftReport, items: readonly DriftItem[]): AlertContext {
  return {
    filePath: report.filePath,
    specReference: report.specReference,
    items: items.map(itemToJson)
  };
}

/**
 * Rebuilds the drift report an alert was raised for
 *
 * @throws ValidationError when the alert context holds no drift items
 */
export function reportFromAlert(alert: Readonly<Alert>): DriftReport {
  const result = AlertReportContextSchema.safeParse(alert.context);
  if (!result.success) {
    throw new ValidationError(`Alert ${alert.id} does not describe a drift report`, 'context');
  }
  return {
    filePath: result.data.filePath,
    specReference: result.data.specReference,
    items: result.data.items
  };
}
