// Text, HTML and JSON renderings of an alert

import type { Alert } from '../../models/alert.js';
import type { AlertSeverity } from '../../models/types.js';

export type AlertFormat = 'text' | 'html' | 'json';

const SEVERITY_COLORS: Record<AlertSeverity, string> = {
  INFO: '#17a2b8',
  WARNING: '#ffc107',
  ERROR: '#dc3545',
  CRITICAL: '#6c1e2c'
};

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

/**
 * Where the alert came from: the file path in its context, or its type
 */
export function alertSource(alert: Readonly<Alert>): string {
  const filePath = alert.context['filePath'];
  return typeof filePath === 'string' ? filePath : alert.type;
}

export function formatAlert(alert: Readonly<Alert>, format: AlertFormat = 'text'): string {
  switch (format) {
    case 'text':
      return `[${alert.severity}] ${alert.title}\n${alert.message}\nSource: ${alertSource(alert)}`;
    case 'html':
      return [
        '<div style="border: 1px solid #ccc; padding: 10px; margin: 10px;">',
        `  <h3 style="color: ${SEVERITY_COLORS[alert.severity]};">[${alert.severity}] ${escapeHtml(alert.title)}</h3>`,
        `  <p>${escapeHtml(alert.message)}</p>`,
        `  <p><small>Source: ${escapeHtml(alertSource(alert))} | Time: ${alert.lastSeenAt}</small></p>`,
        '</div>'
      ].join('\n');
    case 'json':
      return JSON.stringify(alert, null, 2);
  }
}
