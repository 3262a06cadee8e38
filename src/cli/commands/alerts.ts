// Alert inspection commands

import { Command } from 'commander';
import { NotFoundError, ValidationError } from '../../core/errors.js';
import { AlertSeveritySchema, AlertTypeSchema } from '../../core/schemas.js';
import { validateAlertId } from '../../core/validation.js';
import { formatAlert, type AlertFormat } from '../../services/alerts/alert-formatter.js';
import type { Alert, AlertFilters } from '../../models/alert.js';
import { createContext } from '../utils/context.js';
import { success, withErrorHandling } from '../utils/error-handler.js';
import { globals, parsePositiveInt } from '../utils/options.js';

interface ListOptions {
  all?: boolean;
  severity?: string;
  minSeverity?: string;
  type?: string;
  file?: string;
  since?: number;
  json?: boolean;
}

const FORMATS: readonly AlertFormat[] = ['text', 'html', 'json'];

function parseFilters(options: ListOptions, now: Date): AlertFilters {
  const filters: AlertFilters = {};
  if (!options.all) filters.resolved = false;

  if (options.severity) {
    const severity = AlertSeveritySchema.safeParse(options.severity.toUpperCase());
    if (!severity.success) throw new ValidationError(`Unknown severity: ${options.severity}`, 'severity');
    filters.severity = severity.data;
  }
  if (options.minSeverity) {
    const severity = AlertSeveritySchema.safeParse(options.minSeverity.toUpperCase());
    if (!severity.success) throw new ValidationError(`Unknown severity: ${options.minSeverity}`, 'minSeverity');
    filters.minSeverity = severity.data;
  }
  if (options.type) {
    const type = AlertTypeSchema.safeParse(options.type);
    if (!type.success) throw new ValidationError(`Unknown alert type: ${options.type}`, 'type');
    filters.type = type.data;
  }
  if (options.file) filters.filePath = options.file.replace(/\\/g, '/');
  if (options.since !== undefined) filters.since = new Date(now.getTime() - options.since * 3_600_000);

  return filters;
}

function formatRow(alert: Alert): string {
  const state = alert.resolved ? 'resolved' : 'open';
  return `${alert.id}  ${alert.severity.padEnd(8)} ${state.padEnd(8)} x${String(alert.occurrenceCount).padEnd(4)} ${alert.title}`;
}

/**
 * Registers alert commands
 *
 * Supports:
 * - driftwatch alerts list [--all] [--severity <s>] [--min-severity <s>] [--type <t>] [--file <path>] [--since <hours>] [--json]
 * - driftwatch alerts show <id> [--format text|html|json]
 * - driftwatch alerts resolve <id> [--note <text>]
 * - driftwatch alerts summary [--hours <n>] [--json]
 */
export function registerAlertCommands(program: Command): void {
  const alerts = program
    .command('alerts')
    .description('Inspect and resolve alerts');

  alerts
    .command('list')
    .description('List alerts, open ones by default')
    .option('-a, --all', 'Include resolved alerts')
    .option('-s, --severity <severity>', 'Only this severity (INFO, WARNING, ERROR, CRITICAL)')
    .option('--min-severity <severity>', 'This severity or higher')
    .option('-t, --type <type>', 'Only this type (drift, scan_error, monitor)')
    .option('-f, --file <path>', 'Only alerts for this file')
    .option('--since <hours>', 'Seen within the last N hours', parsePositiveInt)
    .option('--json', 'Output as JSON')
    .action(withErrorHandling(async (options: ListOptions, command: Command) => {
      const ctx = await createContext(globals(command));
      const list = ctx.alerts.list(parseFilters(options, new Date()));

      if (options.json) {
        console.log(JSON.stringify(list, null, 2));
        return;
      }
      if (list.length === 0) {
        console.log('No alerts.');
        return;
      }
      for (const alert of list) {
        console.log(formatRow(alert));
      }
      console.log(`\n${list.length} alert(s)`);
    }));

  alerts
    .command('show')
    .description('Show one alert')
    .argument('<id>', 'Alert ID (ALERT-NNNNNN)')
    .option('--format <format>', 'text, html or json', 'text')
    .action(withErrorHandling(async (id: string, options: { format: string }, command: Command) => {
      const format = FORMATS.find(candidate => candidate === options.format);
      if (!format) {
        throw new ValidationError(`Unknown format: ${options.format}`, 'format');
      }
      const alertId = validateAlertId(id);
      const ctx = await createContext(globals(command));
      const alert = ctx.alerts.get(alertId);
      if (!alert) {
        throw new NotFoundError('Alert', alertId);
      }
      console.log(formatAlert(alert, format));
    }));

  alerts
    .command('resolve')
    .description('Mark an alert as resolved')
    .argument('<id>', 'Alert ID (ALERT-NNNNNN)')
    .option('-n, --note <text>', 'Resolution note')
    .action(withErrorHandling(async (id: string, options: { note?: string }, command: Command) => {
      const alertId = validateAlertId(id);
      const ctx = await createContext(globals(command));
      const alert = await ctx.alerts.resolve(alertId, options.note);
      await ctx.alerts.flush();
      success(`Resolved ${alert.id}: ${alert.title}`);
    }));

  alerts
    .command('summary')
    .description('Summarize alerts and recent activity')
    .option('--hours <n>', 'Timeline length in hours', parsePositiveInt, 24)
    .option('--json', 'Output as JSON')
    .action(withErrorHandling(async (options: { hours: number; json?: boolean }, command: Command) => {
      const ctx = await createContext(globals(command));
      const summary = ctx.alerts.summary(options.hours);

      if (options.json) {
        console.log(JSON.stringify(summary, null, 2));
        return;
      }

      console.log('Alert Summary');
      console.log('='.repeat(40));
      console.log(`Total: ${summary.total} (${summary.open} open, ${summary.resolved} resolved)`);
      console.log(`Occurrences: ${summary.totalOccurrences}`);
      console.log('\nBy severity:');
      for (const [severity, count] of Object.entries(summary.bySeverity)) {
        console.log(`  ${severity.padEnd(10)} ${count}`);
      }
      console.log('\nBy type:');
      for (const [type, count] of Object.entries(summary.byType)) {
        console.log(`  ${type.padEnd(10)} ${count}`);
      }
      const failures = Object.entries(summary.failedDeliveries);
      if (failures.length > 0) {
        console.log('\nFailed deliveries:');
        for (const [channel, count] of failures) {
          console.log(`  ${channel.padEnd(10)} ${count}`);
        }
      }
      const active = summary.timeline.filter(entry => entry.count > 0);
      console.log(`\nActivity in the last ${options.hours}h:`);
      if (active.length === 0) {
        console.log('  none');
      }
      for (const entry of active) {
        console.log(`  ${entry.hour}  ${entry.count}`);
      }
    }));
}
