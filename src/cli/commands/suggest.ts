// Realignment suggestion command

import { Command } from 'commander';
import { NotFoundError, ValidationError } from '../../core/errors.js';
import { validateAlertId } from '../../core/validation.js';
import { reportFromAlert } from '../../services/realignment/report-context.js';
import type { DriftReport } from '../../models/drift.js';
import type { RealignmentPlan } from '../../models/suggestion.js';
import { createContext } from '../utils/context.js';
import { detectFile } from '../utils/detect.js';
import { info, withErrorHandling } from '../utils/error-handler.js';
import { globals } from '../utils/options.js';

interface SuggestOptions {
  file?: string;
  json?: boolean;
}

function printPlan(plan: RealignmentPlan): void {
  console.log(`Realignment Plan: ${plan.filePath}`);
  console.log('='.repeat(50));
  console.log(`${plan.suggestions.length} suggestion(s), total effort ${plan.totalEffort}\n`);

  plan.suggestions.forEach((suggestion, index) => {
    const source = suggestion.source === 'ai' ? ' (enriched)' : '';
    console.log(`${index + 1}. [${suggestion.category}] ${suggestion.title}${source}`);
    console.log(`   priority ${suggestion.priority}, effort ${suggestion.effort}, confidence ${suggestion.confidence.toFixed(2)}`);
    console.log(`   ${suggestion.description}`);
    suggestion.steps.forEach((step, stepIndex) => {
      console.log(`     ${stepIndex + 1}) ${step}`);
    });
  });
}

/**
 * Registers the suggest command
 *
 * Supports:
 * - driftwatch suggest <alertId> [--json]
 * - driftwatch suggest --file <path> [--json]
 */
export function registerSuggestCommand(program: Command): void {
  program
    .command('suggest')
    .description('Suggest how to realign code and specification')
    .argument('[alertId]', 'Alert to build suggestions for')
    .option('-f, --file <path>', 'Check this file and suggest fixes for its drift')
    .option('--json', 'Output the plan as JSON')
    .action(withErrorHandling(async (alertId: string | undefined, options: SuggestOptions, command: Command) => {
      if (!alertId && !options.file) {
        throw new ValidationError('Specify an alert ID or --file <path>', 'alertId');
      }

      const ctx = await createContext(globals(command));
      let report: DriftReport;
      if (alertId) {
        const id = validateAlertId(alertId);
        const alert = ctx.alerts.get(id);
        if (!alert) {
          throw new NotFoundError('Alert', id);
        }
        report = reportFromAlert(alert);
      } else {
        report = await detectFile(ctx, (options.file ?? '').replace(/\\/g, '/'));
        await ctx.baselines.save();
      }

      if (report.items.length === 0) {
        info(`No drift in ${report.filePath}; nothing to suggest.`);
        return;
      }

      const plan = await ctx.realignment.buildPlan(report);
      if (options.json) {
        console.log(JSON.stringify(plan, null, 2));
      } else {
        printPlan(plan);
      }
    }));
}
