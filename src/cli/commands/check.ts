// One-shot drift check command

import { Command } from 'commander';
import { createContext } from '../utils/context.js';
import { detectFile } from '../utils/detect.js';
import { ExitCode, withErrorHandling } from '../utils/error-handler.js';
import { globals } from '../utils/options.js';
import type { DriftReport } from '../../models/drift.js';

interface CheckOptions {
  json?: boolean;
}

/**
 * Registers the check command
 *
 * Supports:
 * - driftwatch check [files...] [--json]
 */
export function registerCheckCommand(program: Command): void {
  program
    .command('check')
    .description('Check files against their specifications once')
    .argument('[files...]', 'Project-relative files (default: every file in the signature index)')
    .option('--json', 'Output reports as JSON')
    .action(withErrorHandling(async (files: string[], options: CheckOptions, command: Command) => {
      const ctx = await createContext(globals(command));
      const targets = files.length > 0 ? files : await ctx.extractor.listFiles();

      const reports: DriftReport[] = [];
      for (const file of targets) {
        reports.push(await detectFile(ctx, file.replace(/\\/g, '/')));
      }
      await ctx.baselines.save();

      const drifted = reports.filter(report => report.items.length > 0);

      if (options.json) {
        console.log(JSON.stringify(reports, null, 2));
      } else {
        for (const report of reports) {
          console.log(ctx.detector.formatReport(report));
          console.log('');
        }
        let items = 0;
        const bySeverity = new Map<string, number>();
        for (const report of drifted) {
          const summary = ctx.detector.getSummary(report);
          items += summary.total;
          for (const [severity, count] of Object.entries(summary.bySeverity)) {
            bySeverity.set(severity, (bySeverity.get(severity) ?? 0) + (count ?? 0));
          }
        }
        const breakdown = [...bySeverity].map(([severity, count]) => `${severity} ${count}`).join(', ');
        console.log(`Checked ${reports.length} file(s): ${items} drift item(s) in ${drifted.length} file(s)${breakdown ? ` (${breakdown})` : ''}`);
      }

      if (drifted.length > 0) {
        process.exitCode = ExitCode.FAILURE;
      }
    }));
}
