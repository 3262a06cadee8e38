// Continuous monitoring command

import { Command } from 'commander';
import { ContinuousMonitor } from '../../services/monitor/continuous-monitor.js';
import type { MonitorConfigInput } from '../../core/schemas.js';
import type { Suggestion } from '../../models/suggestion.js';
import { createContext } from '../utils/context.js';
import { info, withErrorHandling } from '../utils/error-handler.js';
import { globals, parsePositiveInt } from '../utils/options.js';

interface WatchOptions {
  interval?: number;
  batchSize?: number;
  suggest?: boolean;
  initialScan: boolean;
}

function printSuggestions(title: string, suggestions: Suggestion[]): void {
  console.log(`\nSuggestions for ${title}:`);
  suggestions.forEach((suggestion, index) => {
    console.log(`  ${index + 1}. [P${suggestion.priority}/E${suggestion.effort}] ${suggestion.title}`);
  });
}

/**
 * Registers the watch command
 *
 * Supports:
 * - driftwatch watch [--interval <ms>] [--batch-size <n>] [--suggest] [--no-initial-scan]
 */
export function registerWatchCommand(program: Command): void {
  program
    .command('watch')
    .description('Monitor the project and raise alerts when code drifts from its specifications')
    .option('-i, --interval <ms>', 'Scan interval in milliseconds', parsePositiveInt)
    .option('-b, --batch-size <n>', 'Files checked per cycle', parsePositiveInt)
    .option('--suggest', 'Print realignment suggestions for new alerts')
    .option('--no-initial-scan', 'Do not queue indexed files at startup')
    .action(withErrorHandling(async (options: WatchOptions, command: Command) => {
      const ctx = await createContext(globals(command));

      const monitor = new ContinuousMonitor({
        specifications: ctx.specifications,
        extractor: ctx.extractor,
        alerts: ctx.alerts,
        detector: ctx.detector,
        baselines: ctx.baselines,
        realignment: options.suggest ? ctx.realignment : undefined,
        hooks: {
          onSuggestions: (alert, suggestions) => printSuggestions(`${alert.id} ${alert.title}`, suggestions)
        }
      });

      const config: MonitorConfigInput = {
        ...ctx.config.monitor,
        ...(options.interval !== undefined ? { scanIntervalMs: options.interval } : {}),
        ...(options.batchSize !== undefined ? { batchSize: options.batchSize } : {})
      };
      const handle = await monitor.start(ctx.projectRoot, config);

      if (options.initialScan) {
        for (const file of await ctx.extractor.listFiles()) {
          handle.enqueue({ path: file, kind: 'modified', timestamp: Date.now() });
        }
      }

      info(`Watching ${ctx.projectRoot} (every ${handle.config.scanIntervalMs}ms). Press Ctrl+C to stop.`);

      await new Promise<void>(resolve => {
        process.once('SIGINT', () => resolve());
        process.once('SIGTERM', () => resolve());
      });

      info('Stopping...');
      await handle.stop();

      const { metrics } = handle.status();
      console.log(
        `Cycles: ${metrics.checksCompleted}, files: ${metrics.filesScanned}, ` +
        `drift items: ${metrics.driftDetections}, alerts: ${metrics.alertsRaised} raised / ${metrics.alertsSuppressed} suppressed, ` +
        `scan errors: ${metrics.scanErrors}, throttled: ${metrics.throttledCycles}`
      );
    }));
}
