#!/usr/bin/env node
// driftwatch CLI

import { Command } from 'commander';
import { registerAlertCommands } from './commands/alerts.js';
import { registerCheckCommand } from './commands/check.js';
import { registerSuggestCommand } from './commands/suggest.js';
import { registerWatchCommand } from './commands/watch.js';

const program = new Command();

program
  .name('driftwatch')
  .description('Continuous specification drift monitoring')
  .version('0.1.0')
  .option('-p, --path <path>', 'Project root', process.cwd())
  .option('-c, --config <path>', 'Configuration file (default: .driftwatch/config.yaml)')
  .option('-v, --verbose', 'Debug logging')
  .option('-q, --quiet', 'Only log errors');

// Register all commands
registerWatchCommand(program);
registerCheckCommand(program);
registerAlertCommands(program);
registerSuggestCommand(program);

await program.parseAsync();
