// Option parsing shared by CLI commands

import { Command, InvalidArgumentError } from 'commander';
import type { GlobalOptions } from './context.js';

/**
 * Options of the command merged with the program-level ones
 */
export function globals(command: Command): GlobalOptions {
  return command.optsWithGlobals<GlobalOptions>();
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}
