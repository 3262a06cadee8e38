// CLI error handling utilities

import {
  ConfigError,
  DriftwatchError,
  NotFoundError,
  StorageError,
  ValidationError
} from '../../core/errors.js';

/**
 * Process exit codes used by every command
 */
export const ExitCode = {
  OK: 0,
  /** Drift found, or an unexpected failure */
  FAILURE: 1,
  INVALID_INPUT: 2,
  STORAGE: 3,
  NOT_FOUND: 4
} as const;

/**
 * Format an error for CLI output
 */
export function formatError(error: unknown): string {
  if (error instanceof ConfigError) {
    const details = error.issues.map(issue => `\n  - ${issue}`).join('');
    return `Configuration Error: ${error.message}${details}`;
  }

  if (error instanceof ValidationError) {
    const field = error.field ? ` (field: ${error.field})` : '';
    return `Validation Error${field}: ${error.message}`;
  }

  if (error instanceof NotFoundError) {
    return `Not Found: ${error.message}`;
  }

  if (error instanceof DriftwatchError) {
    return `Error [${error.code}]: ${error.message}`;
  }

  if (error instanceof Error) {
    return `Error: ${error.message}`;
  }

  return `Unknown error: ${String(error)}`;
}

export function exitCodeFor(error: unknown): number {
  if (error instanceof ConfigError || error instanceof ValidationError) {
    return ExitCode.INVALID_INPUT;
  }
  if (error instanceof StorageError) {
    return ExitCode.STORAGE;
  }
  if (error instanceof NotFoundError) {
    return ExitCode.NOT_FOUND;
  }
  return ExitCode.FAILURE;
}

/**
 * Handle CLI errors with proper exit codes
 */
export function handleError(error: unknown): never {
  console.error(`\n✗ ${formatError(error)}\n`);
  process.exit(exitCodeFor(error));
}

/**
 * Wrap an async CLI action with error handling
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T) => {
    try {
      await fn(...args);
    } catch (error) {
      handleError(error);
    }
  };
}

/**
 * Print success message
 */
export function success(message: string): void {
  console.log(`✓ ${message}`);
}

/**
 * Print info message
 */
export function info(message: string): void {
  console.log(`ℹ ${message}`);
}
