// Domain-specific error types for driftwatch

/**
 * Base error class for all driftwatch errors
 */
export abstract class DriftwatchError extends Error {
  abstract readonly code: string;
  /** Whether the error must abort the monitoring session */
  readonly fatal: boolean = false;

  constructor(message: string, public readonly context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context
    };
  }
}

/**
 * Invalid startup parameters. Raised before the scheduling loop starts.
 */
export class ConfigError extends DriftwatchError {
  readonly code = 'CONFIG_ERROR';
  override readonly fatal = true;

  constructor(message: string, public readonly issues: string[] = [], context?: Record<string, unknown>) {
    super(message, { ...context, issues });
  }
}

/**
 * Detection failed for a single file. Retried on the next cycle.
 */
export class ScanError extends DriftwatchError {
  readonly code = 'SCAN_ERROR';

  constructor(public readonly filePath: string, cause: unknown) {
    super(`Scan failed for ${filePath}: ${describeError(cause)}`, { filePath });
    this.cause = cause;
  }
}

/**
 * Specification unavailable for a path
 */
export class SpecLoadError extends DriftwatchError {
  readonly code = 'SPEC_LOAD_ERROR';

  constructor(public readonly filePath: string, reason: string) {
    super(`Specification unavailable for ${filePath}: ${reason}`, { filePath });
  }
}

/**
 * A channel handler failed or timed out
 */
export class ChannelDeliveryError extends DriftwatchError {
  readonly code = 'CHANNEL_DELIVERY_ERROR';

  constructor(public readonly channel: string, reason: string) {
    super(`Delivery via ${channel} failed: ${reason}`, { channel });
  }
}

/**
 * The suggestion enricher failed; rule-based suggestions are used instead
 */
export class SuggestionGenerationError extends DriftwatchError {
  readonly code = 'SUGGESTION_GENERATION_ERROR';

  constructor(reason: string, cause?: unknown) {
    super(`Suggestion enrichment failed: ${reason}`);
    this.cause = cause;
  }
}

/**
 * Storage/filesystem errors
 */
export class StorageError extends DriftwatchError {
  readonly code = 'STORAGE_ERROR';
}

/**
 * Not found errors
 */
export class NotFoundError extends DriftwatchError {
  readonly code = 'NOT_FOUND';

  constructor(resourceType: string, id: string) {
    super(`${resourceType} not found: ${id}`, { resourceType, id });
  }
}

/**
 * Validation errors for invalid input
 */
export class ValidationError extends DriftwatchError {
  readonly code = 'VALIDATION_ERROR';

  constructor(message: string, public readonly field?: string, context?: Record<string, unknown>) {
    super(message, { ...context, field });
  }
}

/**
 * An operation did not settle within its time budget
 */
export class TimeoutError extends DriftwatchError {
  readonly code = 'TIMEOUT';

  constructor(label: string, public readonly timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`, { label, timeoutMs });
  }
}

/**
 * Extracts a readable message from anything thrown
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
