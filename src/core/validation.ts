// Input validation and sanitization utilities

import * as fs from 'fs/promises';
import * as path from 'path';
import { ConfigError, ValidationError } from './errors.js';
import { MonitorConfigSchema, formatZodIssues, type MonitorConfigInput } from './schemas.js';
import type { MonitorConfig } from '../models/monitor.js';

const ALERT_ID_PATTERN = /^ALERT-\d{6,}$/;

/**
 * Path traversal patterns
 */
const PATH_TRAVERSAL_PATTERNS = [
  /(^|\/)\.\.(\/|$)/, // Parent directory segment
  /\0/                // Null byte
];

/**
 * Validates and normalizes an alert ID
 */
export function validateAlertId(id: string): string {
  if (!id || typeof id !== 'string') {
    throw new ValidationError('Alert ID is required', 'id');
  }

  const trimmed = id.trim().toUpperCase();
  if (!ALERT_ID_PATTERN.test(trimmed)) {
    throw new ValidationError('Invalid alert ID format. Expected: ALERT-NNNNNN', 'id');
  }

  return trimmed;
}

/**
 * Validates a monitor configuration, applying defaults
 *
 * @throws ConfigError listing every invalid field
 */
export function parseMonitorConfig(input: MonitorConfigInput): MonitorConfig {
  const result = MonitorConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = formatZodIssues(result.error);
    throw new ConfigError(`Invalid monitor configuration: ${issues.join('; ')}`, issues);
  }
  return result.data;
}

/**
 * Ensures the project root exists and is a directory
 *
 * @returns the absolute project path
 */
export async function assertProjectDirectory(projectPath: string): Promise<string> {
  if (!projectPath || typeof projectPath !== 'string') {
    throw new ConfigError('Project path is required', ['projectPath: required']);
  }

  const resolved = path.resolve(projectPath);
  try {
    const stat = await fs.stat(resolved);
    if (!stat.isDirectory()) {
      throw new ConfigError(`Project path is not a directory: ${resolved}`, ['projectPath: not a directory']);
    }
  } catch (error) {
    if (error instanceof ConfigError) {
      throw error;
    }
    throw new ConfigError(`Project path does not exist: ${resolved}`, ['projectPath: not found']);
  }

  return resolved;
}

/**
 * Normalizes a path reported by a change source to a project-relative,
 * forward-slash path
 *
 * @returns null when the path escapes the project root
 */
export function normalizeChangePath(projectRoot: string, filePath: string): string | null {
  const absolute = path.isAbsolute(filePath) ? filePath : path.join(projectRoot, filePath);
  const relative = path.relative(projectRoot, absolute).replace(/\\/g, '/');

  if (relative.length === 0 || path.isAbsolute(relative)) {
    return null;
  }

  for (const pattern of PATH_TRAVERSAL_PATTERNS) {
    if (pattern.test(relative)) {
      return null;
    }
  }

  return relative;
}
