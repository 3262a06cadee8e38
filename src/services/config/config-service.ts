/**
 * Configuration Service
 *
 * Loads and provides access to configuration from .driftwatch/config.yaml.
 * Every section falls back to its defaults when the file or the section
 * is absent.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as yaml from 'yaml';
import { ConfigError, describeError } from '../../core/errors.js';
import {
  DriftwatchConfigSchema,
  formatZodIssues,
  type DriftwatchConfig
} from '../../core/schemas.js';

export const CONFIG_DIR = '.driftwatch';
export const CONFIG_FILE = 'config.yaml';

/**
 * Configuration Service
 *
 * Provides access to configuration values from .driftwatch/config.yaml
 * and falls back to schema defaults when the file is absent.
 */
export class ConfigService {
  private readonly projectRoot: string;
  private readonly configPath: string;
  private cachedConfig: DriftwatchConfig | null = null;

  constructor(options: { projectRoot?: string; configPath?: string } = {}) {
    this.projectRoot = path.resolve(options.projectRoot || '.');
    this.configPath = options.configPath
      ? path.resolve(this.projectRoot, options.configPath)
      : path.join(this.projectRoot, CONFIG_DIR, CONFIG_FILE);
  }

  getConfigPath(): string {
    return this.configPath;
  }

  /**
   * Load configuration from file, with caching
   *
   * @throws ConfigError when the file exists but is not valid
   */
  async load(): Promise<DriftwatchConfig> {
    if (this.cachedConfig !== null) {
      return this.cachedConfig;
    }

    let raw: unknown = {};
    try {
      const content = await fs.readFile(this.configPath, 'utf-8');
      raw = yaml.parse(content) ?? {};
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
        throw new ConfigError(
          `Cannot read configuration ${this.configPath}: ${describeError(error)}`,
          [],
          { configPath: this.configPath }
        );
      }
    }

    const result = DriftwatchConfigSchema.safeParse(raw);
    if (!result.success) {
      const issues = formatZodIssues(result.error);
      throw new ConfigError(`Invalid configuration in ${this.configPath}: ${issues.join('; ')}`, issues, {
        configPath: this.configPath
      });
    }

    this.cachedConfig = result.data;
    return result.data;
  }

  /**
   * Clear the cached configuration (useful for testing or after config changes)
   */
  clearCache(): void {
    this.cachedConfig = null;
  }

  /**
   * Resolves a configured path against the project root
   */
  resolvePath(configured: string): string {
    return path.resolve(this.projectRoot, configured);
  }
}
