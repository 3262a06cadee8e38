// Centralized logging service for driftwatch

/**
 * Log levels in order of severity
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  level: LogLevel;
  prefix?: string;
  /** Component name shown after the prefix, e.g. `[monitor]` */
  scope?: string;
  timestamps?: boolean;
}

const DEFAULT_CONFIG: LoggerConfig = {
  level: LogLevel.INFO,
  prefix: '[driftwatch]',
  timestamps: false
};

const LEVEL_NAMES: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT
};

/**
 * Parses a level name from configuration or the command line
 */
export function parseLogLevel(name: string): LogLevel | undefined {
  return LEVEL_NAMES[name.trim().toLowerCase()];
}

/**
 * Centralized logger with structured output
 */
export class Logger {
  private config: LoggerConfig;
  private levelSource: (() => LogLevel) | null = null;
  private static instance: Logger | null = null;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Get singleton instance
   */
  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  /**
   * Reconfigure the shared root logger in place, so loggers already handed
   * out through `child()` pick up the change.
   */
  static configure(config: Partial<LoggerConfig>): void {
    const root = Logger.getInstance();
    root.config = { ...root.config, ...config };
  }

  /**
   * Creates a logger for a component. The child reads the level of its
   * parent at call time.
   */
  child(scope: string): Logger {
    const child = new Logger({ ...this.config, scope });
    child.levelSource = () => this.getLevel();
    return child;
  }

  /**
   * Set log level
   */
  setLevel(level: LogLevel): void {
    this.config.level = level;
    this.levelSource = null;
  }

  getLevel(): LogLevel {
    return this.levelSource ? this.levelSource() : this.config.level;
  }

  /**
   * Format a log message
   */
  private format(level: string, message: string, context?: Record<string, unknown>): string {
    const parts: string[] = [];

    if (this.config.timestamps) {
      parts.push(`[${new Date().toISOString()}]`);
    }

    if (this.config.prefix) {
      parts.push(this.config.prefix);
    }

    if (this.config.scope) {
      parts.push(`[${this.config.scope}]`);
    }

    parts.push(`[${level}]`);
    parts.push(message);

    if (context && Object.keys(context).length > 0) {
      parts.push(JSON.stringify(context));
    }

    return parts.join(' ');
  }

  debug(message: string, context?: Record<string, unknown>): void {
    if (this.getLevel() <= LogLevel.DEBUG) {
      console.debug(this.format('DEBUG', message, context));
    }
  }

  info(message: string, context?: Record<string, unknown>): void {
    if (this.getLevel() <= LogLevel.INFO) {
      console.info(this.format('INFO', message, context));
    }
  }

  warn(message: string, context?: Record<string, unknown>): void {
    if (this.getLevel() <= LogLevel.WARN) {
      console.warn(this.format('WARN', message, context));
    }
  }

  error(message: string, context?: Record<string, unknown>): void {
    if (this.getLevel() <= LogLevel.ERROR) {
      console.error(this.format('ERROR', message, context));
    }
  }
}

// Export singleton instance
export const logger = Logger.getInstance();
