import type { LogFormat, LogLevelName } from '@/config/settings.js';

/**
 * Logger
 *
 * Console-based structured logger.
 *
 * Architecture:
 * - Minimum level filtering (debug < info < warn < error)
 * - JSON lines for log aggregation, or a single text line for local development
 * - Scoped loggers via child(context); each line carries its context
 *
 * Usage:
 * ```typescript
 * const logger = new Logger({ level: settings.logLevel, format: settings.logFormat });
 * logger.child('HealthReporter').warn('Probe failed', { component: 'cache' });
 * ```
 */

export type LogFields = Record<string, unknown>;

export interface LoggerOptions {
  level?: LogLevelName;
  format?: LogFormat;
  /** Disabled loggers drop every entry; used by tests */
  enabled?: boolean;
  context?: string;
  /** Output sink, defaults to the console method matching the level */
  write?: (level: LogLevelName, line: string) => void;
}

/**
 * Log level priority order
 */
const LEVEL_PRIORITY: Record<LogLevelName, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

function writeToConsole(level: LogLevelName, line: string): void {
  switch (level) {
    case 'error':
      console.error(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'debug':
      console.debug(line);
      break;
    case 'info':
    default:
      console.log(line);
      break;
  }
}

/**
 * Convert Error values into plain objects so they survive JSON.stringify
 */
function serializeFields(fields: LogFields): LogFields {
  const result: LogFields = {};
  for (const [key, value] of Object.entries(fields)) {
    result[key] = value instanceof Error
      ? { name: value.name, message: value.message }
      : value;
  }
  return result;
}

export class Logger {
  private readonly level: LogLevelName;
  private readonly format: LogFormat;
  private readonly enabled: boolean;
  private readonly context?: string;
  private readonly write: (level: LogLevelName, line: string) => void;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.format = options.format ?? 'json';
    this.enabled = options.enabled ?? true;
    this.context = options.context;
    this.write = options.write ?? writeToConsole;
  }

  /**
   * Create a logger scoped to a component
   */
  child(context: string): Logger {
    return new Logger({
      level: this.level,
      format: this.format,
      enabled: this.enabled,
      context: this.context ? `${this.context}:${context}` : context,
      write: this.write
    });
  }

  isLevelEnabled(level: LogLevelName): boolean {
    return this.enabled && LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[this.level];
  }

  debug(message: string, fields?: LogFields): void {
    this.log('debug', message, fields);
  }

  info(message: string, fields?: LogFields): void {
    this.log('info', message, fields);
  }

  warn(message: string, fields?: LogFields): void {
    this.log('warn', message, fields);
  }

  error(message: string, fields?: LogFields): void {
    this.log('error', message, fields);
  }

  private log(level: LogLevelName, message: string, fields?: LogFields): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    this.write(level, this.formatEntry(level, message, fields ? serializeFields(fields) : undefined));
  }

  private formatEntry(level: LogLevelName, message: string, fields?: LogFields): string {
    const timestamp = new Date().toISOString();

    if (this.format === 'text') {
      const context = this.context ? ` [${this.context}]` : '';
      const extra = fields && Object.keys(fields).length > 0 ? ` ${JSON.stringify(fields)}` : '';
      return `${timestamp} ${level.toUpperCase()}${context} ${message}${extra}`;
    }

    return JSON.stringify({
      timestamp,
      level,
      ...(this.context && { context: this.context }),
      message,
      ...fields
    });
  }
}
