/**
 * Logger
 *
 * Lightweight wrapper around a winston logger instance, bound to a
 * component name. Level filtering uses DebugModeRegistry for per-component
 * overrides.
 */

import winston from 'winston';
import { LogLevel } from './LogLevel.js';
import { shouldLog } from './DebugModeRegistry.js';

/** Reference to the factory's global level getter, injected to avoid circular imports */
let globalLevelFn: () => LogLevel = () => LogLevel.INFO;

/**
 * Set the global level provider function.
 * Called by LoggerFactory during initialization.
 * @internal
 */
export function setGlobalLevelProvider(fn: () => LogLevel): void {
  globalLevelFn = fn;
}

export class Logger {
  constructor(
    private readonly component: string,
    private readonly winstonLogger: winston.Logger
  ) {}

  trace(message: string, metadata?: Record<string, unknown>): void {
    this.logAt(LogLevel.TRACE, 'trace', message, undefined, metadata);
  }

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.logAt(LogLevel.DEBUG, 'debug', message, undefined, metadata);
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.logAt(LogLevel.INFO, 'info', message, undefined, metadata);
  }

  /**
   * Log a WARN-level message. Accepts the error that caused it, if any.
   */
  warn(message: string, error?: unknown, metadata?: Record<string, unknown>): void {
    this.logAt(LogLevel.WARN, 'warn', message, error, metadata);
  }

  error(message: string, error?: unknown, metadata?: Record<string, unknown>): void {
    this.logAt(LogLevel.ERROR, 'error', message, error, metadata);
  }

  isDebugEnabled(): boolean {
    return shouldLog(this.component, LogLevel.DEBUG, globalLevelFn());
  }

  isTraceEnabled(): boolean {
    return shouldLog(this.component, LogLevel.TRACE, globalLevelFn());
  }

  /**
   * Create a child logger with a sub-component suffix.
   * e.g., logger.child('stream') on component "sftp-fs" yields "sftp-fs.stream"
   */
  child(subComponent: string): Logger {
    return new Logger(`${this.component}.${subComponent}`, this.winstonLogger);
  }

  getComponent(): string {
    return this.component;
  }

  private logAt(
    level: LogLevel,
    winstonLevel: string,
    message: string,
    error?: unknown,
    metadata?: Record<string, unknown>
  ): void {
    if (!shouldLog(this.component, level, globalLevelFn())) {
      return;
    }

    const meta: Record<string, unknown> = {
      component: this.component,
      ...metadata,
    };
    if (error instanceof Error) {
      meta['errorStack'] = error.stack ?? `${error.name}: ${error.message}`;
    } else if (error !== undefined) {
      meta['errorStack'] = String(error);
    }
    this.winstonLogger.log(winstonLevel, message, meta);
  }
}
