/**
 * Log levels, ordered from most to least verbose.
 */
export enum LogLevel {
  TRACE = 'TRACE',
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

const ORDER: readonly LogLevel[] = [LogLevel.TRACE, LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

/**
 * Parse a level name, accepting the long forms INFORMATION and WARNING.
 * Unknown names fall back to `fallback`.
 */
export function parseLogLevel(level: string, fallback: LogLevel = LogLevel.INFO): LogLevel {
  switch (level.trim().toUpperCase()) {
    case 'TRACE':
      return LogLevel.TRACE;
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'INFO':
    case 'INFORMATION':
      return LogLevel.INFO;
    case 'WARN':
    case 'WARNING':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    default:
      return fallback;
  }
}

/** Whether a message at `messageLevel` passes a `threshold`. */
export function isLevelEnabled(messageLevel: LogLevel, threshold: LogLevel): boolean {
  return ORDER.indexOf(messageLevel) >= ORDER.indexOf(threshold);
}
