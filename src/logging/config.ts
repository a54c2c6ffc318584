/**
 * Logging Configuration
 *
 * Central configuration derived from environment variables for logging.
 * Cached like getFsConfig(), with a reset for testing.
 */

import { LogLevel, parseLogLevel } from './LogLevel.js';

export type TimestampFormat = 'classic' | 'iso';

export interface LoggingConfiguration {
  /** Minimum log level (LOG_LEVEL env, default INFO) */
  logLevel: LogLevel;
  /** Components to enable debug logging for (CAPFS_DEBUG_COMPONENTS env, comma-separated) */
  debugComponents: string[];
  /** Log output format (LOG_FORMAT env, default 'text') */
  logFormat: 'text' | 'json';
  /** Optional file path to write logs to (LOG_FILE env) */
  logFile?: string;
  /** 'classic' is yyyy-MM-dd HH:mm:ss,SSS in local time, 'iso' is ISO-8601 (LOG_TIMESTAMP_FORMAT env, default 'classic') */
  timestampFormat: TimestampFormat;
}

let cachedConfig: LoggingConfiguration | null = null;

function parseFormat(value: string | undefined): 'text' | 'json' {
  if (value === 'json') return 'json';
  return 'text';
}

function parseTimestampFormat(value: string | undefined): TimestampFormat {
  if (value === 'iso') return 'iso';
  return 'classic';
}

function parseDebugComponents(value: string | undefined): string[] {
  if (!value || value.trim() === '') return [];
  return value
    .split(',')
    .map((c) => c.trim())
    .filter((c) => c.length > 0);
}

/**
 * Get the current logging configuration.
 * The configuration is cached after first call; use resetLoggingConfig() in tests.
 */
export function getLoggingConfig(): LoggingConfiguration {
  if (cachedConfig) return cachedConfig;

  cachedConfig = {
    logLevel: parseLogLevel(process.env['LOG_LEVEL'] ?? 'INFO'),
    debugComponents: parseDebugComponents(process.env['CAPFS_DEBUG_COMPONENTS']),
    logFormat: parseFormat(process.env['LOG_FORMAT']),
    logFile: process.env['LOG_FILE'] || undefined,
    timestampFormat: parseTimestampFormat(process.env['LOG_TIMESTAMP_FORMAT']),
  };

  return cachedConfig;
}

/**
 * Reset cached configuration (for testing)
 */
export function resetLoggingConfig(): void {
  cachedConfig = null;
}
