/**
 * Logger Factory
 *
 * Initializes the root winston logger and caches per-component Logger
 * wrappers.
 *
 * Usage:
 *   const logger = getLogger('sftp-fs');
 *   logger.info('Connected');
 *
 * initializeLogging() is optional; the first getLogger() call initializes
 * with the environment-derived defaults.
 */

import winston from 'winston';
import { LogLevel } from './LogLevel.js';
import { getLoggingConfig } from './config.js';
import { initFromEnv } from './DebugModeRegistry.js';
import { Logger, setGlobalLevelProvider } from './Logger.js';
import { ConsoleTransport, FileTransport } from './transports.js';
import type { LogTransport } from './transports.js';

/**
 * Winston uses LOWER numbers for HIGHER priority:
 * error=0 (highest prio), trace=4 (lowest prio)
 */
const WINSTON_LEVELS: Record<string, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  trace: 4,
};

let rootLogger: winston.Logger | null = null;
let currentGlobalLevel: LogLevel = LogLevel.INFO;
const loggerCache = new Map<string, Logger>();

/**
 * Initialize the logging subsystem from getLoggingConfig().
 *
 * Winston's own level is left at trace: filtering happens per component in
 * Logger so that a component override can go below the global level.
 */
export function initializeLogging(additionalTransports?: LogTransport[]): winston.Logger {
  const config = getLoggingConfig();
  currentGlobalLevel = config.logLevel;

  const transports: winston.transport[] = [
    new ConsoleTransport(config.logFormat, config.timestampFormat).createWinstonTransport(),
  ];
  if (config.logFile) {
    transports.push(new FileTransport(config.logFile, config.logFormat, config.timestampFormat).createWinstonTransport());
  }
  for (const t of additionalTransports ?? []) {
    transports.push(t.createWinstonTransport());
  }

  if (rootLogger) {
    rootLogger.close();
  }
  const logger = winston.createLogger({
    levels: WINSTON_LEVELS,
    level: 'trace',
    transports,
    exitOnError: false,
  });
  rootLogger = logger;

  setGlobalLevelProvider(() => currentGlobalLevel);
  initFromEnv(config.debugComponents);

  // Re-wire existing cached loggers to the new root
  for (const component of loggerCache.keys()) {
    loggerCache.set(component, new Logger(component, logger));
  }
  return logger;
}

/**
 * Get (or create) a Logger for a named component.
 */
export function getLogger(component: string): Logger {
  const cached = loggerCache.get(component);
  if (cached) return cached;

  const logger = new Logger(component, rootLogger ?? initializeLogging());
  loggerCache.set(component, logger);
  return logger;
}

/**
 * Change the global log level at runtime.
 * Affects all loggers that don't have a per-component override.
 */
export function setGlobalLevel(level: LogLevel): void {
  currentGlobalLevel = level;
}

export function getGlobalLevel(): LogLevel {
  return currentGlobalLevel;
}

/**
 * Flush and close all transports.
 */
export async function shutdownLogging(): Promise<void> {
  const logger = rootLogger;
  if (!logger) return;
  rootLogger = null;
  await new Promise<void>((resolve) => {
    logger.on('finish', () => resolve());
    logger.end();
  });
}

/**
 * Reset all logging state (for testing).
 */
export function resetLogging(): void {
  if (rootLogger) {
    rootLogger.close();
  }
  rootLogger = null;
  currentGlobalLevel = LogLevel.INFO;
  loggerCache.clear();
  setGlobalLevelProvider(() => LogLevel.INFO);
}
