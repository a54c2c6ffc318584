export { LogLevel, parseLogLevel, isLevelEnabled } from './LogLevel.js';
export { Logger } from './Logger.js';
export {
  getLogger,
  initializeLogging,
  setGlobalLevel,
  getGlobalLevel,
  shutdownLogging,
  resetLogging,
} from './LoggerFactory.js';
export { getLoggingConfig, resetLoggingConfig } from './config.js';
export type { LoggingConfiguration, TimestampFormat } from './config.js';
export {
  registerComponent,
  setComponentLevel,
  clearComponentLevel,
  getEffectiveLevel,
  getRegisteredComponents,
  resetDebugRegistry,
} from './DebugModeRegistry.js';
export type { ComponentStatus } from './DebugModeRegistry.js';
export { ConsoleTransport, FileTransport, formatClassicTimestamp, formatTextLine } from './transports.js';
export type { LogTransport } from './transports.js';
