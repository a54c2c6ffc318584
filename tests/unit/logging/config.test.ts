import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { getLoggingConfig, resetLoggingConfig } from '../../../src/logging/config.js';
import { LogLevel, isLevelEnabled, parseLogLevel } from '../../../src/logging/LogLevel.js';

describe('logging config', () => {
  const originalEnv = { ...process.env };

  beforeEach(() => {
    resetLoggingConfig();
    delete process.env['LOG_LEVEL'];
    delete process.env['CAPFS_DEBUG_COMPONENTS'];
    delete process.env['LOG_FORMAT'];
    delete process.env['LOG_FILE'];
    delete process.env['LOG_TIMESTAMP_FORMAT'];
  });

  afterEach(() => {
    process.env = { ...originalEnv };
    resetLoggingConfig();
  });

  it('should use defaults without env vars', () => {
    expect(getLoggingConfig()).toEqual({
      logLevel: LogLevel.INFO,
      debugComponents: [],
      logFormat: 'text',
      logFile: undefined,
      timestampFormat: 'classic',
    });
  });

  it('should read every env var', () => {
    process.env['LOG_LEVEL'] = 'warning';
    process.env['CAPFS_DEBUG_COMPONENTS'] = ' sftp-fs , ,reconnect-proxy:TRACE';
    process.env['LOG_FORMAT'] = 'json';
    process.env['LOG_FILE'] = '/var/log/capfs.log';
    process.env['LOG_TIMESTAMP_FORMAT'] = 'iso';
    expect(getLoggingConfig()).toEqual({
      logLevel: LogLevel.WARN,
      debugComponents: ['sftp-fs', 'reconnect-proxy:TRACE'],
      logFormat: 'json',
      logFile: '/var/log/capfs.log',
      timestampFormat: 'iso',
    });
  });

  it('should fall back for unknown values', () => {
    process.env['LOG_LEVEL'] = 'LOUD';
    process.env['LOG_FORMAT'] = 'xml';
    process.env['LOG_TIMESTAMP_FORMAT'] = 'epoch';
    const config = getLoggingConfig();
    expect(config.logLevel).toBe(LogLevel.INFO);
    expect(config.logFormat).toBe('text');
    expect(config.timestampFormat).toBe('classic');
  });

  it('should cache until reset', () => {
    const first = getLoggingConfig();
    process.env['LOG_LEVEL'] = 'ERROR';
    expect(getLoggingConfig()).toBe(first);
    resetLoggingConfig();
    expect(getLoggingConfig().logLevel).toBe(LogLevel.ERROR);
  });
});

describe('LogLevel', () => {
  it.each([
    ['trace', LogLevel.TRACE],
    ['Debug', LogLevel.DEBUG],
    ['INFORMATION', LogLevel.INFO],
    [' warn ', LogLevel.WARN],
    ['WARNING', LogLevel.WARN],
    ['error', LogLevel.ERROR],
  ])('should parse %s', (text, level) => {
    expect(parseLogLevel(text)).toBe(level);
  });

  it('should use the fallback for unknown names', () => {
    expect(parseLogLevel('verbose', LogLevel.DEBUG)).toBe(LogLevel.DEBUG);
  });

  it('should order levels from TRACE to ERROR', () => {
    expect(isLevelEnabled(LogLevel.WARN, LogLevel.INFO)).toBe(true);
    expect(isLevelEnabled(LogLevel.INFO, LogLevel.INFO)).toBe(true);
    expect(isLevelEnabled(LogLevel.DEBUG, LogLevel.INFO)).toBe(false);
  });
});
