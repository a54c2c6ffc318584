/**
 * Logging Transports
 *
 * Winston transport wrappers. The text format prints one line per entry:
 *   INFO  2026-02-10 14:30:15,042 [reconnect-proxy] Reconnected sftp://deploy@files:22
 */

import winston from 'winston';
import type { TimestampFormat } from './config.js';

/**
 * Interface for pluggable log transports.
 */
export interface LogTransport {
  name: string;
  createWinstonTransport(): winston.transport;
}

/**
 * Format a Date as yyyy-MM-dd HH:mm:ss,SSS in local time.
 */
export function formatClassicTimestamp(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  const hours = String(date.getHours()).padStart(2, '0');
  const minutes = String(date.getMinutes()).padStart(2, '0');
  const seconds = String(date.getSeconds()).padStart(2, '0');
  const millis = String(date.getMilliseconds()).padStart(3, '0');
  return `${year}-${month}-${day} ${hours}:${minutes}:${seconds},${millis}`;
}

/**
 * Render one entry as a text line (plus the error stack, if any).
 */
export function formatTextLine(
  info: { level: string; message: unknown; [key: string]: unknown },
  timestampFormat: TimestampFormat,
  now: Date = new Date()
): string {
  const level = info.level.toUpperCase().padEnd(5);
  const component = info['component'];
  const timestamp = timestampFormat === 'iso' ? now.toISOString() : formatClassicTimestamp(now);
  const componentPart = typeof component === 'string' ? ` [${component}]` : '';
  let line = `${level} ${timestamp}${componentPart} ${String(info.message)}`;
  const errorStack = info['errorStack'];
  if (typeof errorStack === 'string') {
    line += '\n' + errorStack;
  }
  return line;
}

function buildFormat(format: 'text' | 'json', timestampFormat: TimestampFormat): winston.Logform.Format {
  if (format === 'json') {
    return winston.format.combine(winston.format.timestamp(), winston.format.json());
  }
  return winston.format.printf((info) => formatTextLine(info, timestampFormat));
}

/**
 * Console transport; every level goes to stdout.
 */
export class ConsoleTransport implements LogTransport {
  name = 'console';

  constructor(
    private format: 'text' | 'json',
    private timestampFormat: TimestampFormat
  ) {}

  createWinstonTransport(): winston.transport {
    return new winston.transports.Console({
      format: buildFormat(this.format, this.timestampFormat),
      stderrLevels: [],
    });
  }
}

/**
 * File transport: writes to a log file with size-based rotation.
 */
export class FileTransport implements LogTransport {
  name = 'file';

  constructor(
    private filePath: string,
    private format: 'text' | 'json',
    private timestampFormat: TimestampFormat = 'classic'
  ) {}

  createWinstonTransport(): winston.transport {
    return new winston.transports.File({
      filename: this.filePath,
      format: buildFormat(this.format, this.timestampFormat),
      maxsize: 10 * 1024 * 1024, // 10 MB
      maxFiles: 5,
    });
  }
}
