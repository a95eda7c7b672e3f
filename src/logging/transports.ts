/**
 * Logging Transports
 *
 * Winston transport wrappers. Text lines look like:
 * WARN  2026-02-10T14:30:15.042Z [sftp-connection] SSH connection closed unexpectedly...
 */

import winston from 'winston';
import type { LogFormat } from './config.js';

export interface LogTransport {
  name: string;
  createWinstonTransport(): winston.transport;
}

function buildTextFormat(): winston.Logform.Format {
  return winston.format.printf((info) => {
    const level = info.level.toUpperCase().padEnd(5);
    const component = typeof info['component'] === 'string' ? ` [${info['component']}]` : '';
    const errorStack = typeof info['errorStack'] === 'string' ? `\n${info['errorStack']}` : '';
    return `${level} ${new Date().toISOString()}${component} ${String(info.message)}${errorStack}`;
  });
}

function buildFormat(format: LogFormat): winston.Logform.Format {
  return format === 'json'
    ? winston.format.combine(winston.format.timestamp(), winston.format.json())
    : buildTextFormat();
}

/**
 * Console transport. Everything goes to stderr so that stdout stays free
 * for the record stream a downstream sink may be reading.
 */
export class ConsoleTransport implements LogTransport {
  name = 'console';

  constructor(private format: LogFormat) {}

  createWinstonTransport(): winston.transport {
    return new winston.transports.Console({
      format: buildFormat(this.format),
      stderrLevels: ['error', 'warn', 'info', 'debug', 'trace'],
    });
  }
}

export class FileTransport implements LogTransport {
  name = 'file';

  constructor(
    private filePath: string,
    private format: LogFormat
  ) {}

  createWinstonTransport(): winston.transport {
    return new winston.transports.File({
      filename: this.filePath,
      format: buildFormat(this.format),
      maxsize: 10 * 1024 * 1024, // 10 MB
      maxFiles: 5,
    });
  }
}
