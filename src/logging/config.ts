/**
 * Logging Configuration
 *
 * Derived from environment variables, cached after first read,
 * with a reset for tests.
 */

import { LogLevel, parseLogLevel } from './LogLevel.js';

export type LogFormat = 'text' | 'json';

export interface LoggingConfiguration {
  /** Minimum log level (LOG_LEVEL env, default INFO) */
  logLevel: LogLevel;
  /** Per-component overrides (SFTP_DEBUG_COMPONENTS env, comma-separated, `name[:LEVEL]`) */
  debugComponents: string[];
  /** Output format (LOG_FORMAT env, default 'text') */
  logFormat: LogFormat;
  /** Optional file to also write logs to (LOG_FILE env) */
  logFile?: string;
}

let cachedConfig: LoggingConfiguration | null = null;

function parseFormat(value: string | undefined): LogFormat {
  return value === 'json' ? 'json' : 'text';
}

function parseDebugComponents(value: string | undefined): string[] {
  if (!value || value.trim() === '') return [];
  return value
    .split(',')
    .map((c) => c.trim())
    .filter((c) => c.length > 0);
}

export function getLoggingConfig(): LoggingConfiguration {
  if (cachedConfig) return cachedConfig;

  cachedConfig = {
    logLevel: parseLogLevel(process.env['LOG_LEVEL'] ?? 'INFO'),
    debugComponents: parseDebugComponents(process.env['SFTP_DEBUG_COMPONENTS']),
    logFormat: parseFormat(process.env['LOG_FORMAT']),
    logFile: process.env['LOG_FILE'] || undefined,
  };

  return cachedConfig;
}

/**
 * Reset cached configuration (for testing)
 */
export function resetLoggingConfig(): void {
  cachedConfig = null;
}
