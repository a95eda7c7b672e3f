/**
 * Logger Factory
 *
 * Creates the root winston logger and caches per-component Logger wrappers.
 *
 * Usage:
 *   const logger = getLogger('sftp-discovery');
 *   logger.warn('Found no files');
 *
 * getLogger() lazily initializes with environment defaults, so calling
 * initializeLogging() is only needed to add transports.
 */

import winston from 'winston';
import { LogLevel } from './LogLevel.js';
import { getLoggingConfig } from './config.js';
import { initFromEnv } from './ComponentLevels.js';
import { Logger, setGlobalLevelProvider } from './Logger.js';
import { ConsoleTransport, FileTransport } from './transports.js';
import type { LogTransport } from './transports.js';

/** Winston uses lower numbers for higher priority */
const WINSTON_LEVELS: Record<string, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  trace: 4,
};

function toWinstonLevel(level: LogLevel): string {
  return level.toLowerCase();
}

let rootLogger: winston.Logger | null = null;
let currentGlobalLevel: LogLevel = LogLevel.INFO;
const loggerCache = new Map<string, Logger>();

export function initializeLogging(additionalTransports?: LogTransport[]): winston.Logger {
  const config = getLoggingConfig();

  currentGlobalLevel = config.logLevel;

  const transports: winston.transport[] = [new ConsoleTransport(config.logFormat).createWinstonTransport()];

  if (config.logFile) {
    transports.push(new FileTransport(config.logFile, config.logFormat).createWinstonTransport());
  }

  for (const t of additionalTransports ?? []) {
    transports.push(t.createWinstonTransport());
  }

  const root = winston.createLogger({
    levels: WINSTON_LEVELS,
    // Filtering happens in Logger; winston passes everything through
    level: 'trace',
    transports,
    exitOnError: false,
  });
  rootLogger = root;

  setGlobalLevelProvider(getGlobalLevel);
  initFromEnv(config.debugComponents);

  // Re-wire cached loggers to the new root
  for (const [component] of loggerCache) {
    loggerCache.set(component, new Logger(component, root));
  }

  return root;
}

/**
 * Get (or create) the Logger for a named component.
 */
export function getLogger(component: string): Logger {
  const cached = loggerCache.get(component);
  if (cached) return cached;

  const logger = new Logger(component, rootLogger ?? initializeLogging());
  loggerCache.set(component, logger);
  return logger;
}

export function setGlobalLevel(level: LogLevel): void {
  currentGlobalLevel = level;
}

export function getGlobalLevel(): LogLevel {
  return currentGlobalLevel;
}

/**
 * Reset all logging state (for testing).
 */
export function resetLogging(): void {
  rootLogger?.close();
  rootLogger = null;
  currentGlobalLevel = LogLevel.INFO;
  loggerCache.clear();
  setGlobalLevelProvider(() => LogLevel.INFO);
}
