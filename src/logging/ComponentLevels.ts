/**
 * Per-component level overrides.
 *
 * Lets an operator turn on DEBUG for `sftp-connection` without flooding
 * the output with every parsed row.
 */

import { LogLevel, isLevelEnabled, parseLogLevel } from './LogLevel.js';

const overrides = new Map<string, LogLevel>();

export function setComponentLevel(name: string, level: LogLevel): void {
  overrides.set(name, level);
}

export function clearComponentLevel(name: string): void {
  overrides.delete(name);
}

/**
 * A component's override if set, otherwise the global level
 */
export function getEffectiveLevel(name: string, globalLevel: LogLevel): LogLevel {
  return overrides.get(name) ?? globalLevel;
}

export function shouldLog(name: string, messageLevel: LogLevel, globalLevel: LogLevel): boolean {
  return isLevelEnabled(messageLevel, getEffectiveLevel(name, globalLevel));
}

/**
 * Apply entries like `["sftp-connection", "gpg-decryptor:TRACE"]`.
 * Entries without a level get DEBUG.
 */
export function initFromEnv(debugComponents: string[]): void {
  for (const entry of debugComponents) {
    const colonIndex = entry.lastIndexOf(':');
    if (colonIndex > 0) {
      setComponentLevel(entry.substring(0, colonIndex), parseLogLevel(entry.substring(colonIndex + 1)));
    } else {
      setComponentLevel(entry, LogLevel.DEBUG);
    }
  }
}

/**
 * Reset all overrides (for testing)
 */
export function resetComponentLevels(): void {
  overrides.clear();
}
