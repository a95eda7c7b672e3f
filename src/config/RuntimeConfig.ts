/**
 * Runtime Configuration
 *
 * Tunables read from environment variables. These are the defaults for
 * every new SftpConnection and FileDiscovery; explicit properties win.
 * Cached after first call; use resetRuntimeConfig() in tests.
 */

export interface RuntimeConfiguration {
  /** Connect attempts on a dropped handshake (SFTP_CONNECT_MAX_ATTEMPTS, default 6) */
  connectMaxAttempts: number;
  /** First backoff wait in ms, doubled per retry (SFTP_CONNECT_INITIAL_DELAY_MS, default 2000) */
  connectInitialDelay: number;
  /** SSH handshake timeout in ms (SFTP_READY_TIMEOUT_MS, default 20000) */
  readyTimeout: number;
  /** Bound on a single list/stat/realpath call in ms, 0 disables (SFTP_OPERATION_TIMEOUT_MS, default 60000) */
  operationTimeout: number;
  /** Deepest directory level discovery descends to (SFTP_MAX_DEPTH, default 64) */
  maxDepth: number;
  /** Decryption tool binary (GPG_BINARY, default 'gpg') */
  gpgBinary: string;
}

let cachedConfig: RuntimeConfiguration | null = null;

function parseNumber(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value === '') return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) || parsed < 0 ? defaultValue : parsed;
}

export function getRuntimeConfig(): RuntimeConfiguration {
  if (cachedConfig) return cachedConfig;

  cachedConfig = {
    connectMaxAttempts: Math.max(1, parseNumber(process.env['SFTP_CONNECT_MAX_ATTEMPTS'], 6)),
    connectInitialDelay: parseNumber(process.env['SFTP_CONNECT_INITIAL_DELAY_MS'], 2000),
    readyTimeout: parseNumber(process.env['SFTP_READY_TIMEOUT_MS'], 20000),
    operationTimeout: parseNumber(process.env['SFTP_OPERATION_TIMEOUT_MS'], 60000),
    maxDepth: parseNumber(process.env['SFTP_MAX_DEPTH'], 64),
    gpgBinary: process.env['GPG_BINARY'] || 'gpg',
  };

  return cachedConfig;
}

/**
 * Reset cached configuration (for testing)
 */
export function resetRuntimeConfig(): void {
  cachedConfig = null;
}
