/**
 * Configuration properties for SFTP connections
 */

import { getRuntimeConfig } from '../../config/RuntimeConfig.js';

export interface SftpConnectionProperties {
  /** Path to a private key file; `~` expands to the home directory */
  privateKeyFile: string;

  /** Private key material; takes precedence over privateKeyFile */
  privateKey: string;

  /** Passphrase for an encrypted private key */
  passPhrase: string;

  /** Negotiate zlib transport compression */
  compression: boolean;

  /** SSH handshake timeout in ms */
  readyTimeout: number;

  /** Bound on a single list/stat/realpath call in ms (0 disables) */
  operationTimeout: number;

  /** Connect attempts when the handshake is dropped */
  maxConnectAttempts: number;

  /** First backoff wait in ms; doubles after every retry */
  initialRetryDelay: number;
}

/**
 * Defaults, with timing tunables taken from the runtime configuration
 */
export function getDefaultSftpConnectionProperties(): SftpConnectionProperties {
  const runtime = getRuntimeConfig();
  return {
    privateKeyFile: '',
    privateKey: '',
    passPhrase: '',
    compression: true,
    readyTimeout: runtime.readyTimeout,
    operationTimeout: runtime.operationTimeout,
    maxConnectAttempts: runtime.connectMaxAttempts,
    initialRetryDelay: runtime.connectInitialDelay,
  };
}

/**
 * @throws Error if properties are invalid
 */
export function validateSftpConnectionProperties(props: SftpConnectionProperties): void {
  if (!Number.isInteger(props.maxConnectAttempts) || props.maxConnectAttempts < 1) {
    throw new Error(`maxConnectAttempts must be a positive integer, got ${props.maxConnectAttempts}`);
  }
  if (props.initialRetryDelay < 0) {
    throw new Error(`initialRetryDelay must not be negative, got ${props.initialRetryDelay}`);
  }
  if (props.operationTimeout < 0) {
    throw new Error(`operationTimeout must not be negative, got ${props.operationTimeout}`);
  }
}

/**
 * Worst-case cumulative backoff wait in ms before connect gives up
 */
export function getMaxBackoff(props: SftpConnectionProperties): number {
  let total = 0;
  let delay = props.initialRetryDelay;
  for (let retry = 1; retry < props.maxConnectAttempts; retry++) {
    total += delay;
    delay *= 2;
  }
  return total;
}

/**
 * One-line description for logs, e.g. "Public Key with Password Fallback Authentication / Compression On"
 */
export function getSftpPropertiesSummary(props: SftpConnectionProperties, hasPassword: boolean): string {
  const hasKey = props.privateKey !== '' || props.privateKeyFile !== '';
  let auth: string;
  if (hasKey && hasPassword) {
    auth = 'Public Key with Password Fallback';
  } else if (hasKey) {
    auth = 'Public Key';
  } else {
    auth = 'Password';
  }
  return `${auth} Authentication / Compression ${props.compression ? 'On' : 'Off'}`;
}
