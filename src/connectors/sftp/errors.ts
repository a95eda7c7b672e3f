import { ExtractError } from '../../errors.js';

/**
 * Connect failed: a fatal connect error, or dropped handshakes past the retry limit
 */
export class SftpConnectionError extends ExtractError {
  constructor(
    message: string,
    public readonly attempts: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'SftpConnectionError';
  }
}

export class SftpAuthenticationError extends ExtractError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SftpAuthenticationError';
  }
}

export class RemoteDirectoryNotFoundError extends ExtractError {
  constructor(
    public readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(`Directory '${path}' does not exist`, options);
    this.name = 'RemoteDirectoryNotFoundError';
  }
}

export class SftpTimeoutError extends ExtractError {
  constructor(
    public readonly operation: string,
    public readonly path: string,
    public readonly timeoutMs: number
  ) {
    super(`SFTP ${operation} of '${path}' timed out after ${timeoutMs}ms`);
    this.name = 'SftpTimeoutError';
  }
}

function describe(error: unknown): { message: string; code?: unknown; level?: unknown } {
  if (error instanceof Error) {
    return {
      message: error.message,
      code: 'code' in error ? error.code : undefined,
      level: 'level' in error ? error.level : undefined,
    };
  }
  return { message: String(error) };
}

/**
 * The server dropped the connection before the SSH handshake finished.
 * Usually transient (load balancers, connection limits), so connect retries it.
 */
export function isHandshakeDropped(error: unknown): boolean {
  const { message, code } = describe(error);
  return code === 'ECONNRESET' || /lost before handshake|before handshake|ECONNRESET/i.test(message);
}

export function isAuthenticationFailure(error: unknown): boolean {
  const { message, level } = describe(error);
  return level === 'client-authentication' || /authentication/i.test(message);
}

/**
 * SFTP status NO_SUCH_FILE (2), or the client's ENOENT mapping of it
 */
export function isNoSuchFile(error: unknown): boolean {
  const { message, code } = describe(error);
  return code === 2 || code === 'ENOENT' || /no such file/i.test(message);
}
