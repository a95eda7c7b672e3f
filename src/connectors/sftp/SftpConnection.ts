/**
 * SFTP connection management using ssh2-sftp-client
 *
 * - One live session per connection, established on first use
 * - Private key authentication with one password-only fallback
 * - Exponential backoff when the server drops the handshake
 * - Directory listing, stat and file open primitives
 * - Owns the plaintext temp file of the most recent decryption
 *
 * Not safe for concurrent use: give each worker its own connection.
 */

import SftpClient from 'ssh2-sftp-client';
import * as fs from 'fs';
import * as os from 'os';
import type { Readable } from 'stream';
import { getLogger } from '../../logging/index.js';
import { errorMessage } from '../../errors.js';
import type { ConnectionConfig } from '../../config/ExtractionConfig.js';
import { Decryptor, DecryptedFile, DecryptionOptions, GpgDecryptor } from '../../pipeline/decrypt/GpgDecryptor.js';
import {
  SftpConnectionProperties,
  getDefaultSftpConnectionProperties,
  getMaxBackoff,
  getSftpPropertiesSummary,
  validateSftpConnectionProperties,
} from './SftpConnectionProperties.js';
import {
  RemoteDirectoryNotFoundError,
  SftpAuthenticationError,
  SftpConnectionError,
  SftpTimeoutError,
  isAuthenticationFailure,
  isHandshakeDropped,
  isNoSuchFile,
} from './errors.js';

const logger = getLogger('sftp-connection');

/**
 * Kind of a listed entry as the listing reports it: 'd' directory, '-' regular
 * file. 'other' is anything else (links, special files, or a long name that is
 * not `ls`-style) and must be stat'ed to learn what it is.
 */
export type RemoteEntryType = 'd' | '-' | 'other';

/**
 * One child of a listed directory
 */
export interface RemoteEntry {
  name: string;
  type: RemoteEntryType;
  size: number;
  /** Modification time in epoch ms; absent when the server does not report it */
  modifyTime?: number;
}

/**
 * Attributes of a path after following symbolic links
 */
export interface RemoteStat {
  isDirectory: boolean;
  isFile: boolean;
  size: number;
  modifyTime?: number;
}

/**
 * An entry of ssh2-sftp-client's list(). `type` is the first character of the
 * server's long name, so any character can turn up.
 */
export interface ListedEntry {
  name: string;
  type: string;
  size: number;
  modifyTime: number;
}

/**
 * The parts of ssh2-sftp-client this connection uses
 */
export interface SftpSession {
  connect(options: SftpClient.ConnectOptions): Promise<unknown>;
  end(): Promise<unknown>;
  list(remotePath: string): Promise<ListedEntry[]>;
  stat(remotePath: string): Promise<Pick<SftpClient.FileStats, 'isDirectory' | 'isFile' | 'size' | 'modifyTime'>>;
  realPath(remotePath: string): Promise<string>;
  createReadStream(remotePath: string): Readable;
  on(event: string, listener: () => void): unknown;
}

export interface SftpConnectionOptions {
  host: string;
  port?: number;
  username: string;
  password?: string;
  properties?: Partial<SftpConnectionProperties>;
  /** Creates the underlying client; one per connect attempt */
  clientFactory?: () => SftpSession;
  decryptor?: Decryptor;
}

function toModifyTime(value: number | undefined): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

/**
 * ssh2-sftp-client takes the type from the first character of the entry's
 * long name, which servers are free to format as they like
 */
function toEntryType(listed: string): RemoteEntryType {
  return listed === 'd' || listed === '-' ? listed : 'other';
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class SftpConnection {
  private session: SftpSession | null = null;
  private active = false;
  private decryptedFile: DecryptedFile | null = null;

  private readonly host: string;
  private readonly port: number;
  private readonly username: string;
  private readonly password: string | undefined;
  private readonly properties: SftpConnectionProperties;
  private readonly clientFactory: () => SftpSession;
  private readonly decryptor: Decryptor;

  constructor(options: SftpConnectionOptions) {
    this.host = options.host;
    this.port = options.port ?? 22;
    this.username = options.username;
    this.password = options.password || undefined;
    this.properties = {
      ...getDefaultSftpConnectionProperties(),
      ...options.properties,
    };
    this.clientFactory = options.clientFactory ?? (() => new SftpClient('sftp-extract'));
    this.decryptor = options.decryptor ?? new GpgDecryptor();
  }

  getProperties(): SftpConnectionProperties {
    return this.properties;
  }

  isConnected(): boolean {
    return this.active;
  }

  /**
   * Establish the session if it is not already up. No-op when active.
   */
  async connect(): Promise<void> {
    await this.ensureConnected();
  }

  /**
   * Return the live session, connecting (or reconnecting after the server
   * closed it) first. Every remote operation goes through here.
   *
   * @throws SftpConnectionError when the handshake keeps dropping or connect fails outright
   * @throws SftpAuthenticationError when key and password authentication both fail
   */
  async ensureConnected(): Promise<SftpSession> {
    if (this.active && this.session) {
      return this.session;
    }

    validateSftpConnectionProperties(this.properties);
    const privateKey = this.loadPrivateKey();
    const maxAttempts = this.properties.maxConnectAttempts;
    let delay = this.properties.initialRetryDelay;

    logger.debug(`Connecting to ${this.host}:${this.port}`, {
      auth: getSftpPropertiesSummary(this.properties, this.password !== undefined),
      maxBackoffMs: getMaxBackoff(this.properties),
    });

    for (let attempt = 1; ; attempt++) {
      try {
        const session = await this.authenticate(privateKey);
        this.session = session;
        this.active = true;
        session.on('close', () => {
          if (this.session === session) this.active = false;
        });
        logger.info(`Connected to ${this.host}:${this.port} as ${this.username}`);
        return session;
      } catch (error) {
        if (error instanceof SftpAuthenticationError) {
          throw error;
        }
        if (!isHandshakeDropped(error)) {
          throw new SftpConnectionError(
            `SFTP connection failed to ${this.host}:${this.port} - ${errorMessage(error)}`,
            attempt,
            { cause: error }
          );
        }
        if (attempt >= maxAttempts) {
          throw new SftpConnectionError(
            `SFTP connection to ${this.host}:${this.port} closed before handshake on ${attempt} attempts - ${errorMessage(error)}`,
            attempt,
            { cause: error }
          );
        }

        logger.warn(
          `SSH connection closed unexpectedly. Waiting ${delay / 1000} seconds and retrying...`,
          { attempt, waitMs: delay }
        );
        await sleep(delay);
        delay *= 2;
      }
    }
  }

  /**
   * Connect, run `fn`, and close on every exit path
   */
  async using<T>(fn: (connection: SftpConnection) => Promise<T>): Promise<T> {
    try {
      await this.ensureConnected();
      return await fn(this);
    } finally {
      await this.close();
    }
  }

  /**
   * List the immediate children of a remote directory
   *
   * @throws RemoteDirectoryNotFoundError if `remotePath` does not exist
   */
  async listDirectory(remotePath: string): Promise<RemoteEntry[]> {
    const session = await this.ensureConnected();

    let entries: Awaited<ReturnType<SftpSession['list']>>;
    try {
      entries = await this.withTimeout('list', remotePath, session.list(remotePath));
    } catch (error) {
      if (isNoSuchFile(error)) {
        throw new RemoteDirectoryNotFoundError(remotePath, { cause: error });
      }
      throw error;
    }

    return entries.map((entry) => ({
      name: entry.name,
      type: toEntryType(entry.type),
      size: entry.size,
      modifyTime: toModifyTime(entry.modifyTime),
    }));
  }

  /**
   * Attributes of `remotePath`, following symbolic links
   */
  async stat(remotePath: string): Promise<RemoteStat> {
    const session = await this.ensureConnected();
    const stats = await this.withTimeout('stat', remotePath, session.stat(remotePath));
    return {
      isDirectory: stats.isDirectory,
      isFile: stats.isFile,
      size: stats.size,
      modifyTime: toModifyTime(stats.modifyTime),
    };
  }

  /**
   * Canonical absolute form of `remotePath`
   */
  async realPath(remotePath: string): Promise<string> {
    const session = await this.ensureConnected();
    return this.withTimeout('realpath', remotePath, session.realPath(remotePath));
  }

  /**
   * Open a remote file for reading. The caller closes the stream.
   */
  async openFile(remotePath: string): Promise<Readable> {
    const session = await this.ensureConnected();
    logger.debug(`Opening ${remotePath}`);
    return session.createReadStream(remotePath);
  }

  /**
   * Open a remote file and decrypt it. The plaintext is held by this
   * connection until the next decryption, releaseDecryptedFile() or close().
   */
  async openDecrypted(remotePath: string, options: DecryptionOptions): Promise<DecryptedFile> {
    await this.releaseDecryptedFile();

    const raw = await this.openFile(remotePath);
    try {
      this.decryptedFile = await this.decryptor.decrypt(raw, remotePath, options);
    } finally {
      raw.destroy();
    }
    return this.decryptedFile;
  }

  async releaseDecryptedFile(): Promise<void> {
    const file = this.decryptedFile;
    this.decryptedFile = null;
    if (file) {
      await file.close();
    }
  }

  /**
   * End the session and release the decrypted temp file.
   * Safe to call repeatedly, and on a connection that never connected.
   */
  async close(): Promise<void> {
    const session = this.session;
    const wasActive = this.active;
    this.session = null;
    this.active = false;

    try {
      if (session && wasActive) {
        try {
          await session.end();
        } catch (error) {
          logger.warn(`Error closing SFTP session to ${this.host}:${this.port}: ${errorMessage(error)}`);
        }
      }
    } finally {
      await this.releaseDecryptedFile();
    }
  }

  private async authenticate(privateKey: Buffer | undefined): Promise<SftpSession> {
    try {
      return await this.openSession(this.buildConnectConfig(privateKey));
    } catch (error) {
      if (!isAuthenticationFailure(error)) {
        throw error;
      }
      if (!privateKey) {
        throw new SftpAuthenticationError(
          `SFTP authentication failed for ${this.username}@${this.host}:${this.port} - ${errorMessage(error)}`,
          { cause: error }
        );
      }

      logger.warn(`Key authentication failed for ${this.username}@${this.host}, retrying without key`);
      try {
        return await this.openSession(this.buildConnectConfig(undefined));
      } catch (fallbackError) {
        if (isAuthenticationFailure(fallbackError)) {
          throw new SftpAuthenticationError(
            `SFTP authentication failed for ${this.username}@${this.host}:${this.port} with key and password - ${errorMessage(fallbackError)}`,
            { cause: fallbackError }
          );
        }
        throw fallbackError;
      }
    }
  }

  private async openSession(config: SftpClient.ConnectOptions): Promise<SftpSession> {
    const session = this.clientFactory();
    await session.connect(config);
    return session;
  }

  private buildConnectConfig(privateKey: Buffer | undefined): SftpClient.ConnectOptions {
    const config: SftpClient.ConnectOptions = {
      host: this.host,
      port: this.port,
      username: this.username,
      readyTimeout: this.properties.readyTimeout,
      // Retries are ours, not the client's
      retries: 0,
    };

    if (this.password !== undefined) {
      config.password = this.password;
    }
    if (privateKey) {
      config.privateKey = privateKey;
      if (this.properties.passPhrase) {
        config.passphrase = this.properties.passPhrase;
      }
    }
    if (this.properties.compression) {
      config.algorithms = {
        compress: ['zlib@openssh.com', 'zlib', 'none'],
      };
    }

    return config;
  }

  private loadPrivateKey(): Buffer | undefined {
    if (this.properties.privateKey) {
      return Buffer.from(this.properties.privateKey);
    }
    if (!this.properties.privateKeyFile) {
      return undefined;
    }

    const keyPath = this.properties.privateKeyFile.replace(/^~(?=$|\/)/, os.homedir());
    try {
      return fs.readFileSync(keyPath);
    } catch (error) {
      throw new SftpConnectionError(`Failed to read private key file: ${keyPath} - ${errorMessage(error)}`, 0, {
        cause: error,
      });
    }
  }

  private async withTimeout<T>(operation: string, remotePath: string, work: Promise<T>): Promise<T> {
    const timeoutMs = this.properties.operationTimeout;
    if (timeoutMs <= 0) {
      return work;
    }

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => reject(new SftpTimeoutError(operation, remotePath, timeoutMs)), timeoutMs);
    });
    try {
      return await Promise.race([work, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}

/**
 * Build a connection from validated connection config
 */
export function createConnection(
  config: ConnectionConfig,
  overrides: Omit<SftpConnectionOptions, 'host' | 'port' | 'username' | 'password'> = {}
): SftpConnection {
  return new SftpConnection({
    ...overrides,
    host: config.host,
    port: config.port,
    username: config.username,
    password: config.password,
    properties: {
      privateKeyFile: config.privateKeyFile ?? '',
      passPhrase: config.passphrase ?? '',
      ...overrides.properties,
    },
  });
}
