/**
 * Decryption stage backed by the gpg command line tool.
 *
 * The ciphertext is spooled into a private temp directory, gpg writes the
 * plaintext next to it, and the plaintext is reopened as a stream. The temp
 * directory lives until the returned file is closed.
 */

import * as fs from 'fs';
import * as fsp from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { pipeline } from 'stream/promises';
import type { Readable } from 'stream';
import { getRuntimeConfig } from '../../config/RuntimeConfig.js';
import { getLogger } from '../../logging/index.js';
import { ExtractError, errorMessage } from '../../errors.js';
import { ByteStream, baseName } from '../ByteStream.js';
import { CommandRunner, runCommand } from './CommandRunner.js';

const logger = getLogger('gpg-decryptor');

export interface DecryptionOptions {
  /** Identifier of the secret key to decrypt with */
  key: string;
  /** Keyring directory (gpg --homedir) */
  gnupgHome?: string;
  /** Passphrase protecting the secret key */
  passphrase?: string;
}

/**
 * Plaintext produced by a decryption, backed by a temp file
 */
export interface DecryptedFile extends ByteStream {
  /** Plaintext file path */
  readonly path: string;
  /** Temp directory holding the plaintext */
  readonly directory: string;
  /** Close the stream and remove the temp directory. Safe to call more than once. */
  close(): Promise<void>;
}

export interface Decryptor {
  decrypt(input: Readable, filepath: string, options: DecryptionOptions): Promise<DecryptedFile>;
}

/**
 * Decryption produced no usable plaintext
 */
export class DecryptionError extends ExtractError {
  constructor(
    message: string,
    public readonly filepath: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'DecryptionError';
  }
}

const ENCRYPTED_SUFFIX = /\.(gpg|pgp|asc)$/i;

/**
 * Plaintext name for an encrypted remote path: `data.csv.gz.gpg` -> `data.csv.gz`
 */
export function decryptedName(filepath: string): string {
  const name = baseName(filepath);
  const stripped = name.replace(ENCRYPTED_SUFFIX, '');
  return stripped.length > 0 ? stripped : name;
}

export interface GpgDecryptorOptions {
  binary?: string;
  runner?: CommandRunner;
  tempRoot?: string;
}

export class GpgDecryptor implements Decryptor {
  private binary: string;
  private runner: CommandRunner;
  private tempRoot: string;

  constructor(options: GpgDecryptorOptions = {}) {
    this.binary = options.binary ?? getRuntimeConfig().gpgBinary;
    this.runner = options.runner ?? runCommand;
    this.tempRoot = options.tempRoot ?? os.tmpdir();
  }

  async decrypt(input: Readable, filepath: string, options: DecryptionOptions): Promise<DecryptedFile> {
    const directory = await fsp.mkdtemp(path.join(this.tempRoot, 'sftp-extract-'));
    try {
      const cipherPath = path.join(directory, 'ciphertext');
      const outputDir = path.join(directory, 'plain');
      const outputPath = path.join(outputDir, decryptedName(filepath));

      await fsp.mkdir(outputDir);
      await pipeline(input, fs.createWriteStream(cipherPath));

      logger.info(`Decrypting file: ${filepath}`);
      const result = await this.run(this.buildArgs(cipherPath, outputPath, options), options.passphrase, filepath);
      await fsp.rm(cipherPath, { force: true });

      if (!(await exists(outputPath))) {
        const detail = result.stderr ? ` (${this.binary} exited ${result.exitCode}: ${result.stderr})` : '';
        throw new DecryptionError(`Decryption of file failed: ${filepath}${detail}`, filepath);
      }
      if (result.exitCode !== 0) {
        logger.warn(`${this.binary} exited ${result.exitCode} but produced output for ${filepath}`, {
          stderr: result.stderr,
        });
      }

      return openDecryptedFile(outputPath, directory);
    } catch (error) {
      await fsp.rm(directory, { recursive: true, force: true });
      throw error;
    }
  }

  buildArgs(cipherPath: string, outputPath: string, options: DecryptionOptions): string[] {
    const args = ['--batch', '--yes', '--no-tty', '--trust-model', 'always'];
    if (options.gnupgHome) {
      args.push('--homedir', options.gnupgHome);
    }
    if (options.key) {
      args.push('--try-secret-key', options.key);
    }
    if (options.passphrase !== undefined) {
      args.push('--pinentry-mode', 'loopback', '--passphrase-fd', '0');
    }
    args.push('--output', outputPath, '--decrypt', cipherPath);
    return args;
  }

  private async run(args: string[], passphrase: string | undefined, filepath: string) {
    try {
      return await this.runner(this.binary, args, passphrase !== undefined ? `${passphrase}\n` : undefined);
    } catch (error) {
      throw new DecryptionError(`Could not run ${this.binary} for ${filepath}: ${errorMessage(error)}`, filepath, {
        cause: error,
      });
    }
  }
}

async function exists(filePath: string): Promise<boolean> {
  try {
    const stats = await fsp.stat(filePath);
    return stats.isFile();
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') return false;
    throw error;
  }
}

function openDecryptedFile(filePath: string, directory: string): DecryptedFile {
  const stream = fs.createReadStream(filePath);
  let closed = false;

  return {
    name: path.basename(filePath),
    path: filePath,
    directory,
    stream,
    async close(): Promise<void> {
      if (closed) return;
      closed = true;
      stream.destroy();
      await fsp.rm(directory, { recursive: true, force: true });
    },
  };
}
