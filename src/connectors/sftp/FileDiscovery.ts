/**
 * Recursive discovery of remote files.
 *
 * Walks a remote tree depth-first, skipping empty files, then filters the
 * result by a regex (substring search) and an exclusive modified-since bound.
 * Directories are recognised by their mode bits: an entry the listing does
 * not plainly mark as a directory or regular file is stat'ed. Symbolic links
 * to directories are followed; each canonical directory is listed at most
 * once, so link cycles terminate.
 */

import { getRuntimeConfig } from '../../config/RuntimeConfig.js';
import { ExtractError } from '../../errors.js';
import { getLogger } from '../../logging/index.js';
import type { RemoteEntry, RemoteStat } from './SftpConnection.js';
import { RemoteDirectoryNotFoundError, isNoSuchFile } from './errors.js';

const logger = getLogger('sftp-discovery');

/**
 * A discovered remote file. `filepath` is always `/`-separated.
 */
export interface FileDescriptor {
  readonly filepath: string;
  readonly lastModified: Date;
}

/**
 * What discovery needs from a connection
 */
export interface RemoteDirectoryReader {
  listDirectory(remotePath: string): Promise<RemoteEntry[]>;
  stat(remotePath: string): Promise<RemoteStat>;
  realPath(remotePath: string): Promise<string>;
}

export interface FileDiscoveryOptions {
  /** Deepest level below the root that is listed (root is level 0) */
  maxDepth?: number;
  /** Clock used for files without a modification time */
  now?: () => Date;
}

export class InvalidSearchPatternError extends ExtractError {
  constructor(
    public readonly pattern: string,
    options?: { cause?: unknown }
  ) {
    super(`Invalid search pattern: ${pattern}`, options);
    this.name = 'InvalidSearchPatternError';
  }
}

/**
 * Join a remote directory and child name with exactly one `/`
 */
export function joinRemotePath(directory: string, name: string): string {
  return directory.endsWith('/') ? `${directory}${name}` : `${directory}/${name}`;
}

export function compilePattern(pattern: string | RegExp): RegExp {
  if (pattern instanceof RegExp) {
    // Drop g/y so test() keeps no lastIndex state between files
    return new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ''));
  }
  try {
    return new RegExp(pattern);
  } catch (error) {
    throw new InvalidSearchPatternError(pattern, { cause: error });
  }
}

/**
 * Files whose path contains a match for `pattern` (not anchored)
 */
export function matchFiles(files: FileDescriptor[], pattern: string | RegExp): FileDescriptor[] {
  const matcher = compilePattern(pattern);
  return files.filter((file) => matcher.test(file.filepath));
}

/**
 * Files modified strictly after `since`
 */
export function filterModifiedSince(files: FileDescriptor[], since: Date): FileDescriptor[] {
  const bound = since.getTime();
  return files.filter((file) => file.lastModified.getTime() > bound);
}

/**
 * Oldest first; ties broken by path so the order is stable across runs
 */
export function sortByLastModified(files: FileDescriptor[]): FileDescriptor[] {
  return [...files].sort(
    (a, b) => a.lastModified.getTime() - b.lastModified.getTime() || a.filepath.localeCompare(b.filepath)
  );
}

export class FileDiscovery {
  private readonly maxDepth: number;
  private readonly now: () => Date;

  constructor(
    private readonly reader: RemoteDirectoryReader,
    options: FileDiscoveryOptions = {}
  ) {
    this.maxDepth = options.maxDepth ?? getRuntimeConfig().maxDepth;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Every non-empty file under `rootPath` whose path matches `pattern`,
   * optionally only those modified after `modifiedSince`.
   *
   * @throws RemoteDirectoryNotFoundError if `rootPath` does not exist
   */
  async listFiles(
    rootPath: string | undefined,
    pattern: string | RegExp,
    modifiedSince?: Date
  ): Promise<FileDescriptor[]> {
    const root = rootPath ? rootPath : '.';
    const matcher = compilePattern(pattern);

    const files = await this.listAll(root);
    if (files.length > 0) {
      logger.info(`Found ${files.length} files in "${root}"`);
    } else {
      logger.warn(`Found no files on specified SFTP server at "${root}"`);
    }

    let matching = matchFiles(files, matcher);
    if (matching.length > 0) {
      logger.info(`Found ${matching.length} files in "${root}" matching "${matcher.source}"`);
    } else {
      logger.warn(`Found no files on specified SFTP server at "${root}" matching "${matcher.source}"`);
    }
    if (logger.isDebugEnabled()) {
      for (const file of matching) {
        logger.debug(`Found file: ${file.filepath}`);
      }
    }

    if (modifiedSince) {
      matching = filterModifiedSince(matching, modifiedSince);
    }
    return matching;
  }

  /**
   * listFiles() for a named table, logging which table the search serves
   */
  async listFilesForTable(
    tableName: string,
    rootPath: string | undefined,
    pattern: string | RegExp,
    modifiedSince?: Date
  ): Promise<FileDescriptor[]> {
    logger.info(`Searching for files for table '${tableName}', matching pattern: ${String(pattern)}`);
    return this.listFiles(rootPath, pattern, modifiedSince);
  }

  /**
   * Every non-empty file under `root`, without pattern or time filtering
   */
  async listAll(root: string): Promise<FileDescriptor[]> {
    const files: FileDescriptor[] = [];
    await this.walk(root, 0, new Set<string>(), files);
    return files;
  }

  private async walk(directory: string, depth: number, visited: Set<string>, files: FileDescriptor[]): Promise<void> {
    const canonical = await this.canonicalPath(directory);
    if (visited.has(canonical)) {
      logger.warn(`Skipping "${directory}": already listed as "${canonical}" (symbolic link cycle)`);
      return;
    }
    visited.add(canonical);

    const entries = await this.reader.listDirectory(directory);

    for (const entry of entries) {
      const filepath = joinRemotePath(directory, entry.name);
      let resolved: RemoteStat | undefined;
      if (entry.type === 'other') {
        resolved = await this.resolveEntry(filepath);
        if (!resolved) continue;
        if (!resolved.isDirectory && !resolved.isFile) {
          logger.debug(`Skipping "${filepath}": not a regular file or directory`);
          continue;
        }
      }
      const isDirectory = resolved ? resolved.isDirectory : entry.type === 'd';

      if (isDirectory) {
        if (depth >= this.maxDepth) {
          logger.warn(`Not descending into "${filepath}": deeper than ${this.maxDepth} levels`);
          continue;
        }
        await this.walk(filepath, depth + 1, visited, files);
        continue;
      }

      const size = resolved ? resolved.size : entry.size;
      if (size === 0) {
        continue;
      }

      let modifyTime = resolved ? resolved.modifyTime : entry.modifyTime;
      if (modifyTime === undefined) {
        logger.warn(`Cannot read m_time for file ${filepath}, defaulting to current epoch time`);
        modifyTime = this.now().getTime();
      }

      files.push(Object.freeze({ filepath, lastModified: new Date(modifyTime) }));
    }
  }

  /**
   * ssh2-sftp-client answers a missing path with '' rather than an error
   */
  private async canonicalPath(directory: string): Promise<string> {
    let canonical: string;
    try {
      canonical = await this.reader.realPath(directory);
    } catch (error) {
      if (isNoSuchFile(error)) {
        throw new RemoteDirectoryNotFoundError(directory, { cause: error });
      }
      throw error;
    }
    if (canonical === '') {
      throw new RemoteDirectoryNotFoundError(directory);
    }
    return canonical;
  }

  /**
   * Attributes of an entry whose kind the listing did not give, following
   * links. Undefined for a link whose target is gone.
   */
  private async resolveEntry(filepath: string): Promise<RemoteStat | undefined> {
    try {
      return await this.reader.stat(filepath);
    } catch (error) {
      if (isNoSuchFile(error)) {
        logger.warn(`Skipping "${filepath}": symbolic link target does not exist`);
        return undefined;
      }
      throw error;
    }
  }
}
