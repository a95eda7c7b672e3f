/**
 * Runs one extraction: discover matching files, then stream each through
 * open → decrypt (when configured) → expand → parse, oldest file first.
 */

import type { ExtractionConfig } from '../config/ExtractionConfig.js';
import type { SftpConnection } from '../connectors/sftp/SftpConnection.js';
import { FileDescriptor, FileDiscovery, FileDiscoveryOptions, sortByLastModified } from '../connectors/sftp/FileDiscovery.js';
import { DelimitedRowParser, RowRecord } from '../datatypes/delimited/DelimitedParser.js';
import { getLogger } from '../logging/index.js';
import type { ByteStream } from './ByteStream.js';
import { expand } from './compression/expand.js';

const logger = getLogger('file-extractor');

export interface ExtractedRow {
  descriptor: FileDescriptor;
  /** Name of the decompressed member the row came from (the file itself when not an archive) */
  member: string;
  /** Line of the member the record ends on; the header is line 1 */
  lineNumber: number;
  record: RowRecord;
}

export class FileExtractor {
  private readonly discovery: FileDiscovery;
  private readonly parser: DelimitedRowParser;

  constructor(
    private readonly connection: SftpConnection,
    private readonly config: ExtractionConfig,
    discoveryOptions?: FileDiscoveryOptions
  ) {
    this.discovery = new FileDiscovery(connection, discoveryOptions);
    this.parser = new DelimitedRowParser(config.csv);
  }

  /**
   * Matching files, oldest first
   */
  async discover(): Promise<FileDescriptor[]> {
    const { tableName, rootPath, searchPattern, modifiedSince } = this.config;
    const files = tableName
      ? await this.discovery.listFilesForTable(tableName, rootPath, searchPattern, modifiedSince)
      : await this.discovery.listFiles(rootPath, searchPattern, modifiedSince);
    return sortByLastModified(files);
  }

  /**
   * Rows of every matching file. A sink tracking progress can persist
   * `descriptor.lastModified` of the last completed file as the next
   * run's `modified_since`.
   */
  async *extract(): AsyncGenerator<ExtractedRow> {
    for (const descriptor of await this.discover()) {
      yield* this.extractFile(descriptor);
    }
  }

  async *extractFile(descriptor: FileDescriptor): AsyncGenerator<ExtractedRow> {
    const source = await this.open(descriptor);
    let rows = 0;
    try {
      for await (const member of expand(source)) {
        try {
          for await (const { line, record } of this.parser.rows(member.stream)) {
            rows++;
            yield { descriptor, member: member.name, lineNumber: line, record };
          }
        } finally {
          if (member.stream !== source.stream) member.stream.destroy();
        }
      }
      logger.info(`Extracted ${rows} rows from ${descriptor.filepath}`);
    } finally {
      source.stream.destroy();
      if (this.config.decryption) {
        await this.connection.releaseDecryptedFile();
      }
    }
  }

  private async open(descriptor: FileDescriptor): Promise<ByteStream> {
    if (this.config.decryption) {
      return this.connection.openDecrypted(descriptor.filepath, this.config.decryption);
    }
    return { name: descriptor.filepath, stream: await this.connection.openFile(descriptor.filepath) };
  }
}
