/**
 * sftp-extract
 *
 * Discovers files on an SFTP server and streams them as delimited rows,
 * decrypting and decompressing on the way when configured.
 *
 *   const connection = createConnection(parseConnectionConfig(rawConnection));
 *   const extractor = new FileExtractor(connection, parseExtractionConfig(rawExtraction));
 *   await connection.using(async () => {
 *     for await (const row of extractor.extract()) sink.write(row.record);
 *   });
 */

export { ExtractError } from './errors.js';

export * from './connectors/sftp/index.js';
export * from './pipeline/index.js';
export * from './datatypes/delimited/index.js';

export {
  ConfigValidationError,
  ConnectionConfigSchema,
  CsvOptionsSchema,
  DecryptionConfigSchema,
  ExtractionConfigSchema,
  parseConnectionConfig,
  parseExtractionConfig,
} from './config/ExtractionConfig.js';
export type { ConnectionConfig, ExtractionConfig } from './config/ExtractionConfig.js';
export { getRuntimeConfig, resetRuntimeConfig } from './config/RuntimeConfig.js';
export type { RuntimeConfiguration } from './config/RuntimeConfig.js';

export * from './logging/index.js';
