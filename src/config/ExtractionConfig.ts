/**
 * Validation of the connection and extraction config handed in by the
 * caller. Keys follow the connector's JSON config (snake_case); parsed
 * values come out camelCased and with defaults applied.
 */

import { z } from 'zod';
import { ExtractError } from '../errors.js';
import { DelimitedRowProperties, unescapeDelimiter } from '../datatypes/delimited/DelimitedProperties.js';
import type { DecryptionOptions } from '../pipeline/decrypt/GpgDecryptor.js';

export class ConfigValidationError extends ExtractError {
  constructor(
    public readonly issues: string[],
    subject: string
  ) {
    super(`Invalid ${subject} config: ${issues.join('; ')}`);
    this.name = 'ConfigValidationError';
  }
}

const nonEmpty = z.string().trim().min(1);

/** Comma-separated string or list, as tap configs carry both */
const columnList = z
  .union([z.array(z.string()), z.string()])
  .transform((value) =>
    (Array.isArray(value) ? value : value.split(','))
      .map((column) => column.trim())
      .filter((column) => column.length > 0)
  );

export const ConnectionConfigSchema = z
  .object({
    host: nonEmpty,
    port: z.coerce.number().int().min(1).max(65535).default(22),
    username: nonEmpty,
    password: z.string().optional(),
    private_key_file: z.string().optional(),
    private_key_passphrase: z.string().optional(),
  })
  .refine((config) => Boolean(config.password) || Boolean(config.private_key_file), {
    message: 'either password or private_key_file is required',
    path: ['password'],
  })
  .transform((config) => ({
    host: config.host,
    port: config.port,
    username: config.username,
    password: config.password || undefined,
    privateKeyFile: config.private_key_file || undefined,
    passphrase: config.private_key_passphrase || undefined,
  }));

export type ConnectionConfig = z.output<typeof ConnectionConfigSchema>;

export const DecryptionConfigSchema = z
  .object({
    key: nonEmpty,
    gnupghome: z.string().optional(),
    passphrase: z.string().optional(),
  })
  .transform(
    (config): DecryptionOptions => ({
      key: config.key,
      gnupgHome: config.gnupghome || undefined,
      passphrase: config.passphrase,
    })
  );

export const CsvOptionsSchema = z
  .object({
    encoding: z
      .string()
      .default('utf-8')
      .refine((value) => Buffer.isEncoding(value), { message: 'unsupported text encoding' }),
    delimiter: z
      .string()
      .default(',')
      .refine((value) => unescapeDelimiter(value).length === 1, { message: 'delimiter must be a single character' }),
    sanitize_headers: z.boolean().default(false),
    key_properties: columnList.default([]),
    date_overrides: columnList.default([]),
  })
  .transform(
    (options): DelimitedRowProperties => ({
      // Narrowed by the refine above
      encoding: Buffer.isEncoding(options.encoding) ? options.encoding : 'utf-8',
      delimiter: options.delimiter,
      sanitizeHeaders: options.sanitize_headers,
      keyProperties: options.key_properties,
      dateOverrides: options.date_overrides,
    })
  );

export const ExtractionConfigSchema = z
  .object({
    table_name: z.string().optional(),
    root_path: z.string().default(''),
    search_pattern: nonEmpty.refine(
      (pattern) => {
        try {
          new RegExp(pattern);
          return true;
        } catch {
          return false;
        }
      },
      { message: 'not a valid regular expression' }
    ),
    modified_since: z.coerce.date().optional(),
    decryption: DecryptionConfigSchema.optional(),
    csv: CsvOptionsSchema.default({}),
  })
  .transform((config) => ({
    tableName: config.table_name,
    rootPath: config.root_path,
    searchPattern: config.search_pattern,
    modifiedSince: config.modified_since,
    decryption: config.decryption,
    csv: config.csv,
  }));

export type ExtractionConfig = z.output<typeof ExtractionConfigSchema>;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${where}: ${issue.message}`;
  });
}

/**
 * @throws ConfigValidationError listing every problem found
 */
export function parseConnectionConfig(input: unknown): ConnectionConfig {
  const result = ConnectionConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigValidationError(formatIssues(result.error), 'connection');
  }
  return result.data;
}

/**
 * @throws ConfigValidationError listing every problem found
 */
export function parseExtractionConfig(input: unknown): ExtractionConfig {
  const result = ExtractionConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigValidationError(formatIssues(result.error), 'extraction');
  }
  return result.data;
}
