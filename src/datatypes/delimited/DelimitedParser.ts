/**
 * Reads a delimited text stream into row records.
 *
 * - The first record is the header
 * - Values past the header count are kept under `_sdc_extra` instead of failing the file
 * - Missing trailing values are left out of the record
 * - Required columns are checked before the first row is produced
 */

import { parse } from 'csv-parse';
import type { Readable } from 'stream';
import { ExtractError } from '../../errors.js';
import {
  DelimitedRowProperties,
  SDC_EXTRA_COLUMN,
  getDefaultDelimitedRowProperties,
  sanitizeHeader,
  unescapeDelimiter,
} from './DelimitedProperties.js';

/**
 * Column name to value, in header order. `_sdc_extra` holds overflow values.
 * A Map so numeric-looking and reserved names keep their place.
 */
export type RowRecord = Map<string, string | string[]>;

/**
 * A record with the source line it ends on (the header is line 1)
 */
export interface ParsedRow {
  line: number;
  record: RowRecord;
}

export type RequiredColumnKind = 'key_properties' | 'date_overrides';

/**
 * Header lacks columns the extraction was configured to rely on
 */
export class MissingColumnsError extends ExtractError {
  constructor(
    public readonly kind: RequiredColumnKind,
    public readonly missing: string[]
  ) {
    super(
      kind === 'key_properties'
        ? `CSV file missing required headers: ${missing.join(', ')}`
        : `CSV file missing date_overrides headers: ${missing.join(', ')}`
    );
    this.name = 'MissingColumnsError';
  }
}

function toFields(value: unknown): string[] {
  if (!Array.isArray(value)) {
    throw new ExtractError(`Unexpected delimited record: ${String(value)}`);
  }
  return value.map((field) => (typeof field === 'string' ? field : String(field)));
}

/**
 * Unpack a csv-parse `{ record, info }` pair
 */
function toLine(value: unknown): { fields: string[]; line: number } {
  if (typeof value !== 'object' || value === null || !('record' in value) || !('info' in value)) {
    throw new ExtractError(`Unexpected delimited record: ${String(value)}`);
  }
  const info = value.info;
  const line = typeof info === 'object' && info !== null && 'lines' in info && typeof info.lines === 'number' ? info.lines : 0;
  return { fields: toFields(value.record), line };
}

export class DelimitedRowParser {
  private properties: DelimitedRowProperties;
  private delimiter: string;

  constructor(properties?: Partial<DelimitedRowProperties>) {
    this.properties = {
      ...getDefaultDelimitedRowProperties(),
      ...properties,
    };
    this.delimiter = unescapeDelimiter(this.properties.delimiter);
    if (this.delimiter.length !== 1) {
      throw new ExtractError(`Delimiter must be a single character, got: ${JSON.stringify(this.properties.delimiter)}`);
    }
  }

  getProperties(): DelimitedRowProperties {
    return this.properties;
  }

  /**
   * Parse `source` lazily. Forward-only: re-reading needs a freshly opened stream.
   * The caller keeps ownership of `source`.
   */
  async *parse(source: Readable): AsyncGenerator<RowRecord> {
    for await (const row of this.rows(source)) {
      yield row.record;
    }
  }

  /**
   * parse() with the line each record ends on. Blank lines count, so the
   * numbers match the file.
   */
  async *rows(source: Readable): AsyncGenerator<ParsedRow> {
    const csv = parse({
      delimiter: this.delimiter,
      encoding: this.properties.encoding,
      bom: true,
      info: true,
      relax_column_count: true,
      relax_quotes: true,
      skip_empty_lines: true,
    });
    const onSourceError = (error: Error): void => {
      csv.destroy(error);
    };
    source.on('error', onSourceError);
    source.pipe(csv);

    const records: AsyncIterator<unknown> = csv[Symbol.asyncIterator]();
    try {
      const first = await records.next();
      const header = first.done ? [] : this.readHeader(toLine(first.value).fields);
      this.validateHeader(header);

      for (;;) {
        const next = await records.next();
        if (next.done) return;
        const { fields, line } = toLine(next.value);
        yield { line, record: this.toRecord(header, fields) };
      }
    } finally {
      source.off('error', onSourceError);
      source.unpipe(csv);
      csv.destroy();
    }
  }

  /**
   * Header names as they will appear in records
   */
  readHeader(fields: string[]): string[] {
    return this.properties.sanitizeHeaders ? fields.map(sanitizeHeader) : fields;
  }

  /**
   * @throws MissingColumnsError
   */
  validateHeader(header: string[]): void {
    const present = new Set(header);
    const checks: Array<[RequiredColumnKind, string[]]> = [
      ['key_properties', this.properties.keyProperties],
      ['date_overrides', this.properties.dateOverrides],
    ];

    for (const [kind, required] of checks) {
      const missing = required.filter((column) => !present.has(column));
      if (missing.length > 0) {
        throw new MissingColumnsError(kind, missing);
      }
    }
  }

  private toRecord(header: string[], fields: string[]): RowRecord {
    const record: RowRecord = new Map();
    const count = Math.min(header.length, fields.length);

    for (let i = 0; i < count; i++) {
      record.set(header[i] ?? '', fields[i] ?? '');
    }
    if (fields.length > header.length) {
      record.set(SDC_EXTRA_COLUMN, fields.slice(header.length));
    }

    return record;
  }
}

/**
 * Parse a delimited byte stream into row records
 */
export function parseRows(source: Readable, properties?: Partial<DelimitedRowProperties>): AsyncGenerator<RowRecord> {
  return new DelimitedRowParser(properties).parse(source);
}
