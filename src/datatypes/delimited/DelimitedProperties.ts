/**
 * Properties for reading delimited text (CSV, pipe, tab) into row records
 */

/** Key under which a row's values beyond the header count are collected */
export const SDC_EXTRA_COLUMN = '_sdc_extra';

export interface DelimitedRowProperties {
  /** Text encoding of the decoded byte stream (default: "utf-8") */
  encoding: BufferEncoding;
  /** Single column delimiter character; escaped forms like "\\t" are accepted (default: ",") */
  delimiter: string;
  /** Rewrite header names into lower-case identifiers */
  sanitizeHeaders: boolean;
  /** Columns that must be present in the header */
  keyProperties: string[];
  /** Date columns that must be present in the header */
  dateOverrides: string[];
}

export function getDefaultDelimitedRowProperties(): DelimitedRowProperties {
  return {
    encoding: 'utf-8',
    delimiter: ',',
    sanitizeHeaders: false,
    keyProperties: [],
    dateOverrides: [],
  };
}

/**
 * Unescape the delimiter forms a JSON config would carry ("\\t" for tab)
 */
export function unescapeDelimiter(str: string): string {
  return str
    .replace(/\\n/g, '\n')
    .replace(/\\r/g, '\r')
    .replace(/\\t/g, '\t')
    .replace(/\\\\/g, '\\');
}

/**
 * Rewrite a header into a lower-case identifier: runs of anything other than
 * letters, digits and underscore become one underscore, and a leading run of
 * digits gets an `x_` prefix. Applying it twice gives the same result.
 */
export function sanitizeHeader(name: string): string {
  return name
    .replace(/[^0-9a-zA-Z_]+/g, '_')
    .replace(/^(\d+)/, 'x_$1')
    .toLowerCase();
}
