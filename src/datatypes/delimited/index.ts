export { DelimitedRowParser, MissingColumnsError, parseRows } from './DelimitedParser.js';
export type { ParsedRow, RowRecord, RequiredColumnKind } from './DelimitedParser.js';
export {
  SDC_EXTRA_COLUMN,
  getDefaultDelimitedRowProperties,
  sanitizeHeader,
  unescapeDelimiter,
} from './DelimitedProperties.js';
export type { DelimitedRowProperties } from './DelimitedProperties.js';
