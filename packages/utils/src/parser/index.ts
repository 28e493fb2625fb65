/**
 * @caai/utils - Parser Module
 *
 * Source reading, column resolution and record normalization.
 */

export {
  detectSourceFormat,
  delimiterFor,
  parseDelimitedLine,
  reconcileRows,
  type ReconciledRows,
  readDelimitedLogbook,
  readLogbookFile,
  type SourceFormat,
  type DelimitedReadResult
} from './logbookReader';

export {
  normalizeHeader,
  lookupFieldName,
  COLUMN_ALIASES,
  type FieldAliases
} from './columnAliases';

export { resolveColumns, parseExplicitMapping, hasUsableMapping } from './columnResolver';

export {
  parseDuration,
  parseCount,
  parseDistance,
  parseFlightDate,
  normalizeRecord
} from './recordNormalizer';
