/**
 * Logbook Conversion - Delimited Source Reader
 *
 * Reads CSV, TSV and LogTen Pro tab-separated exports into headers plus raw
 * rows. Repeated page headers and page-total rows (left behind when a
 * multi-page table was exported) are dropped and counted.
 */

import { LogbookSource, RawRow } from '../types';

export type SourceFormat = 'csv' | 'tsv' | 'logten';

export interface DelimitedReadResult extends LogbookSource {
  delimiter: string;
  dropped_rows: number;
}

const SUPPORTED_EXTENSIONS = ['.csv', '.tsv', '.txt'];

const LOGTEN_MARKERS = ['flight_flightDate', 'flight_totalTime'];

const TOTAL_ROW_PATTERN = /^(page\s+)?totals?\b|^סה"כ|^סה״כ/i;

// ============================================================================
// FORMAT DETECTION
// ============================================================================

export function detectSourceFormat(fileName: string, firstLine?: string): SourceFormat {
  const lower = fileName.trim().toLowerCase();
  const dot = lower.lastIndexOf('.');
  const extension = dot >= 0 ? lower.slice(dot) : '';

  if (extension === '.csv') return 'csv';
  if (extension === '.tsv') return 'tsv';
  if (extension === '.txt') {
    const header = firstLine ?? '';
    if (LOGTEN_MARKERS.some(marker => header.includes(marker))) return 'logten';
    return header.includes('\t') ? 'tsv' : 'csv';
  }

  throw new Error(
    `Unsupported logbook format '${extension || fileName}'. Supported formats: ${SUPPORTED_EXTENSIONS.join(', ')}`
  );
}

export function delimiterFor(format: SourceFormat): string {
  return format === 'csv' ? ',' : '\t';
}

function detectDelimiter(headerLine: string): string {
  if (headerLine.includes('\t')) return '\t';
  const semicolons = headerLine.split(';').length - 1;
  const commas = headerLine.split(',').length - 1;
  return semicolons > commas ? ';' : ',';
}

// ============================================================================
// LINE SPLITTING
// ============================================================================

export function parseDelimitedLine(line: string, delimiter: string): string[] {
  const result: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const char = line[i];
    if (char === '"') {
      if (inQuotes && line[i + 1] === '"') {
        current += '"';
        i++;
      } else {
        inQuotes = !inQuotes;
      }
    } else if (char === delimiter && !inQuotes) {
      result.push(current);
      current = '';
    } else {
      current += char;
    }
  }
  result.push(current);
  return result;
}

interface SourceRecord {
  text: string;
  /** 1-based line the record starts on. */
  line: number;
}

/** Splits on newlines that are not inside a quoted cell. */
function splitRecords(content: string): SourceRecord[] {
  const records: SourceRecord[] = [];
  let current = '';
  let inQuotes = false;
  let line = 1;
  let startLine = 1;

  for (let i = 0; i < content.length; i++) {
    const char = content[i];
    if (char === '"') {
      inQuotes = !inQuotes;
      current += char;
    } else if (char === '\n' || char === '\r') {
      if (char === '\r' && content[i + 1] === '\n') i++;
      line++;
      if (inQuotes) {
        current += '\n';
        continue;
      }
      records.push({ text: current, line: startLine });
      current = '';
      startLine = line;
    } else {
      current += char;
    }
  }
  records.push({ text: current, line: startLine });
  return records;
}

// ============================================================================
// ROW RECONCILIATION
// ============================================================================

function sameAsHeader(row: RawRow, headers: readonly string[]): boolean {
  return headers.length > 0 && headers.every((h, i) => (row[i] ?? '').trim() === h);
}

function isTotalRow(row: RawRow): boolean {
  const first = row.find(cell => cell.trim() !== '');
  return first !== undefined && TOTAL_ROW_PATTERN.test(first.trim());
}

export interface ReconciledRows {
  rows: RawRow[];
  /** Source line of each kept row. */
  line_numbers: number[];
  dropped: number;
}

/**
 * Drops blank rows, repeated header rows and page-total rows. Without line
 * numbers, rows are taken to follow the header directly.
 */
export function reconcileRows(
  headers: readonly string[],
  rows: readonly RawRow[],
  lineNumbers: readonly number[] = rows.map((_, i) => i + 2)
): ReconciledRows {
  const kept: RawRow[] = [];
  const keptLines: number[] = [];
  let dropped = 0;

  rows.forEach((row, i) => {
    if (row.every(cell => cell.trim() === '')) return;
    if (sameAsHeader(row, headers) || isTotalRow(row)) {
      dropped++;
      return;
    }
    kept.push(row);
    keptLines.push(lineNumbers[i] ?? i + 2);
  });

  return { rows: kept, line_numbers: keptLines, dropped };
}

// ============================================================================
// READER
// ============================================================================

export function readDelimitedLogbook(content: string, delimiter?: string): DelimitedReadResult {
  const text = content.replace(/^\uFEFF/, '');
  const records = splitRecords(text);
  while (records.length > 0 && records[0].text.trim() === '') records.shift();

  if (records.length === 0) {
    throw new Error('Logbook file is empty');
  }
  const [header, ...data] = records;
  if (data.every(record => record.text.trim() === '')) {
    throw new Error('Logbook file must contain a header row and at least one data row');
  }

  const sep = delimiter ?? detectDelimiter(header.text);
  const headers = parseDelimitedLine(header.text, sep).map(h => h.trim());
  const rawRows: RawRow[] = data.map(record => parseDelimitedLine(record.text, sep));

  const { rows, line_numbers, dropped } = reconcileRows(headers, rawRows, data.map(record => record.line));

  return { headers, rows, row_numbers: line_numbers, delimiter: sep, dropped_rows: dropped };
}

/** Reads a named export, choosing the delimiter from its format. */
export function readLogbookFile(fileName: string, content: string): DelimitedReadResult {
  const text = content.replace(/^\uFEFF/, '');
  const firstLine = text.split(/\r?\n/, 1)[0] ?? '';
  const format = detectSourceFormat(fileName, firstLine);
  // CSV exports may still use semicolons
  return readDelimitedLogbook(text, format === 'csv' ? undefined : delimiterFor(format));
}
