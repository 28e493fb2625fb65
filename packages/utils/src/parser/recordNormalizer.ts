/**
 * Logbook Conversion - Record Normalizer
 *
 * Turns one raw source row into an immutable FlightRecord. Every cell error
 * in a row is collected; a row with any error is rejected as a whole.
 */

import {
  CanonicalField,
  ColumnMapping,
  DURATION_FIELDS,
  DurationField,
  FIELD_DISPLAY_NAMES,
  FlightRecord,
  NormalizationError,
  NormalizationErrorCode,
  NormalizeOutcome,
  RawRow
} from '../types';

// ============================================================================
// VALUE GRAMMARS
// ============================================================================

const DECIMAL_PATTERN = /^\d+(\.\d+)?$|^\.\d+$/;
const HOURS_MINUTES_PATTERN = /^(\d+):(\d{1,2})$/;
const COMMA_DECIMAL_PATTERN = /^\d+,\d+$/;

function roundHours(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Parses a duration cell to decimal hours, rounded to 2 places.
 * Accepts "1.5", "1:30" and "1,5"; an empty cell is 0. Returns null for
 * anything else (including negative values).
 */
export function parseDuration(raw: string): number | null {
  const value = raw.trim();
  if (value === '') return 0;

  if (DECIMAL_PATTERN.test(value)) {
    return roundHours(parseFloat(value));
  }

  const hm = HOURS_MINUTES_PATTERN.exec(value);
  if (hm) {
    const minutes = parseInt(hm[2], 10);
    if (minutes >= 60) return null;
    return roundHours(parseInt(hm[1], 10) + minutes / 60);
  }

  if (COMMA_DECIMAL_PATTERN.test(value)) {
    return roundHours(parseFloat(value.replace(',', '.')));
  }

  return null;
}

/** Landing counts: empty -> 0, "2" or "2.0" -> 2, otherwise null. */
export function parseCount(raw: string): number | null {
  const value = raw.trim();
  if (value === '') return 0;
  if (!/^\d+(\.0+)?$/.test(value)) return null;
  return parseInt(value, 10);
}

/** Distance in NM: empty -> undefined (unknown), "1,234" -> 1234, invalid -> null. */
export function parseDistance(raw: string): number | null | undefined {
  const value = raw.trim().replace(/,/g, '');
  if (value === '') return undefined;
  if (!DECIMAL_PATTERN.test(value)) return null;
  return parseFloat(value);
}

// ============================================================================
// DATES
// ============================================================================

const MONTHS: Record<string, number> = {
  jan: 1, feb: 2, mar: 3, apr: 4, may: 5, jun: 6,
  jul: 7, aug: 8, sep: 9, oct: 10, nov: 11, dec: 12
};

function monthFromName(name: string): number | null {
  return MONTHS[name.slice(0, 3).toLowerCase()] ?? null;
}

function isValidDate(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1) return false;
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  return day <= daysInMonth;
}

function toIsoDate(year: number, month: number, day: number): string | null {
  if (!isValidDate(year, month, day)) return null;
  const mm = String(month).padStart(2, '0');
  const dd = String(day).padStart(2, '0');
  return `${String(year).padStart(4, '0')}-${mm}-${dd}`;
}

/**
 * Parses the date grammars seen in logbook exports and returns YYYY-MM-DD,
 * or null when the text is not a real calendar date.
 * Numeric day/month forms are read day-first, then month-first.
 */
export function parseFlightDate(raw: string): string | null {
  const value = raw.trim();
  if (value === '') return null;

  // 2024-01-15, 2024/01/15, 2024-01-15T08:30:00Z
  const ymd = /^(\d{4})[-/](\d{1,2})[-/](\d{1,2})(?:[T ]\d{1,2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/.exec(value);
  if (ymd) {
    return toIsoDate(parseInt(ymd[1], 10), parseInt(ymd[2], 10), parseInt(ymd[3], 10));
  }

  // 15/01/2024, 15-01-2024, 15.01.2024 (or 01/15/2024)
  const dmy = /^(\d{1,2})[/.-](\d{1,2})[/.-](\d{4})$/.exec(value);
  if (dmy) {
    const first = parseInt(dmy[1], 10);
    const second = parseInt(dmy[2], 10);
    const year = parseInt(dmy[3], 10);
    return toIsoDate(year, second, first) ?? toIsoDate(year, first, second);
  }

  // 15 Jan 2024
  const dMonY = /^(\d{1,2})[\s-]([A-Za-z]{3,9})[\s-](\d{4})$/.exec(value);
  if (dMonY) {
    const month = monthFromName(dMonY[2]);
    return month === null ? null : toIsoDate(parseInt(dMonY[3], 10), month, parseInt(dMonY[1], 10));
  }

  // Jan 15, 2024
  const monDY = /^([A-Za-z]{3,9})\s+(\d{1,2}),?\s+(\d{4})$/.exec(value);
  if (monDY) {
    const month = monthFromName(monDY[1]);
    return month === null ? null : toIsoDate(parseInt(monDY[3], 10), month, parseInt(monDY[2], 10));
  }

  return null;
}

// ============================================================================
// ROW NORMALIZATION
// ============================================================================

// Required text fields; Date and TotalTime are checked by their parsers.
const REQUIRED_TEXT_FIELDS = ['From', 'To', 'Registration', 'AircraftType'] as const;

function cellOf(row: RawRow, mapping: ColumnMapping, field: CanonicalField): string | undefined {
  const index = mapping[field];
  if (index === undefined) return undefined;
  return (row[index] ?? '').trim();
}

export function normalizeRecord(
  row: RawRow,
  mapping: ColumnMapping,
  rowNumber: number
): NormalizeOutcome {
  const errors: NormalizationError[] = [];

  const reject = (code: NormalizationErrorCode, field: CanonicalField, value: string, message: string) => {
    errors.push({ code, row_number: rowNumber, field, value, message, severity: 'error' });
  };

  const text = (field: CanonicalField): string => cellOf(row, mapping, field) ?? '';

  // Date
  const rawDate = text('Date');
  let date = '';
  if (rawDate === '') {
    reject('ERR_MISSING_FIELD', 'Date', rawDate, `Row ${rowNumber}: Date is required`);
  } else {
    const parsed = parseFlightDate(rawDate);
    if (parsed === null) {
      reject('ERR_INVALID_DATE', 'Date', rawDate, `Row ${rowNumber}: unrecognized date '${rawDate}'`);
    } else {
      date = parsed;
    }
  }

  for (const field of REQUIRED_TEXT_FIELDS) {
    const value = cellOf(row, mapping, field);
    if (value === '') {
      reject('ERR_MISSING_FIELD', field, value, `Row ${rowNumber}: ${FIELD_DISPLAY_NAMES[field]} is required`);
    }
  }

  // Durations
  const durations: Record<DurationField, number> = {
    TotalTime: 0, PIC: 0, SIC: 0, Night: 0, CrossCountry: 0, ActualInstrument: 0,
    SimulatedInstrument: 0, DualReceived: 0, DualGiven: 0, Solo: 0, MultiPilot: 0, Simulator: 0
  };
  for (const field of DURATION_FIELDS) {
    const value = cellOf(row, mapping, field);
    if (value === undefined) continue;

    if (field === 'TotalTime' && value === '') {
      reject('ERR_MISSING_FIELD', field, value, `Row ${rowNumber}: Total Time is required`);
      continue;
    }

    const hours = parseDuration(value);
    if (hours === null) {
      reject(
        'ERR_INVALID_DURATION',
        field,
        value,
        `Row ${rowNumber}: ${FIELD_DISPLAY_NAMES[field]} '${value}' is not a duration (expected 1.5, 1:30 or 1,5)`
      );
      continue;
    }
    durations[field] = hours;
  }

  // Landings
  const counts = { DayLandings: 0, NightLandings: 0 };
  for (const field of ['DayLandings', 'NightLandings'] as const) {
    const value = text(field);
    const count = parseCount(value);
    if (count === null) {
      reject('ERR_INVALID_COUNT', field, value, `Row ${rowNumber}: ${FIELD_DISPLAY_NAMES[field]} '${value}' is not a whole number`);
      continue;
    }
    counts[field] = count;
  }

  // Distance
  const rawDistance = text('Distance');
  const distance = parseDistance(rawDistance);
  if (distance === null) {
    reject('ERR_INVALID_DISTANCE', 'Distance', rawDistance, `Row ${rowNumber}: distance '${rawDistance}' is not a number`);
  }

  if (errors.length > 0) {
    return { ok: false, errors };
  }

  const record: FlightRecord = {
    row_number: rowNumber,
    date,
    from: text('From'),
    to: text('To'),
    registration: text('Registration'),
    aircraft_type: text('AircraftType'),
    engine_type: text('EngineType'),
    aircraft_class: text('Class'),
    durations: Object.freeze(durations),
    day_landings: counts.DayLandings,
    night_landings: counts.NightLandings,
    instructor: text('Instructor'),
    remarks: text('Remarks'),
    distance_nm: distance ?? null
  };

  return { ok: true, record: Object.freeze(record) };
}
