/**
 * Record Normalizer Tests
 * Cell grammars (durations, counts, distances, dates) and row validation
 */

import {
  normalizeRecord,
  parseCount,
  parseDistance,
  parseDuration,
  parseFlightDate
} from '../packages/utils/src/parser/recordNormalizer';
import { resolveColumns } from '../packages/utils/src/parser/columnResolver';
import { SAMPLE_ROWS, STANDARD_HEADERS } from './fixtures/logbookFixtures';

const mapping = resolveColumns(STANDARD_HEADERS).mapping;

function rowWith(changes: Record<number, string>): string[] {
  const row = [...SAMPLE_ROWS[0]];
  for (const [index, value] of Object.entries(changes)) {
    row[Number(index)] = value;
  }
  return row;
}

describe('parseDuration', () => {
  test('should read decimal, H:MM and comma forms', () => {
    expect(parseDuration('1.5')).toBe(1.5);
    expect(parseDuration('1:30')).toBe(1.5);
    expect(parseDuration('1,5')).toBe(1.5);
    expect(parseDuration('.5')).toBe(0.5);
    expect(parseDuration(' 2 ')).toBe(2);
  });

  test('should round to hundredths', () => {
    expect(parseDuration('0:20')).toBe(0.33);
    expect(parseDuration('1.234')).toBe(1.23);
  });

  test('should treat an empty cell as zero', () => {
    expect(parseDuration('')).toBe(0);
    expect(parseDuration('   ')).toBe(0);
  });

  test('should reject malformed values', () => {
    expect(parseDuration('1:75')).toBeNull();
    expect(parseDuration('-1')).toBeNull();
    expect(parseDuration('abc')).toBeNull();
    expect(parseDuration('1.5h')).toBeNull();
  });
});

describe('parseCount', () => {
  test('should accept whole numbers with an optional .0', () => {
    expect(parseCount('2')).toBe(2);
    expect(parseCount('2.0')).toBe(2);
    expect(parseCount('')).toBe(0);
  });

  test('should reject fractions and text', () => {
    expect(parseCount('2.5')).toBeNull();
    expect(parseCount('two')).toBeNull();
  });
});

describe('parseDistance', () => {
  test('should distinguish empty from invalid', () => {
    expect(parseDistance('')).toBeUndefined();
    expect(parseDistance('abc')).toBeNull();
  });

  test('should strip thousands separators', () => {
    expect(parseDistance('1,234')).toBe(1234);
    expect(parseDistance('62.5')).toBe(62.5);
  });
});

describe('parseFlightDate', () => {
  test('should read ISO dates with or without a time', () => {
    expect(parseFlightDate('2024-01-15')).toBe('2024-01-15');
    expect(parseFlightDate('2024/1/5')).toBe('2024-01-05');
    expect(parseFlightDate('2024-01-15T08:30:00Z')).toBe('2024-01-15');
  });

  test('should read numeric dates day-first', () => {
    expect(parseFlightDate('05/03/2024')).toBe('2024-03-05');
    expect(parseFlightDate('15.01.2024')).toBe('2024-01-15');
    expect(parseFlightDate('15-01-2024')).toBe('2024-01-15');
  });

  test('should fall back to month-first when day-first is impossible', () => {
    expect(parseFlightDate('01/15/2024')).toBe('2024-01-15');
  });

  test('should read month names', () => {
    expect(parseFlightDate('15 Jan 2024')).toBe('2024-01-15');
    expect(parseFlightDate('Jan 15, 2024')).toBe('2024-01-15');
    expect(parseFlightDate('January 15 2024')).toBe('2024-01-15');
  });

  test('should check the calendar', () => {
    expect(parseFlightDate('29/02/2024')).toBe('2024-02-29');
    expect(parseFlightDate('29/02/2023')).toBeNull();
    expect(parseFlightDate('31/02/2024')).toBeNull();
    expect(parseFlightDate('2024-13-01')).toBeNull();
  });

  test('should reject free text', () => {
    expect(parseFlightDate('yesterday')).toBeNull();
    expect(parseFlightDate('')).toBeNull();
  });
});

describe('normalizeRecord', () => {
  test('should build a frozen record from a valid row', () => {
    const outcome = normalizeRecord(SAMPLE_ROWS[0], mapping, 2);

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;

    const { record } = outcome;
    expect(record.row_number).toBe(2);
    expect(record.date).toBe('2024-01-15');
    expect(record.aircraft_type).toBe('C172');
    expect(record.durations.TotalTime).toBe(1.5);
    expect(record.durations.DualReceived).toBe(1.5);
    expect(record.durations.SimulatedInstrument).toBe(0.5);
    expect(record.durations.Simulator).toBe(0);
    expect(record.day_landings).toBe(3);
    expect(record.instructor).toBe('Dan Levi');
    expect(record.engine_type).toBe('');
    expect(record.distance_nm).toBeNull();
    expect(Object.isFrozen(record)).toBe(true);
    expect(Object.isFrozen(record.durations)).toBe(true);
  });

  test('should read a distance cell', () => {
    const outcome = normalizeRecord(SAMPLE_ROWS[1], mapping, 3);

    expect(outcome.ok && outcome.record.distance_nm).toBe(62);
  });

  test('should collect every cell error in the row', () => {
    const outcome = normalizeRecord(rowWith({ 3: '', 5: 'abc', 15: 'x' }), mapping, 4);

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.errors.map(e => e.code)).toEqual([
      'ERR_MISSING_FIELD',
      'ERR_INVALID_DURATION',
      'ERR_INVALID_COUNT'
    ]);
    expect(outcome.errors.map(e => e.field)).toEqual(['Registration', 'TotalTime', 'NightLandings']);
    expect(outcome.errors.every(e => e.row_number === 4)).toBe(true);
  });

  test('should require a date', () => {
    const outcome = normalizeRecord(rowWith({ 0: '' }), mapping, 5);

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.errors).toEqual([
      {
        code: 'ERR_MISSING_FIELD',
        row_number: 5,
        field: 'Date',
        value: '',
        message: 'Row 5: Date is required',
        severity: 'error'
      }
    ]);
  });

  test('should reject an impossible date', () => {
    const outcome = normalizeRecord(SAMPLE_ROWS[6], mapping, 8);

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.errors[0].code).toBe('ERR_INVALID_DATE');
    expect(outcome.errors[0].message).toBe("Row 8: unrecognized date '31/02/2024'");
  });

  test('should require a total time when the column is mapped', () => {
    const outcome = normalizeRecord(rowWith({ 5: '' }), mapping, 6);

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.errors[0].field).toBe('TotalTime');
    expect(outcome.errors[0].code).toBe('ERR_MISSING_FIELD');
  });

  test('should reject an invalid distance', () => {
    const outcome = normalizeRecord(rowWith({ 18: 'far' }), mapping, 7);

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.errors[0].code).toBe('ERR_INVALID_DISTANCE');
  });

  test('should default unmapped optional fields', () => {
    const narrow = resolveColumns(['Date', 'From', 'To', 'Registration', 'Aircraft Type', 'Total Time']).mapping;
    const outcome = normalizeRecord(['2024-02-01', 'LLBG', 'LLHA', '4X-XYZ', 'PA44', '1:15'], narrow, 2);

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.record.durations.TotalTime).toBe(1.25);
    expect(outcome.record.durations.PIC).toBe(0);
    expect(outcome.record.night_landings).toBe(0);
    expect(outcome.record.remarks).toBe('');
  });

  test('should read cells missing from a short row as empty', () => {
    const outcome = normalizeRecord(SAMPLE_ROWS[0].slice(0, 6), mapping, 2);

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.record.durations.PIC).toBe(0);
    expect(outcome.record.instructor).toBe('');
  });
});
