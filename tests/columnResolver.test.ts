/**
 * Column Resolver Tests
 * Header aliases, explicit mappings and missing-column reporting
 */

import {
  hasUsableMapping,
  parseExplicitMapping,
  resolveColumns
} from '../packages/utils/src/parser/columnResolver';
import { lookupFieldName, normalizeHeader } from '../packages/utils/src/parser/columnAliases';
import { STANDARD_HEADERS } from './fixtures/logbookFixtures';

describe('normalizeHeader', () => {
  test('should lower-case and collapse punctuation', () => {
    expect(normalizeHeader('  A/C   Type ')).toBe('a c type');
    expect(normalizeHeader('Total Flight Time (hrs)')).toBe('total flight time hrs');
  });

  test('should keep Hebrew letters', () => {
    expect(normalizeHeader('תאריך')).toBe('תאריך');
  });
});

describe('lookupFieldName', () => {
  test('should accept canonical names, display names and aliases', () => {
    expect(lookupFieldName('PIC')).toBe('PIC');
    expect(lookupFieldName('total time')).toBe('TotalTime');
    expect(lookupFieldName('Tail Number')).toBe('Registration');
    expect(lookupFieldName('flight_totalTime')).toBe('TotalTime');
  });

  test('should return null for unknown names', () => {
    expect(lookupFieldName('something else')).toBeNull();
    expect(lookupFieldName('   ')).toBeNull();
  });
});

describe('resolveColumns', () => {
  test('should map standard headers by exact alias', () => {
    const result = resolveColumns(STANDARD_HEADERS);

    expect(result.mapping.Date).toBe(0);
    expect(result.mapping.AircraftType).toBe(4);
    expect(result.mapping.TotalTime).toBe(5);
    expect(result.mapping.Distance).toBe(18);
    expect(result.columns.every(c => c.source === 'alias')).toBe(true);
    expect(result.unresolved_required).toEqual([]);
    expect(result.missing_recommended).toEqual(['EngineType', 'Class']);
    expect(result.unmapped_headers).toEqual([]);
  });

  test('should fall back to containment for unfamiliar spellings', () => {
    const result = resolveColumns([
      'Flight Date',
      'Dep Airport',
      'Arr Airport',
      'Tail Number',
      'Type',
      'Total Flight Time (hrs)'
    ]);

    expect(result.mapping).toMatchObject({
      Date: 0,
      From: 1,
      To: 2,
      Registration: 3,
      AircraftType: 4,
      TotalTime: 5
    });
    const total = result.columns.find(c => c.field === 'TotalTime');
    expect(total?.source).toBe('heuristic');
    expect(total?.header).toBe('Total Flight Time (hrs)');
  });

  test('should not use two-letter aliases for containment', () => {
    const result = resolveColumns(['Date', 'Remarks xc']);

    expect(result.mapping.CrossCountry).toBeUndefined();
    expect(result.mapping.Remarks).toBe(1);
  });

  test('should let explicit entries win and share a column', () => {
    const result = resolveColumns(STANDARD_HEADERS, { PIC: 'Total Time', TotalTime: 'Total Time' });

    expect(result.mapping.PIC).toBe(5);
    expect(result.mapping.TotalTime).toBe(5);
    expect(result.columns.find(c => c.field === 'PIC')?.source).toBe('explicit');
    expect(result.unmapped_headers).toEqual(['PIC']);
  });

  test('should warn and fall back when an explicit column is absent', () => {
    const result = resolveColumns(STANDARD_HEADERS, { Date: 'Missing' });

    expect(result.mapping.Date).toBe(0);
    expect(result.issues[0]).toEqual({
      code: 'WARN_EXPLICIT_COLUMN_NOT_FOUND',
      field: 'Date',
      message: "Source column 'Missing' for Date not found in headers",
      severity: 'warning'
    });
  });

  test('should accept column indexes', () => {
    const result = resolveColumns(['A', 'B', 'C'], { Date: 2, TotalTime: 7 });

    expect(result.mapping.Date).toBe(2);
    expect(result.mapping.TotalTime).toBeUndefined();
    expect(result.issues.filter(i => i.code === 'WARN_EXPLICIT_COLUMN_NOT_FOUND')).toHaveLength(1);
  });

  test('should report every missing required column', () => {
    const result = resolveColumns(['Date', 'Remarks']);

    expect(result.unresolved_required).toEqual(['From', 'To', 'Registration', 'AircraftType', 'TotalTime']);
    expect(result.issues.filter(i => i.code === 'ERR_REQUIRED_COLUMN_MISSING')).toHaveLength(5);
    expect(hasUsableMapping(result)).toBe(true);
  });

  test('should flag a header row with no required column as unusable', () => {
    const result = resolveColumns(['Foo', 'Bar']);

    expect(result.unresolved_required).toHaveLength(6);
    expect(hasUsableMapping(result)).toBe(false);
    expect(result.unmapped_headers).toEqual(['Foo', 'Bar']);
  });
});

describe('parseExplicitMapping', () => {
  test('should resolve key spellings and index strings', () => {
    const { mapping, issues } = parseExplicitMapping({
      date: 'Flight Day',
      'Total Time': '5',
      Night: 3,
      bogus: 'x'
    });

    expect(mapping).toEqual({ Date: 'Flight Day', TotalTime: 5, Night: 3 });
    expect(issues).toEqual([
      {
        code: 'WARN_UNKNOWN_MAPPING_KEY',
        field: 'bogus',
        message: "Unknown column name in mapping: 'bogus'",
        severity: 'warning'
      }
    ]);
  });

  test('should feed resolveColumns', () => {
    const { mapping } = parseExplicitMapping({ date: 'Flight Day', 'Total Time': '5' });
    const result = resolveColumns(['Flight Day', 'From', 'To', 'Reg', 'Type', 'Block'], mapping);

    expect(result.mapping.Date).toBe(0);
    expect(result.mapping.TotalTime).toBe(5);
    expect(result.unresolved_required).toEqual([]);
  });
});
