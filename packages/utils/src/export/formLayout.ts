/**
 * Logbook Conversion - Summary Form Cell Layout
 *
 * Static placement of FormValues on the three sheets of the regulator's
 * flight-hours workbook. Produces a list of cell writes; writing them into
 * the template file is left to the caller.
 */

import { AircraftGroup, DatedFlightEntry, FormValues, TypeRow } from '../types';

export const SUMMARY_SHEET = 'סיכום ניסיון תעופתי';
export const CPL_SHEET = 'רישיון טיס מסחרי';
export const ATPL_SHEET = 'רישיון טיס תובלה בנתיבי אוויר';

export type FormSheet = typeof SUMMARY_SHEET | typeof CPL_SHEET | typeof ATPL_SHEET;

export interface FormCell {
  sheet: FormSheet;
  cell: string;
  value: string | number;
}

export interface FormCellsResult {
  pilot_name: string;
  cells: FormCell[];
  warnings: string[];
}

// Summary sheet, Table 1
const TYPE_ROWS_START = 13;
const MAX_TYPE_ROWS = 10;
// Summary sheet, Table 2 (same type order as Table 1)
const INSTRUMENT_ROWS_START = 31;
// CPL sheet, Table 2
const CPL_LIST_ROWS_START = 27;
const MAX_LIST_ROWS = 20;

/** Form column holding each group's total. */
const GROUP_TOTAL_COLUMN: Record<AircraftGroup, string> = {
  A: 'C',
  D: 'D',
  B: 'E',
  C: 'F'
};

const DAY_NIGHT_COLUMNS: { column: string; value: (row: TypeRow) => number }[] = [
  { column: 'M', value: r => r.day_pic },
  { column: 'N', value: r => r.day_pic_xc },
  { column: 'O', value: r => r.day_sic },
  { column: 'P', value: r => r.day_student },
  { column: 'Q', value: r => r.night_pic },
  { column: 'R', value: r => r.night_pic_xc },
  { column: 'S', value: r => r.night_sic },
  { column: 'T', value: r => r.night_student }
];

function oneDecimal(value: number): number {
  return Math.round(value * 10) / 10;
}

/** 2024-03-05 -> 05/03/2024 */
export function formatFormDate(isoDate: string): string {
  const [year, month, day] = isoDate.split('-');
  return `${day}/${month}/${year}`;
}

export function buildFormCells(values: FormValues, pilotName = ''): FormCellsResult {
  const cells: FormCell[] = [];
  const warnings: string[] = [];

  const put = (sheet: FormSheet, cell: string, value: string | number) => {
    cells.push({ sheet, cell, value });
  };
  const putHours = (sheet: FormSheet, cell: string, hours: number) => {
    const rounded = oneDecimal(hours);
    if (rounded > 0) put(sheet, cell, rounded);
  };

  // ==========================================================================
  // SUMMARY SHEET
  // ==========================================================================

  const formRows: TypeRow[] = [];
  for (const row of values.table1.types) {
    if (row.group === 'UNRESOLVED') {
      warnings.push(`Aircraft type ${row.aircraft_type} has no group; ${row.form_total} hrs not written to the form`);
      continue;
    }
    if (row.form_total <= 0 && row.instrument_actual + row.instrument_simulated + row.device_hours <= 0) continue;
    formRows.push(row);
  }

  if (formRows.length > MAX_TYPE_ROWS) {
    const dropped = formRows.splice(MAX_TYPE_ROWS).map(r => r.aircraft_type);
    warnings.push(`Form holds ${MAX_TYPE_ROWS} aircraft types; omitted: ${dropped.join(', ')}`);
  }

  formRows.forEach((row, i) => {
    const tableRow = TYPE_ROWS_START + i;
    put(SUMMARY_SHEET, `B${tableRow}`, row.aircraft_type);
    if (row.group !== 'UNRESOLVED') {
      putHours(SUMMARY_SHEET, `${GROUP_TOTAL_COLUMN[row.group]}${tableRow}`, row.form_total);
    }
    for (const { column, value } of DAY_NIGHT_COLUMNS) {
      putHours(SUMMARY_SHEET, `${column}${tableRow}`, value(row));
    }

    const instrumentRow = INSTRUMENT_ROWS_START + i;
    putHours(SUMMARY_SHEET, `C${instrumentRow}`, row.instrument_actual);
    putHours(SUMMARY_SHEET, `D${instrumentRow}`, row.instrument_simulated);
    putHours(SUMMARY_SHEET, `E${instrumentRow}`, row.device_hours);
  });

  const written = new Set(formRows.map(r => r.aircraft_type));
  for (const device of values.table2.device_by_type) {
    if (!written.has(device.aircraft_type)) {
      warnings.push(`Device time for ${device.aircraft_type} (${device.hours} hrs) has no aircraft row on the form`);
    }
  }

  // ==========================================================================
  // CPL SHEET
  // ==========================================================================

  const { cpl, atpl } = values;
  putHours(CPL_SHEET, 'C12', cpl.pic_cross_country);
  putHours(CPL_SHEET, 'C13', cpl.dual_received);
  putHours(CPL_SHEET, 'C14', cpl.dual_instrument);
  if (cpl.night_landings > 0) put(CPL_SHEET, 'C15', cpl.night_landings);
  putHours(CPL_SHEET, 'C16', cpl.night_hours);

  const solo = cpl.longest_solo_cross_country;
  if (solo) {
    putHours(CPL_SHEET, 'C17', solo.duration);
    put(CPL_SHEET, 'H17', formatFormDate(solo.date));
    if (solo.distance_km !== null) put(CPL_SHEET, 'K17', Math.round(solo.distance_km));
    put(CPL_SHEET, 'N17', solo.route);
  }
  putHours(CPL_SHEET, 'C18', cpl.complex_or_multi_engine);

  const lists: { name: string; entries: DatedFlightEntry[]; write: (row: number, e: DatedFlightEntry) => void }[] = [
    {
      name: 'instrument instruction',
      entries: cpl.instrument_instruction_flights,
      write: (row, e) => put(CPL_SHEET, `B${row}`, `${formatFormDate(e.date)}  ${oneDecimal(e.hours).toFixed(1)}`)
    },
    {
      name: 'night PIC',
      entries: cpl.night_pic_flights,
      write: (row, e) => {
        put(CPL_SHEET, `C${row}`, formatFormDate(e.date));
        put(CPL_SHEET, `D${row}`, oneDecimal(e.hours));
      }
    },
    {
      name: 'complex aircraft',
      entries: cpl.complex_flights,
      write: (row, e) => {
        put(CPL_SHEET, `E${row}`, formatFormDate(e.date));
        put(CPL_SHEET, `F${row}`, oneDecimal(e.hours));
      }
    }
  ];

  for (const list of lists) {
    list.entries.slice(0, MAX_LIST_ROWS).forEach((entry, i) => list.write(CPL_LIST_ROWS_START + i, entry));
    if (list.entries.length > MAX_LIST_ROWS) {
      warnings.push(
        `CPL table lists ${MAX_LIST_ROWS} ${list.name} flights; ${list.entries.length - MAX_LIST_ROWS} more not written`
      );
    }
  }

  // ==========================================================================
  // ATPL SHEET
  // ==========================================================================

  putHours(ATPL_SHEET, 'C13', atpl.cross_country_all_roles);
  putHours(ATPL_SHEET, 'C14', atpl.night_pic_cross_country);
  putHours(ATPL_SHEET, 'C15', atpl.instrument_total);

  return { pilot_name: pilotName, cells, warnings };
}
