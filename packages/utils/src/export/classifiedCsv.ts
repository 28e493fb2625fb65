/**
 * Logbook Conversion - Classified Flights CSV
 */

import { ClassifiedFlight } from '../types';
import { primaryRole } from '../solver/classificationEngine';

const HEADER = [
  'ROW',
  'DATE',
  'FROM',
  'TO',
  'AIRCRAFT_TYPE',
  'GROUP',
  'ROLE',
  'TOTAL',
  'PIC',
  'SIC',
  'STUDENT',
  'SAFETY_EXCLUDED',
  'PIC_XC',
  'NIGHT',
  'ACTUAL_INST',
  'SIM_INST',
  'DEVICE',
  'XC',
  'COMPLEX',
  'ADVISORIES'
];

function quote(value: string): string {
  return /[",\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

function flag(value: boolean): string {
  return value ? 'Y' : 'N';
}

export function buildClassifiedFlightsCsv(flights: readonly ClassifiedFlight[]): string {
  const rows = [HEADER.join(',')];

  for (const flight of flights) {
    const { record, roles, night } = flight;
    rows.push([
      String(record.row_number),
      record.date,
      quote(record.from),
      quote(record.to),
      quote(flight.aircraft.normalized_type),
      flight.flags.is_simulator_device ? 'DEVICE' : flight.group,
      primaryRole(flight),
      record.durations.TotalTime,
      roles.pic,
      roles.sic,
      roles.student,
      roles.safety_pilot_excluded,
      flight.pic_cross_country,
      Math.round((night.pic + night.sic + night.student) * 100) / 100,
      flight.instrument.actual,
      flight.instrument.simulated,
      flight.device_hours,
      flight.flags.cross_country_status === 'unknown' ? '?' : flag(flight.flags.is_cross_country),
      flag(flight.flags.is_complex),
      quote(flight.advisories.map(a => a.code).join(' '))
    ].join(','));
  }

  return rows.join('\n');
}
