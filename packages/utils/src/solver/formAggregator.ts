/**
 * Logbook Conversion - Form Aggregator
 *
 * Folds classified flights into the summary form's buckets. All sums are kept
 * in integer hundredths of an hour, so folding is associative and commutative
 * and any permutation of the same flights finalizes to identical values.
 * Half credit for SIC is applied once, in finalizeForm.
 */

import {
  AIRCRAFT_GROUPS,
  AircraftGroup,
  AircraftGroupResult,
  ClassifiedFlight,
  DatedFlightEntry,
  DayNightBuckets,
  FormAccumulator,
  FormValues,
  GroupTotals,
  LongestSoloCrossCountry,
  RoleBuckets,
  SoloCrossCountryCandidate,
  Table2Row,
  TypeBuckets,
  TypeRow
} from '../types';
import { nauticalMilesToKm } from '../geo/airportDistance';

const ALL_GROUPS: readonly AircraftGroupResult[] = [...AIRCRAFT_GROUPS, 'UNRESOLVED'];

function cents(hours: number): number {
  return Math.round(hours * 100);
}

function hours(value: number): number {
  return value / 100;
}

// ============================================================================
// ACCUMULATOR
// ============================================================================

function emptyRoles(): RoleBuckets {
  return { pic: 0, pic_xc: 0, sic: 0, student: 0 };
}

function emptyDayNight(): DayNightBuckets {
  return { day: emptyRoles(), night: emptyRoles() };
}

// Rows of one type can resolve to different groups (Class / Engine Type per row)
function typeBucketKey(aircraftType: string, group: AircraftGroupResult): string {
  return `${aircraftType}|${group}`;
}

function emptyTypeBuckets(aircraftType: string, group: AircraftGroupResult): TypeBuckets {
  return {
    aircraft_type: aircraftType,
    group,
    flights: 0,
    instrument_actual: 0,
    instrument_simulated: 0,
    ...emptyDayNight()
  };
}

export function createAccumulator(): FormAccumulator {
  return {
    groups: {
      A: emptyDayNight(),
      B: emptyDayNight(),
      C: emptyDayNight(),
      D: emptyDayNight(),
      UNRESOLVED: emptyDayNight()
    },
    types: new Map(),
    device_by_type: new Map(),
    device_total: 0,
    device_sessions: 0,
    flights: 0,
    day_landings: 0,
    night_landings: 0,
    instrument_actual: 0,
    instrument_simulated: 0,
    dual_instrument: 0,
    cross_country_all_roles: 0,
    complex_or_multi_engine: 0,
    solo: 0,
    safety_pilot_excluded: 0,
    unresolved_types: new Map(),
    longest_solo_xc: null,
    instrument_instruction_flights: [],
    night_pic_flights: [],
    complex_flights: [],
    advisories: []
  };
}

function addRoles(target: RoleBuckets, source: RoleBuckets): void {
  target.pic += source.pic;
  target.pic_xc += source.pic_xc;
  target.sic += source.sic;
  target.student += source.student;
}

function addDayNight(target: DayNightBuckets, source: DayNightBuckets): void {
  addRoles(target.day, source.day);
  addRoles(target.night, source.night);
}

function addToMap(map: Map<string, number>, key: string, value: number): void {
  map.set(key, (map.get(key) ?? 0) + value);
}

/**
 * Longest solo cross-country ordering: distance, then duration, then the
 * earlier date, then the earlier row. An unknown distance ranks lowest.
 */
function isLongerSoloCrossCountry(
  candidate: SoloCrossCountryCandidate,
  current: SoloCrossCountryCandidate | null
): boolean {
  if (current === null) return true;

  const a = candidate.distance_nm ?? -1;
  const b = current.distance_nm ?? -1;
  if (a !== b) return a > b;
  if (candidate.duration !== current.duration) return candidate.duration > current.duration;
  if (candidate.date !== current.date) return candidate.date < current.date;
  return candidate.row_number < current.row_number;
}

function flightBuckets(flight: ClassifiedFlight): DayNightBuckets {
  const nightXc = cents(flight.pic_cross_country_night);
  return {
    day: {
      pic: cents(flight.day.pic),
      pic_xc: cents(flight.pic_cross_country) - nightXc,
      sic: cents(flight.day.sic),
      student: cents(flight.day.student)
    },
    night: {
      pic: cents(flight.night.pic),
      pic_xc: nightXc,
      sic: cents(flight.night.sic),
      student: cents(flight.night.student)
    }
  };
}

// ============================================================================
// FOLD
// ============================================================================

/** Adds one classified flight to the accumulator. The flight is not modified. */
export function foldFlight(acc: FormAccumulator, flight: ClassifiedFlight): FormAccumulator {
  const { record } = flight;
  acc.advisories.push(...flight.advisories);

  if (flight.flags.is_simulator_device) {
    const baseType = flight.device_base_type ?? flight.aircraft.normalized_type;
    const deviceHours = cents(flight.device_hours);
    acc.device_total += deviceHours;
    acc.device_sessions += 1;
    addToMap(acc.device_by_type, baseType, deviceHours);
    return acc;
  }

  const credited = cents(flight.roles.pic + flight.roles.sic + flight.roles.student);
  const buckets = flightBuckets(flight);

  acc.flights += 1;
  acc.day_landings += record.day_landings;
  acc.night_landings += record.night_landings;
  addDayNight(acc.groups[flight.group], buckets);

  const typeKey = flight.aircraft.normalized_type;
  const bucketKey = typeBucketKey(typeKey, flight.group);
  const typeRow = acc.types.get(bucketKey) ?? emptyTypeBuckets(typeKey, flight.group);
  addDayNight(typeRow, buckets);
  typeRow.flights += 1;
  typeRow.instrument_actual += cents(flight.instrument.actual);
  typeRow.instrument_simulated += cents(flight.instrument.simulated);
  acc.types.set(bucketKey, typeRow);

  acc.instrument_actual += cents(flight.instrument.actual);
  acc.instrument_simulated += cents(flight.instrument.simulated);
  acc.dual_instrument += cents(flight.instrument.student);
  acc.safety_pilot_excluded += cents(flight.roles.safety_pilot_excluded);

  if (flight.flags.is_cross_country) {
    acc.cross_country_all_roles += credited;
  }
  if (flight.flags.is_complex && credited > 0) {
    acc.complex_or_multi_engine += credited;
    acc.complex_flights.push({ row_number: record.row_number, date: record.date, hours: credited });
  }
  if (flight.group === 'UNRESOLVED') {
    addToMap(acc.unresolved_types, typeKey, credited);
  }

  if (flight.flags.is_solo) {
    acc.solo += cents(flight.roles.pic);
    if (flight.flags.is_cross_country && flight.roles.pic > 0) {
      const candidate: SoloCrossCountryCandidate = {
        row_number: record.row_number,
        date: record.date,
        from: record.from,
        to: record.to,
        distance_nm: flight.distance_nm,
        duration: cents(flight.roles.pic)
      };
      if (isLongerSoloCrossCountry(candidate, acc.longest_solo_xc)) {
        acc.longest_solo_xc = candidate;
      }
    }
  }

  if (flight.roles.student > 0 && flight.instrument.student > 0) {
    acc.instrument_instruction_flights.push({
      row_number: record.row_number,
      date: record.date,
      hours: cents(flight.instrument.student)
    });
  }
  if (flight.night.pic > 0) {
    acc.night_pic_flights.push({ row_number: record.row_number, date: record.date, hours: cents(flight.night.pic) });
  }

  return acc;
}

export function foldFlights(flights: readonly ClassifiedFlight[], acc = createAccumulator()): FormAccumulator {
  return flights.reduce(foldFlight, acc);
}

/** Combines two partial accumulators into a new one; neither input changes. */
export function mergeAccumulators(a: FormAccumulator, b: FormAccumulator): FormAccumulator {
  const merged = createAccumulator();

  for (const source of [a, b]) {
    for (const group of ALL_GROUPS) {
      addDayNight(merged.groups[group], source.groups[group]);
    }
    for (const [key, row] of source.types) {
      const target = merged.types.get(key) ?? emptyTypeBuckets(row.aircraft_type, row.group);
      addDayNight(target, row);
      target.flights += row.flights;
      target.instrument_actual += row.instrument_actual;
      target.instrument_simulated += row.instrument_simulated;
      merged.types.set(key, target);
    }
    for (const [key, value] of source.device_by_type) addToMap(merged.device_by_type, key, value);
    for (const [key, value] of source.unresolved_types) addToMap(merged.unresolved_types, key, value);

    merged.device_total += source.device_total;
    merged.device_sessions += source.device_sessions;
    merged.flights += source.flights;
    merged.day_landings += source.day_landings;
    merged.night_landings += source.night_landings;
    merged.instrument_actual += source.instrument_actual;
    merged.instrument_simulated += source.instrument_simulated;
    merged.dual_instrument += source.dual_instrument;
    merged.cross_country_all_roles += source.cross_country_all_roles;
    merged.complex_or_multi_engine += source.complex_or_multi_engine;
    merged.solo += source.solo;
    merged.safety_pilot_excluded += source.safety_pilot_excluded;

    if (source.longest_solo_xc && isLongerSoloCrossCountry(source.longest_solo_xc, merged.longest_solo_xc)) {
      merged.longest_solo_xc = { ...source.longest_solo_xc };
    }
    merged.instrument_instruction_flights.push(...source.instrument_instruction_flights.map(e => ({ ...e })));
    merged.night_pic_flights.push(...source.night_pic_flights.map(e => ({ ...e })));
    merged.complex_flights.push(...source.complex_flights.map(e => ({ ...e })));
    merged.advisories.push(...source.advisories);
  }

  return merged;
}

// ============================================================================
// FINALIZE
// ============================================================================

function groupTotals(buckets: DayNightBuckets): GroupTotals {
  const { day, night } = buckets;
  const pic = day.pic + night.pic;
  const sic = day.sic + night.sic;
  const student = day.student + night.student;
  return {
    pic: hours(pic),
    pic_xc: hours(day.pic_xc + night.pic_xc),
    sic: hours(sic),
    student: hours(student),
    night_pic: hours(night.pic),
    night_pic_xc: hours(night.pic_xc),
    night_sic: hours(night.sic),
    night_student: hours(night.student),
    total: hours(pic + sic + student)
  };
}

function byDateThenRow(a: DatedFlightEntry, b: DatedFlightEntry): number {
  if (a.date !== b.date) return a.date < b.date ? -1 : 1;
  return a.row_number - b.row_number;
}

function datedList(entries: readonly DatedFlightEntry[]): DatedFlightEntry[] {
  return [...entries]
    .sort(byDateThenRow)
    .map(e => ({ row_number: e.row_number, date: e.date, hours: hours(e.hours) }));
}

function compareByType(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function compareGroups(a: AircraftGroupResult, b: AircraftGroupResult): number {
  return ALL_GROUPS.indexOf(a) - ALL_GROUPS.indexOf(b);
}

function typeRows(acc: FormAccumulator): TypeRow[] {
  const rows: TypeRow[] = [];
  for (const bucket of acc.types.values()) {
    const { day, night } = bucket;
    rows.push({
      aircraft_type: bucket.aircraft_type,
      group: bucket.group,
      flights: bucket.flights,
      form_total: hours(day.pic + day.sic + day.student + night.pic + night.sic + night.student),
      day_pic: hours(day.pic),
      day_pic_xc: hours(day.pic_xc),
      day_sic: hours(day.sic),
      day_student: hours(day.student),
      night_pic: hours(night.pic),
      night_pic_xc: hours(night.pic_xc),
      night_sic: hours(night.sic),
      night_student: hours(night.student),
      instrument_actual: hours(bucket.instrument_actual),
      instrument_simulated: hours(bucket.instrument_simulated),
      device_hours: 0
    });
  }
  rows.sort(
    (a, b) =>
      b.form_total - a.form_total ||
      compareByType(a.aircraft_type, b.aircraft_type) ||
      compareGroups(a.group, b.group)
  );

  // Device time goes on one row per type, a resolved one where there is one.
  const withDevice = new Set<string>();
  const resolvedFirst = [
    ...rows.filter(r => r.group !== 'UNRESOLVED'),
    ...rows.filter(r => r.group === 'UNRESOLVED')
  ];
  for (const row of resolvedFirst) {
    if (withDevice.has(row.aircraft_type)) continue;
    withDevice.add(row.aircraft_type);
    row.device_hours = hours(acc.device_by_type.get(row.aircraft_type) ?? 0);
  }
  return rows;
}

function table2Rows(acc: FormAccumulator): Table2Row[] {
  const rows = new Map<string, { actual: number; simulated: number; device: number }>();
  for (const bucket of acc.types.values()) {
    const row = rows.get(bucket.aircraft_type) ?? { actual: 0, simulated: 0, device: 0 };
    row.actual += bucket.instrument_actual;
    row.simulated += bucket.instrument_simulated;
    rows.set(bucket.aircraft_type, row);
  }
  for (const [type, device] of acc.device_by_type) {
    const row = rows.get(type) ?? { actual: 0, simulated: 0, device: 0 };
    row.device += device;
    rows.set(type, row);
  }

  return [...rows.entries()]
    .filter(([, r]) => r.actual + r.simulated + r.device > 0)
    .map(([type, r]) => ({
      total: r.actual + r.simulated + r.device,
      row: {
        aircraft_type: type,
        instrument_actual: hours(r.actual),
        instrument_simulated: hours(r.simulated),
        device_hours: hours(r.device)
      }
    }))
    .sort((a, b) => b.total - a.total || compareByType(a.row.aircraft_type, b.row.aircraft_type))
    .map(entry => entry.row);
}

function longestSolo(candidate: SoloCrossCountryCandidate | null): LongestSoloCrossCountry | null {
  if (!candidate) return null;
  return {
    date: candidate.date,
    route: `${candidate.from}-${candidate.to}`,
    duration: hours(candidate.duration),
    distance_nm: candidate.distance_nm,
    distance_km: candidate.distance_nm === null ? null : nauticalMilesToKm(candidate.distance_nm)
  };
}

/**
 * Produces the form values. Reads the accumulator only; calling it again on
 * the same state yields equal values.
 */
export function finalizeForm(acc: FormAccumulator): FormValues {
  const groups: Record<AircraftGroup, GroupTotals> = {
    A: groupTotals(acc.groups.A),
    B: groupTotals(acc.groups.B),
    C: groupTotals(acc.groups.C),
    D: groupTotals(acc.groups.D)
  };

  // Table 1 grand totals: resolved groups only
  let picCents = 0;
  let sicCents = 0;
  let studentCents = 0;
  for (const group of AIRCRAFT_GROUPS) {
    const { day, night } = acc.groups[group];
    picCents += day.pic + night.pic;
    sicCents += day.sic + night.sic;
    studentCents += day.student + night.student;
  }

  // Experience figures below count every aircraft flight, resolved group or not.
  const all = emptyDayNight();
  for (const group of ALL_GROUPS) addDayNight(all, acc.groups[group]);

  const pic = hours(picCents);
  const sic = hours(sicCents);
  const student = hours(studentCents);

  const unresolved = [...acc.unresolved_types.entries()]
    .map(([aircraft_type, value]) => ({ aircraft_type, hours: hours(value) }))
    .sort((a, b) => b.hours - a.hours || compareByType(a.aircraft_type, b.aircraft_type));

  const advisories = [...acc.advisories].sort(
    (a, b) =>
      a.row_number - b.row_number || compareByType(a.code, b.code) || compareByType(a.message, b.message)
  );

  const deviceByType = [...acc.device_by_type.entries()]
    .map(([aircraft_type, value]) => ({ aircraft_type, hours: hours(value) }))
    .sort((a, b) => b.hours - a.hours || compareByType(a.aircraft_type, b.aircraft_type));

  return {
    table1: {
      groups,
      unresolved: groupTotals(acc.groups.UNRESOLVED),
      types: typeRows(acc)
    },
    table2: {
      rows: table2Rows(acc),
      device_total: hours(acc.device_total),
      device_by_type: deviceByType
    },
    totals: {
      pic,
      sic,
      student,
      sic_half_credit: sic / 2,
      form_total: hours(picCents + sicCents + studentCents),
      overall_total: pic + sic / 2 + student,
      safety_pilot_excluded: hours(acc.safety_pilot_excluded)
    },
    cpl: {
      pic_cross_country: hours(all.day.pic_xc + all.night.pic_xc),
      dual_received: hours(all.day.student + all.night.student),
      dual_instrument: hours(acc.dual_instrument),
      night_landings: acc.night_landings,
      night_hours: hours(all.night.pic + all.night.sic + all.night.student),
      longest_solo_cross_country: longestSolo(acc.longest_solo_xc),
      complex_or_multi_engine: hours(acc.complex_or_multi_engine),
      instrument_instruction_flights: datedList(acc.instrument_instruction_flights),
      night_pic_flights: datedList(acc.night_pic_flights),
      complex_flights: datedList(acc.complex_flights)
    },
    atpl: {
      cross_country_all_roles: hours(acc.cross_country_all_roles),
      night_pic_cross_country: hours(all.night.pic_xc),
      instrument_total: hours(acc.instrument_actual + acc.instrument_simulated)
    },
    report: {
      flights_counted: acc.flights,
      device_sessions: acc.device_sessions,
      day_landings: acc.day_landings,
      unresolved_aircraft_types: unresolved,
      advisories
    }
  };
}
