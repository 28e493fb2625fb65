/**
 * Logbook Conversion - Classification Engine
 *
 * Applies the regulation's role rules to one FlightRecord. The rules run as
 * an ordered list of steps over a draft; a later step may override what an
 * earlier one assigned:
 *
 *   1. safety pilot        6. actual instrument
 *   2. student             7. simulated instrument
 *   3. PIC                 8. training device
 *   4. SIC                 9. complex aircraft
 *   5. cross-country      10. clamp + day/night split
 *
 * Classification never throws on a valid record; inconsistencies are clamped
 * and reported as advisories on the flight.
 */

import {
  AdvisoryCode,
  AircraftGroupLookup,
  AircraftGroupResult,
  AircraftProfile,
  ClassificationAdvisory,
  ClassificationOptions,
  ClassifiedFlight,
  CrossCountryStatus,
  FlightRecord,
  InstrumentCredits,
  RoleCategory,
  RoleCredits,
  RoleSplit
} from '../types';
import { deviceBaseType, isTrainingDevice, resolveAircraftProfile } from './aircraftGroups';

export const DEFAULT_CROSS_COUNTRY_THRESHOLD_NM = 27;

const SAFETY_PILOT_MARKER = 'safety pilot';

// ============================================================================
// DRAFT
// ============================================================================

interface ClassificationDraft {
  readonly record: FlightRecord;
  readonly aircraft: AircraftProfile;
  readonly group: AircraftGroupResult;
  readonly distance_nm: number | null;
  readonly threshold_nm: number;
  readonly device_session: boolean;
  safety_pilot: boolean;
  student: boolean;
  roles: RoleCredits;
  pic_cross_country: number;
  pic_cross_country_night: number;
  cross_country_status: CrossCountryStatus;
  instrument: InstrumentCredits;
  device_hours: number;
  device_base_type: string | null;
  is_complex: boolean;
  day: RoleSplit;
  night: RoleSplit;
  advisories: ClassificationAdvisory[];
}

type ClassificationStep = (draft: ClassificationDraft) => ClassificationDraft;

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function isSingleEngine(group: AircraftGroupResult): boolean {
  return group === 'A' || group === 'D';
}

function isMultiEngine(group: AircraftGroupResult): boolean {
  return group === 'B' || group === 'C';
}

function isSinglePilot(draft: ClassificationDraft): boolean {
  return draft.record.durations.MultiPilot === 0 && !draft.aircraft.multi_pilot;
}

function advise(draft: ClassificationDraft, code: AdvisoryCode, message: string): void {
  draft.advisories.push({ code, row_number: draft.record.row_number, message, severity: 'warning' });
}

function emptySplit(): RoleSplit {
  return { student: 0, pic: 0, sic: 0 };
}

// ============================================================================
// STEPS
// ============================================================================

/** Rule 1: safety pilot on a single-engine aircraft logs no creditable time. */
export const applySafetyPilot: ClassificationStep = draft => {
  const { remarks, durations } = draft.record;
  if (!remarks.toLowerCase().includes(SAFETY_PILOT_MARKER) || !isSingleEngine(draft.group)) {
    return draft;
  }

  const logged = round2(durations.PIC + durations.SIC);
  draft.safety_pilot = true;
  draft.roles.safety_pilot_excluded = logged > 0 ? logged : durations.TotalTime;
  return draft;
};

/** Rule 2: an instructor or dual received makes the whole flight Student time. */
export const applyStudent: ClassificationStep = draft => {
  const { instructor, durations } = draft.record;
  if (instructor === '' && durations.DualReceived <= 0) return draft;

  draft.student = true;
  draft.safety_pilot = false;
  draft.roles = { student: durations.TotalTime, pic: 0, sic: 0, safety_pilot_excluded: 0 };
  return draft;
};

/** Rule 3: PIC, with SIC folded in on single-engine aircraft. */
export const applyPilotInCommand: ClassificationStep = draft => {
  if (draft.student || draft.safety_pilot) return draft;
  const { PIC, SIC, Solo } = draft.record.durations;

  let pic = PIC === 0 && Solo > 0 ? Solo : PIC;
  if (isSingleEngine(draft.group) && SIC > 0) {
    pic = round2(pic + SIC);
  }
  draft.roles.pic = pic;
  return draft;
};

/** Rule 4: SIC as logged on multi-engine aircraft (and types of unknown group). */
export const applySecondInCommand: ClassificationStep = draft => {
  if (draft.student || draft.safety_pilot || isSingleEngine(draft.group)) return draft;
  draft.roles.sic = draft.record.durations.SIC;
  return draft;
};

/** Rule 5: cross-country status and PIC-XC credit. */
export const applyCrossCountry: ClassificationStep = draft => {
  const { durations, from, to } = draft.record;
  const distance = draft.distance_nm;

  if (durations.CrossCountry > 0 || (distance !== null && distance > draft.threshold_nm)) {
    draft.cross_country_status = 'yes';
  } else if (distance !== null) {
    draft.cross_country_status = 'no';
  } else {
    draft.cross_country_status = 'unknown';
    if (!draft.device_session && from.toUpperCase() !== to.toUpperCase()) {
      advise(
        draft,
        'ADV_CROSS_COUNTRY_UNKNOWN',
        `Row ${draft.record.row_number}: no distance for ${from}-${to}; cross-country status unknown`
      );
    }
  }

  if (draft.student || draft.safety_pilot || draft.roles.pic <= 0) return draft;

  if (durations.CrossCountry > 0) {
    draft.pic_cross_country = Math.min(draft.roles.pic, durations.CrossCountry);
  } else if (draft.cross_country_status === 'yes') {
    draft.pic_cross_country = draft.roles.pic;
  }
  return draft;
};

/** Rule 6: actual instrument, PIC-qualifying only when single-pilot and not under instruction. */
export const applyActualInstrument: ClassificationStep = draft => {
  const actual = draft.record.durations.ActualInstrument;
  draft.instrument.actual = actual;
  if (actual <= 0) return draft;

  if (draft.student) {
    draft.instrument.student = round2(draft.instrument.student + actual);
  } else if (draft.safety_pilot) {
    return draft;
  } else if (isSinglePilot(draft) && draft.roles.pic > 0) {
    draft.instrument.pic_qualifying = round2(draft.instrument.pic_qualifying + actual);
  } else if (draft.roles.sic > 0) {
    draft.instrument.sic = round2(draft.instrument.sic + actual);
  }
  return draft;
};

/** Rule 7: simulated instrument follows the role the flight already carries. */
export const applySimulatedInstrument: ClassificationStep = draft => {
  const simulated = draft.record.durations.SimulatedInstrument;
  draft.instrument.simulated = simulated;
  if (simulated <= 0) return draft;

  if (draft.student) {
    draft.instrument.student = round2(draft.instrument.student + simulated);
  } else if (draft.roles.pic > 0) {
    draft.instrument.pic_qualifying = round2(draft.instrument.pic_qualifying + simulated);
  } else if (draft.roles.sic > 0) {
    draft.instrument.sic = round2(draft.instrument.sic + simulated);
  }
  return draft;
};

/** Rule 8: training-device sessions leave every role and move to the device column. */
export const applyTrainingDevice: ClassificationStep = draft => {
  const { Simulator, TotalTime } = draft.record.durations;

  if (!draft.device_session) {
    if (Simulator > 0) {
      advise(
        draft,
        'ADV_SIMULATOR_TIME_ON_FLIGHT',
        `Row ${draft.record.row_number}: simulator time ${Simulator} logged on an aircraft flight; ignored`
      );
    }
    return draft;
  }

  draft.device_hours = Simulator > 0 ? Simulator : TotalTime;
  draft.device_base_type = deviceBaseType(draft.record.aircraft_type);
  draft.student = false;
  draft.safety_pilot = false;
  draft.roles = { student: 0, pic: 0, sic: 0, safety_pilot_excluded: 0 };
  draft.pic_cross_country = 0;
  draft.instrument = { actual: 0, simulated: 0, pic_qualifying: 0, student: 0, sic: 0 };
  return draft;
};

/** Rule 9: retractable gear with a variable-pitch propeller, or any multi-engine group. */
export const applyComplexAircraft: ClassificationStep = draft => {
  if (draft.device_session) return draft;
  const { retractable_gear, variable_pitch } = draft.aircraft;
  draft.is_complex = (retractable_gear && variable_pitch) || isMultiEngine(draft.group);
  return draft;
};

/** Keeps every credit non-negative and the role sum within TotalTime. */
export const applyCreditClamp: ClassificationStep = draft => {
  const roles = draft.roles;
  const row = draft.record.row_number;

  for (const key of ['student', 'pic', 'sic', 'safety_pilot_excluded'] as const) {
    if (roles[key] < 0) {
      advise(draft, 'ADV_NEGATIVE_CREDIT_CLAMPED', `Row ${row}: negative ${key} credit clamped to 0`);
      roles[key] = 0;
    }
  }

  const total = draft.record.durations.TotalTime;
  let excess = round2(roles.student + roles.pic + roles.sic + roles.safety_pilot_excluded - total);
  if (excess > 0) {
    advise(
      draft,
      'ADV_ROLE_SUM_EXCEEDS_TOTAL',
      `Row ${row}: credited roles exceed total time ${total} by ${excess}; reduced`
    );
    for (const key of ['sic', 'pic', 'student', 'safety_pilot_excluded'] as const) {
      if (excess <= 0) break;
      const cut = Math.min(roles[key], excess);
      roles[key] = round2(roles[key] - cut);
      excess = round2(excess - cut);
    }
  }

  draft.pic_cross_country = Math.min(draft.pic_cross_country, roles.pic);
  draft.instrument.pic_qualifying = Math.min(draft.instrument.pic_qualifying, roles.pic);
  draft.instrument.student = Math.min(draft.instrument.student, roles.student);
  draft.instrument.sic = Math.min(draft.instrument.sic, roles.sic);
  return draft;
};

/** Rule 10: night hours as a proportional breakdown of each credited role. */
export const applyNightSplit: ClassificationStep = draft => {
  const total = draft.record.durations.TotalTime;
  const night = Math.min(draft.record.durations.Night, total);
  const fraction = total > 0 ? night / total : 0;

  const split = (hours: number): [number, number] => {
    const nightPart = round2(hours * fraction);
    return [round2(hours - nightPart), nightPart];
  };

  const [dayPic, nightPic] = split(draft.roles.pic);
  const [daySic, nightSic] = split(draft.roles.sic);
  const [dayStudent, nightStudent] = split(draft.roles.student);
  const [, nightXc] = split(draft.pic_cross_country);

  draft.day = { student: dayStudent, pic: dayPic, sic: daySic };
  draft.night = { student: nightStudent, pic: nightPic, sic: nightSic };
  draft.pic_cross_country_night = nightXc;
  return draft;
};

export const CLASSIFICATION_STEPS: readonly ClassificationStep[] = [
  applySafetyPilot,
  applyStudent,
  applyPilotInCommand,
  applySecondInCommand,
  applyCrossCountry,
  applyActualInstrument,
  applySimulatedInstrument,
  applyTrainingDevice,
  applyComplexAircraft,
  applyCreditClamp,
  applyNightSplit
];

// ============================================================================
// ENTRY POINT
// ============================================================================

export function isDeviceSession(record: FlightRecord): boolean {
  const { Simulator, TotalTime } = record.durations;
  return (Simulator > 0 && TotalTime === 0) || isTrainingDevice(record.aircraft_type, record.registration);
}

function createDraft(
  record: FlightRecord,
  aircraftGroupOf: AircraftGroupLookup,
  options: ClassificationOptions
): ClassificationDraft {
  const deviceSession = isDeviceSession(record);
  const metadata = { engine_type: record.engine_type, aircraft_class: record.aircraft_class };
  const aircraft = aircraftGroupOf(
    deviceSession ? deviceBaseType(record.aircraft_type) : record.aircraft_type,
    metadata
  );
  const distance = record.distance_nm ?? options.distanceOf?.(record.from, record.to) ?? null;

  return {
    record,
    aircraft,
    group: aircraft.group,
    distance_nm: distance,
    threshold_nm: options.crossCountryThresholdNm ?? DEFAULT_CROSS_COUNTRY_THRESHOLD_NM,
    device_session: deviceSession,
    safety_pilot: false,
    student: false,
    roles: { student: 0, pic: 0, sic: 0, safety_pilot_excluded: 0 },
    pic_cross_country: 0,
    pic_cross_country_night: 0,
    cross_country_status: 'unknown',
    instrument: { actual: 0, simulated: 0, pic_qualifying: 0, student: 0, sic: 0 },
    device_hours: 0,
    device_base_type: null,
    is_complex: false,
    day: emptySplit(),
    night: emptySplit(),
    advisories: []
  };
}

export function classifyFlight(
  record: FlightRecord,
  aircraftGroupOf: AircraftGroupLookup = resolveAircraftProfile,
  options: ClassificationOptions = {}
): ClassifiedFlight {
  const draft = CLASSIFICATION_STEPS.reduce(
    (current, step) => step(current),
    createDraft(record, aircraftGroupOf, options)
  );

  const { durations } = record;
  const flight: ClassifiedFlight = {
    record,
    aircraft: Object.freeze({ ...draft.aircraft }),
    group: draft.group,
    roles: Object.freeze({ ...draft.roles }),
    day: Object.freeze({ ...draft.day }),
    night: Object.freeze({ ...draft.night }),
    pic_cross_country: draft.pic_cross_country,
    pic_cross_country_night: draft.pic_cross_country_night,
    instrument: Object.freeze({ ...draft.instrument }),
    device_hours: draft.device_hours,
    device_base_type: draft.device_base_type,
    distance_nm: draft.distance_nm,
    flags: Object.freeze({
      is_night: !draft.device_session && durations.Night > 0,
      is_cross_country: draft.cross_country_status === 'yes',
      cross_country_status: draft.cross_country_status,
      is_complex: draft.is_complex,
      instrument_actual: draft.instrument.actual > 0,
      instrument_simulated: draft.instrument.simulated > 0,
      is_simulator_device: draft.device_session,
      is_solo: !draft.student && !draft.device_session && durations.Solo > 0,
      is_single_pilot: isSinglePilot(draft)
    }),
    advisories: Object.freeze([...draft.advisories])
  };

  return Object.freeze(flight);
}

/** Role the flight mainly credits, for listings. */
export function primaryRole(flight: ClassifiedFlight): RoleCategory | 'Device' | 'None' {
  if (flight.flags.is_simulator_device) return 'Device';
  if (flight.roles.safety_pilot_excluded > 0) return 'SafetyPilotExcluded';
  if (flight.roles.student > 0) return 'Student';
  if (flight.roles.pic > 0) return 'PIC';
  if (flight.roles.sic > 0) return 'SIC';
  return 'None';
}
