/**
 * Logbook Conversion - Record and Classification Types
 *
 * Canonical fields, column mappings, normalized flight records and the
 * classified flights produced from them.
 */

// ============================================================================
// CANONICAL FIELDS
// ============================================================================

export const CANONICAL_FIELDS = [
  'Date',
  'From',
  'To',
  'Registration',
  'AircraftType',
  'TotalTime',
  'PIC',
  'SIC',
  'Night',
  'CrossCountry',
  'ActualInstrument',
  'SimulatedInstrument',
  'DualReceived',
  'DualGiven',
  'Solo',
  'MultiPilot',
  'Simulator',
  'DayLandings',
  'NightLandings',
  'Instructor',
  'Remarks',
  'EngineType',
  'Class',
  'Distance'
] as const;

export type CanonicalField = typeof CANONICAL_FIELDS[number];

export const DURATION_FIELDS = [
  'TotalTime',
  'PIC',
  'SIC',
  'Night',
  'CrossCountry',
  'ActualInstrument',
  'SimulatedInstrument',
  'DualReceived',
  'DualGiven',
  'Solo',
  'MultiPilot',
  'Simulator'
] as const satisfies readonly CanonicalField[];

export type DurationField = typeof DURATION_FIELDS[number];

export const COUNT_FIELDS = ['DayLandings', 'NightLandings'] as const satisfies readonly CanonicalField[];

export type CountField = typeof COUNT_FIELDS[number];

export const REQUIRED_FIELDS = [
  'Date',
  'From',
  'To',
  'Registration',
  'AircraftType',
  'TotalTime'
] as const satisfies readonly CanonicalField[];

export const RECOMMENDED_FIELDS = [
  'PIC',
  'SIC',
  'Night',
  'CrossCountry',
  'ActualInstrument',
  'SimulatedInstrument',
  'DualReceived',
  'Solo',
  'NightLandings',
  'Instructor',
  'Remarks',
  'EngineType',
  'Class',
  'Distance'
] as const satisfies readonly CanonicalField[];

export const FIELD_DISPLAY_NAMES: Record<CanonicalField, string> = {
  Date: 'Date',
  From: 'From Airport',
  To: 'To Airport',
  Registration: 'Registration',
  AircraftType: 'Aircraft Type',
  TotalTime: 'Total Time',
  PIC: 'PIC',
  SIC: 'SIC',
  Night: 'Night',
  CrossCountry: 'Cross Country',
  ActualInstrument: 'Actual Instrument',
  SimulatedInstrument: 'Simulated Instrument',
  DualReceived: 'Dual Received',
  DualGiven: 'Dual Given',
  Solo: 'Solo',
  MultiPilot: 'Multi-Pilot',
  Simulator: 'Simulator',
  DayLandings: 'Day Landings',
  NightLandings: 'Night Landings',
  Instructor: 'Instructor',
  Remarks: 'Remarks',
  EngineType: 'Engine Type',
  Class: 'Class',
  Distance: 'Distance (NM)'
};

export function isCanonicalField(value: string): value is CanonicalField {
  return CANONICAL_FIELDS.some(field => field === value);
}

// ============================================================================
// SOURCE DATA & COLUMN MAPPING
// ============================================================================

/** Column locator: a header name or a 0-based column index. */
export type ColumnLocator = string | number;

export type ExplicitColumnMapping = Partial<Record<CanonicalField, ColumnLocator>>;

/** Resolved mapping: canonical field -> 0-based source column index. */
export type ColumnMapping = Partial<Record<CanonicalField, number>>;

export type MappingSource = 'explicit' | 'alias' | 'heuristic';

export type RawRow = readonly string[];

export interface LogbookSource {
  headers: string[];
  rows: RawRow[];
  /** Source line of each row (header = line 1). Defaults to index + 2. */
  row_numbers?: number[];
}

export type IssueSeverity = 'error' | 'warning';

export type MappingIssueCode =
  | 'ERR_REQUIRED_COLUMN_MISSING'
  | 'WARN_RECOMMENDED_COLUMN_MISSING'
  | 'WARN_EXPLICIT_COLUMN_NOT_FOUND'
  | 'WARN_UNKNOWN_MAPPING_KEY';

export interface MappingIssue {
  code: MappingIssueCode;
  field?: string;
  message: string;
  severity: IssueSeverity;
}

export interface ResolvedColumn {
  field: CanonicalField;
  column_index: number;
  header: string;
  source: MappingSource;
}

export interface ColumnResolution {
  mapping: ColumnMapping;
  columns: ResolvedColumn[];
  unresolved_required: CanonicalField[];
  missing_recommended: CanonicalField[];
  unmapped_headers: string[];
  issues: MappingIssue[];
}

// ============================================================================
// NORMALIZED FLIGHT RECORD
// ============================================================================

export type FlightDurations = Readonly<Record<DurationField, number>>;

export interface FlightRecord {
  readonly row_number: number;
  readonly date: string; // YYYY-MM-DD
  readonly from: string;
  readonly to: string;
  readonly registration: string;
  readonly aircraft_type: string;
  readonly engine_type: string;
  readonly aircraft_class: string;
  readonly durations: FlightDurations;
  readonly day_landings: number;
  readonly night_landings: number;
  readonly instructor: string;
  readonly remarks: string;
  readonly distance_nm: number | null;
}

export type NormalizationErrorCode =
  | 'ERR_INVALID_DURATION'
  | 'ERR_INVALID_DATE'
  | 'ERR_INVALID_COUNT'
  | 'ERR_INVALID_DISTANCE'
  | 'ERR_MISSING_FIELD';

export interface NormalizationError {
  code: NormalizationErrorCode;
  row_number: number;
  field: CanonicalField;
  value: string;
  message: string;
  severity: 'error';
}

export type NormalizeOutcome =
  | { ok: true; record: FlightRecord }
  | { ok: false; errors: NormalizationError[] };

// ============================================================================
// AIRCRAFT GROUPS
// ============================================================================

/**
 * A: single-engine piston, B: multi-engine piston,
 * C: multi-engine jet/turboprop, D: single-engine turboprop.
 */
export type AircraftGroup = 'A' | 'B' | 'C' | 'D';

export const AIRCRAFT_GROUPS: readonly AircraftGroup[] = ['A', 'B', 'C', 'D'];

export type AircraftGroupResult = AircraftGroup | 'UNRESOLVED';

export type Powerplant = 'piston' | 'turbine';

export interface AircraftProfile {
  aircraft_type: string;
  normalized_type: string;
  group: AircraftGroupResult;
  engines: number | null;
  powerplant: Powerplant | null;
  retractable_gear: boolean;
  variable_pitch: boolean;
  multi_pilot: boolean;
  source: 'table' | 'metadata' | 'unresolved';
}

export interface AircraftMetadata {
  engine_type?: string;
  aircraft_class?: string;
}

export type AircraftGroupLookup = (aircraftType: string, metadata?: AircraftMetadata) => AircraftProfile;

export type DistanceLookup = (from: string, to: string) => number | null;

// ============================================================================
// CLASSIFIED FLIGHT
// ============================================================================

export type RoleCategory = 'Student' | 'PIC' | 'SIC' | 'SafetyPilotExcluded';

export interface RoleCredits {
  student: number;
  pic: number;
  sic: number;
  safety_pilot_excluded: number;
}

/** Day or night share of the credited (non-excluded) roles. */
export interface RoleSplit {
  student: number;
  pic: number;
  sic: number;
}

export type CrossCountryStatus = 'yes' | 'no' | 'unknown';

export interface FlightFlags {
  is_night: boolean;
  is_cross_country: boolean;
  cross_country_status: CrossCountryStatus;
  is_complex: boolean;
  instrument_actual: boolean;
  instrument_simulated: boolean;
  is_simulator_device: boolean;
  is_solo: boolean;
  is_single_pilot: boolean;
}

export interface InstrumentCredits {
  actual: number;
  simulated: number;
  pic_qualifying: number;
  student: number;
  sic: number;
}

export type AdvisoryCode =
  | 'ADV_NEGATIVE_CREDIT_CLAMPED'
  | 'ADV_ROLE_SUM_EXCEEDS_TOTAL'
  | 'ADV_SIMULATOR_TIME_ON_FLIGHT'
  | 'ADV_CROSS_COUNTRY_UNKNOWN';

export interface ClassificationAdvisory {
  code: AdvisoryCode;
  row_number: number;
  message: string;
  severity: 'warning';
}

export interface ClassifiedFlight {
  readonly record: FlightRecord;
  readonly aircraft: AircraftProfile;
  readonly group: AircraftGroupResult;
  readonly roles: Readonly<RoleCredits>;
  readonly day: Readonly<RoleSplit>;
  readonly night: Readonly<RoleSplit>;
  readonly pic_cross_country: number;
  readonly pic_cross_country_night: number;
  readonly instrument: Readonly<InstrumentCredits>;
  readonly device_hours: number;
  readonly device_base_type: string | null;
  readonly distance_nm: number | null;
  readonly flags: Readonly<FlightFlags>;
  readonly advisories: readonly ClassificationAdvisory[];
}

export interface ClassificationOptions {
  distanceOf?: DistanceLookup;
  crossCountryThresholdNm?: number;
}
