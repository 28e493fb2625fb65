/**
 * Logbook Conversion - Summary Form Types
 *
 * Accumulator state folded from classified flights and the finalized values
 * of the flight-hours summary form (Table 1, Table 2, CPL and ATPL sheets).
 */

import {
  AircraftGroup,
  AircraftGroupResult,
  ClassificationAdvisory
} from './logbookTypes';

// ============================================================================
// ACCUMULATOR (integer hundredths of an hour)
// ============================================================================

export interface RoleBuckets {
  pic: number;
  pic_xc: number;
  sic: number;
  student: number;
}

export interface DayNightBuckets {
  day: RoleBuckets;
  night: RoleBuckets;
}

export interface TypeBuckets extends DayNightBuckets {
  aircraft_type: string;
  group: AircraftGroupResult;
  flights: number;
  instrument_actual: number;
  instrument_simulated: number;
}

export interface SoloCrossCountryCandidate {
  row_number: number;
  date: string;
  from: string;
  to: string;
  distance_nm: number | null;
  duration: number;
}

export interface DatedFlightEntry {
  row_number: number;
  date: string;
  hours: number;
}

export interface FormAccumulator {
  groups: Record<AircraftGroupResult, DayNightBuckets>;
  types: Map<string, TypeBuckets>;
  device_by_type: Map<string, number>;
  device_total: number;
  device_sessions: number;
  flights: number;
  day_landings: number;
  night_landings: number;
  instrument_actual: number;
  instrument_simulated: number;
  dual_instrument: number;
  cross_country_all_roles: number;
  complex_or_multi_engine: number;
  solo: number;
  safety_pilot_excluded: number;
  unresolved_types: Map<string, number>;
  longest_solo_xc: SoloCrossCountryCandidate | null;
  instrument_instruction_flights: DatedFlightEntry[];
  night_pic_flights: DatedFlightEntry[];
  complex_flights: DatedFlightEntry[];
  advisories: ClassificationAdvisory[];
}

// ============================================================================
// FINALIZED FORM VALUES (hours)
// ============================================================================

export interface GroupTotals {
  pic: number;
  pic_xc: number;
  sic: number;
  student: number;
  night_pic: number;
  night_pic_xc: number;
  night_sic: number;
  night_student: number;
  /** PIC + SIC + Student for the group. */
  total: number;
}

export interface TypeRow {
  aircraft_type: string;
  group: AircraftGroupResult;
  flights: number;
  form_total: number;
  day_pic: number;
  day_pic_xc: number;
  day_sic: number;
  day_student: number;
  night_pic: number;
  night_pic_xc: number;
  night_sic: number;
  night_student: number;
  instrument_actual: number;
  instrument_simulated: number;
  device_hours: number;
}

export interface Table2Row {
  aircraft_type: string;
  instrument_actual: number;
  instrument_simulated: number;
  device_hours: number;
}

export interface LongestSoloCrossCountry {
  date: string;
  route: string;
  duration: number;
  distance_nm: number | null;
  distance_km: number | null;
}

export interface FormTotals {
  pic: number;
  sic: number;
  student: number;
  sic_half_credit: number;
  /** PIC + SIC + Student (Table 1 sum of group totals). */
  form_total: number;
  /** Regulation 42(b): PIC + SIC/2 + Student. */
  overall_total: number;
  safety_pilot_excluded: number;
}

export interface CplValues {
  pic_cross_country: number;
  dual_received: number;
  dual_instrument: number;
  night_landings: number;
  night_hours: number;
  longest_solo_cross_country: LongestSoloCrossCountry | null;
  complex_or_multi_engine: number;
  instrument_instruction_flights: DatedFlightEntry[];
  night_pic_flights: DatedFlightEntry[];
  complex_flights: DatedFlightEntry[];
}

export interface AtplValues {
  cross_country_all_roles: number;
  night_pic_cross_country: number;
  instrument_total: number;
}

export interface UnresolvedTypeReport {
  aircraft_type: string;
  hours: number;
}

export interface FormReport {
  flights_counted: number;
  device_sessions: number;
  day_landings: number;
  unresolved_aircraft_types: UnresolvedTypeReport[];
  advisories: ClassificationAdvisory[];
}

export interface FormValues {
  table1: {
    groups: Record<AircraftGroup, GroupTotals>;
    unresolved: GroupTotals;
    types: TypeRow[];
  };
  table2: {
    rows: Table2Row[];
    device_total: number;
    device_by_type: { aircraft_type: string; hours: number }[];
  };
  totals: FormTotals;
  cpl: CplValues;
  atpl: AtplValues;
  report: FormReport;
}

// ============================================================================
// INSIGHTS
// ============================================================================

export interface FormInsight {
  id: string;
  category: 'totals' | 'exclusion' | 'data_quality' | 'requirement';
  severity: 'info' | 'warning';
  title: string;
  description: string;
  affected_rows?: number[];
  recommendation?: string;
}

export interface FormSummary {
  insights: FormInsight[];
  lines: string[];
}
