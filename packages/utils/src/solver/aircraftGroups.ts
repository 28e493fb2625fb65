/**
 * Logbook Conversion - Aircraft Group Lookup
 *
 * Resolves an aircraft type code to its form group (A-D) and performance
 * profile. Known types come from the bundled table; unknown types fall back
 * to the Class / Engine Type columns and otherwise resolve to UNRESOLVED.
 */

import { z } from 'zod';
import aircraftData from '../data/aircraftTypes.json';
import {
  AircraftGroup,
  AircraftMetadata,
  AircraftProfile,
  Powerplant
} from '../types';

const aircraftEntrySchema = z.object({
  group: z.enum(['A', 'B', 'C', 'D']),
  engines: z.number().int().positive(),
  powerplant: z.enum(['piston', 'turbine']),
  retractable_gear: z.boolean(),
  variable_pitch: z.boolean(),
  multi_pilot: z.boolean()
});

const aircraftTableSchema = z.object({
  types: z.record(z.string(), aircraftEntrySchema),
  variants: z.record(z.string(), z.string())
});

type AircraftEntry = z.infer<typeof aircraftEntrySchema>;

const AIRCRAFT_TABLE = aircraftTableSchema.parse(aircraftData);

const AIRCRAFT_TYPES: ReadonlyMap<string, AircraftEntry> = new Map(Object.entries(AIRCRAFT_TABLE.types));
const TYPE_VARIANTS: ReadonlyMap<string, string> = new Map(Object.entries(AIRCRAFT_TABLE.variants));

const DEVICE_TYPE_KEYWORDS = ['SIM', 'FTD', 'FFS', 'BATD', 'AATD'];
const DEVICE_REGISTRATION_KEYWORDS = ['FRASCA', 'FLIGHT SAFETY', 'CAE'];

// ============================================================================
// TYPE CODES
// ============================================================================

/**
 * Upper-cases a type code and maps known variants onto their base type
 * ("C172R" -> "C172", "P28A-161" -> "PA28"). Unknown codes are returned
 * upper-cased.
 */
export function normalizeAircraftType(aircraftType: string): string {
  const code = aircraftType.trim().toUpperCase().replace(/\s+/g, ' ');
  if (AIRCRAFT_TYPES.has(code)) return code;

  const variant = TYPE_VARIANTS.get(code);
  if (variant) return variant;

  const compact = code.replace(/[\s-]/g, '');
  if (AIRCRAFT_TYPES.has(compact)) return compact;
  return TYPE_VARIANTS.get(compact) ?? code;
}

export function isTrainingDevice(aircraftType: string, registration: string): boolean {
  const type = aircraftType.toUpperCase();
  const reg = registration.trim().toUpperCase();

  if (DEVICE_TYPE_KEYWORDS.some(k => type.includes(k))) return true;
  if (DEVICE_REGISTRATION_KEYWORDS.some(k => reg.includes(k))) return true;
  return reg.split(/\s+/)[0] === 'ATP';
}

/**
 * Aircraft type a device session counts towards ("A320 FFS" -> "A320").
 * A bare device designator ("SIM") is returned as-is.
 */
export function deviceBaseType(aircraftType: string): string {
  const tokens = aircraftType
    .toUpperCase()
    .split(/[\s/_-]+/)
    .filter(t => t.length > 0 && !DEVICE_TYPE_KEYWORDS.includes(t));

  if (tokens.length === 0) {
    return aircraftType.trim().toUpperCase();
  }
  return normalizeAircraftType(tokens.join(' '));
}

// ============================================================================
// METADATA FALLBACK
// ============================================================================

const SINGLE_ENGINE_CLASSES = ['ASEL', 'ASES', 'SEL', 'SES', 'SEP'];
const MULTI_ENGINE_CLASSES = ['AMEL', 'AMES', 'MEL', 'MES', 'MEP'];

export function enginesFromClass(aircraftClass: string): number | null {
  const value = aircraftClass.trim().toUpperCase();
  if (!value) return null;
  if (SINGLE_ENGINE_CLASSES.includes(value) || value.includes('SINGLE')) return 1;
  if (MULTI_ENGINE_CLASSES.includes(value) || value.includes('MULTI')) return 2;
  return null;
}

export function powerplantFromEngineType(engineType: string): Powerplant | null {
  const value = engineType.trim().toLowerCase();
  if (!value) return null;
  if (/piston|reciprocating|diesel/.test(value)) return 'piston';
  if (/turbo\s?prop|turbine|turbo\s?fan|turbo\s?jet|jet/.test(value)) return 'turbine';
  return null;
}

function groupFor(engines: number, powerplant: Powerplant): AircraftGroup {
  if (engines <= 1) return powerplant === 'piston' ? 'A' : 'D';
  return powerplant === 'piston' ? 'B' : 'C';
}

// ============================================================================
// LOOKUP
// ============================================================================

export function resolveAircraftProfile(
  aircraftType: string,
  metadata: AircraftMetadata = {}
): AircraftProfile {
  const normalized = normalizeAircraftType(aircraftType);
  const entry = AIRCRAFT_TYPES.get(normalized);

  if (entry) {
    return {
      aircraft_type: aircraftType.trim(),
      normalized_type: normalized,
      group: entry.group,
      engines: entry.engines,
      powerplant: entry.powerplant,
      retractable_gear: entry.retractable_gear,
      variable_pitch: entry.variable_pitch,
      multi_pilot: entry.multi_pilot,
      source: 'table'
    };
  }

  const engines = enginesFromClass(metadata.aircraft_class ?? '');
  const powerplant = powerplantFromEngineType(metadata.engine_type ?? '');

  return {
    aircraft_type: aircraftType.trim(),
    normalized_type: normalized,
    group: engines !== null && powerplant !== null ? groupFor(engines, powerplant) : 'UNRESOLVED',
    engines,
    powerplant,
    retractable_gear: false,
    variable_pitch: false,
    multi_pilot: false,
    source: engines !== null && powerplant !== null ? 'metadata' : 'unresolved'
  };
}

export function isKnownAircraftType(aircraftType: string): boolean {
  return AIRCRAFT_TYPES.has(normalizeAircraftType(aircraftType));
}
