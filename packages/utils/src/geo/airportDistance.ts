/**
 * Logbook Conversion - Airport Distance Provider
 *
 * Great-circle distance between airports of the bundled ICAO table,
 * optionally extended with a pilot's own airports.
 */

import { z } from 'zod';
import airportData from '../data/airports.json';
import { DistanceLookup } from '../types';

const EARTH_RADIUS_NM = 3440.065;
const KM_PER_NM = 1.852;

export type AirportCoordinates = readonly [number, number];

export const airportTableSchema = z.record(
  z.string().min(1),
  z.tuple([z.number().min(-90).max(90), z.number().min(-180).max(180)])
);

export const AIRPORT_COORDINATES: ReadonlyMap<string, AirportCoordinates> = new Map(
  Object.entries(airportTableSchema.parse(airportData))
);

export function calculateGreatCircleDistance(
  lat1: number,
  lon1: number,
  lat2: number,
  lon2: number
): { distance_nm: number; distance_km: number } {
  const toRad = (deg: number) => deg * (Math.PI / 180);

  const dLat = toRad(lat2 - lat1);
  const dLon = toRad(lon2 - lon1);

  const a =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(toRad(lat1)) * Math.cos(toRad(lat2)) * Math.sin(dLon / 2) ** 2;

  const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));
  const distance_nm = EARTH_RADIUS_NM * c;
  const distance_km = distance_nm * KM_PER_NM;

  return { distance_nm, distance_km };
}

export function nauticalMilesToKm(nm: number): number {
  return Math.round(nm * KM_PER_NM * 10) / 10;
}

/**
 * Builds a lookup over the bundled airports plus `customAirports` (which
 * override bundled entries). Distances are NM rounded to one decimal; an
 * unknown code gives null.
 */
export function createDistanceProvider(
  customAirports: Record<string, AirportCoordinates> = {}
): DistanceLookup {
  const airports = new Map(AIRPORT_COORDINATES);
  for (const [code, coords] of Object.entries(customAirports)) {
    airports.set(code.trim().toUpperCase(), coords);
  }

  return (from: string, to: string): number | null => {
    const origin = from.trim().toUpperCase();
    const destination = to.trim().toUpperCase();
    if (!origin || !destination) return null;
    if (origin === destination) return 0;

    const a = airports.get(origin);
    const b = airports.get(destination);
    if (!a || !b) return null;

    const { distance_nm } = calculateGreatCircleDistance(a[0], a[1], b[0], b[1]);
    return Math.round(distance_nm * 10) / 10;
  };
}
