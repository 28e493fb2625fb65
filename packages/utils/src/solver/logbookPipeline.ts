/**
 * Logbook Conversion - Pipeline Runner
 *
 * resolve columns -> normalize rows -> classify -> fold -> finalize.
 * Row-level problems are collected into the result; only a mapping that
 * resolves no required column at all stops the run.
 */

import {
  AircraftGroupLookup,
  ClassifiedFlight,
  ColumnResolution,
  ExplicitColumnMapping,
  FormValues,
  LogbookSource,
  MappingIssue,
  NormalizationError
} from '../types';
import { hasUsableMapping, resolveColumns } from '../parser/columnResolver';
import { normalizeRecord } from '../parser/recordNormalizer';
import { AirportCoordinates, createDistanceProvider } from '../geo/airportDistance';
import { resolveAircraftProfile } from './aircraftGroups';
import { classifyFlight, DEFAULT_CROSS_COUNTRY_THRESHOLD_NM } from './classificationEngine';
import { createAccumulator, finalizeForm, foldFlight } from './formAggregator';

export interface PipelineConfig {
  pilot_name: string;
  explicit_mapping?: ExplicitColumnMapping;
  cross_country_threshold_nm: number;
  custom_airports?: Record<string, AirportCoordinates>;
  /** Issues raised while reading the explicit mapping; carried into the resolution report. */
  mapping_issues?: MappingIssue[];
}

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  pilot_name: '',
  cross_country_threshold_nm: DEFAULT_CROSS_COUNTRY_THRESHOLD_NM
};

export interface PipelineResult {
  pilot_name: string;
  resolution: ColumnResolution;
  normalization_errors: NormalizationError[];
  rows_read: number;
  flights: ClassifiedFlight[];
  form: FormValues;
}

/** No required column could be resolved, so no record can be built. */
export class MappingError extends Error {
  readonly resolution: ColumnResolution;

  constructor(resolution: ColumnResolution) {
    const missing = resolution.unresolved_required.join(', ');
    super(`No required logbook column could be identified (missing: ${missing})`);
    this.name = 'MappingError';
    this.resolution = resolution;
  }
}

// Data rows start on line 2 of the source, below the header.
const FIRST_DATA_ROW = 2;

export function runLogbookPipeline(
  source: LogbookSource,
  config: Partial<PipelineConfig> = {},
  aircraftGroupOf: AircraftGroupLookup = resolveAircraftProfile
): PipelineResult {
  const settings: PipelineConfig = {
    ...config,
    pilot_name: config.pilot_name ?? DEFAULT_PIPELINE_CONFIG.pilot_name,
    cross_country_threshold_nm:
      config.cross_country_threshold_nm ?? DEFAULT_PIPELINE_CONFIG.cross_country_threshold_nm
  };

  const resolved = resolveColumns(source.headers, settings.explicit_mapping);
  const resolution: ColumnResolution = {
    ...resolved,
    issues: [...(settings.mapping_issues ?? []), ...resolved.issues]
  };
  if (!hasUsableMapping(resolution)) {
    throw new MappingError(resolution);
  }

  const distanceOf = createDistanceProvider(settings.custom_airports);
  const options = { distanceOf, crossCountryThresholdNm: settings.cross_country_threshold_nm };

  const normalizationErrors: NormalizationError[] = [];
  const flights: ClassifiedFlight[] = [];
  const acc = createAccumulator();

  source.rows.forEach((row, i) => {
    const rowNumber = source.row_numbers?.[i] ?? i + FIRST_DATA_ROW;
    const outcome = normalizeRecord(row, resolution.mapping, rowNumber);
    if (!outcome.ok) {
      normalizationErrors.push(...outcome.errors);
      return;
    }
    const flight = classifyFlight(outcome.record, aircraftGroupOf, options);
    flights.push(flight);
    foldFlight(acc, flight);
  });

  return {
    pilot_name: settings.pilot_name,
    resolution,
    normalization_errors: normalizationErrors,
    rows_read: source.rows.length,
    flights,
    form: finalizeForm(acc)
  };
}
