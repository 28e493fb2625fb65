/**
 * @caai/utils - Solver Module
 *
 * Aircraft groups, flight classification, form aggregation and the pipeline runner.
 */

export {
  normalizeAircraftType,
  isTrainingDevice,
  deviceBaseType,
  enginesFromClass,
  powerplantFromEngineType,
  resolveAircraftProfile,
  isKnownAircraftType
} from './aircraftGroups';

export {
  DEFAULT_CROSS_COUNTRY_THRESHOLD_NM,
  CLASSIFICATION_STEPS,
  isDeviceSession,
  classifyFlight,
  primaryRole
} from './classificationEngine';

export {
  createAccumulator,
  foldFlight,
  foldFlights,
  mergeAccumulators,
  finalizeForm
} from './formAggregator';

export {
  runLogbookPipeline,
  MappingError,
  DEFAULT_PIPELINE_CONFIG,
  type PipelineConfig,
  type PipelineResult
} from './logbookPipeline';
