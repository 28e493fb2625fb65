/**
 * @caai/utils
 *
 * Flight logbook conversion engines for the CAAI experience summary form.
 * This package provides:
 * - Logbook export reading and column resolution
 * - Record normalization and validation
 * - Per-flight classification into regulatory credit categories
 * - Aircraft group lookup and airport distances
 * - Form aggregation, cell layout and CSV export
 */

// Types - pure type definitions only
export * from './types';

// Parser - source reading, column resolution, normalization
export * from './parser';

// Solver - aircraft groups, classification, aggregation, pipeline
export * from './solver';

// Geo - airport coordinates and distances
export * from './geo';

// Export - form cells, classified CSV, insights
export * from './export';
