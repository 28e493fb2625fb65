/**
 * @caai/utils - Type Definitions
 * 
 * Core data models for logbook normalization and summary-form aggregation.
 */

export * from './logbookTypes';
export * from './formTypes';
