/**
 * @caai/utils - Export Module
 *
 * Form cell layout, classified-flight CSV and form insights.
 */

export * from './formLayout';
export * from './classifiedCsv';
export * from './formInsights';
