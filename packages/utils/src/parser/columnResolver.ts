/**
 * Logbook Conversion - Column Resolver
 *
 * Maps the raw headers of a logbook export onto canonical fields. Explicit
 * mappings win unconditionally; the remaining fields are matched against the
 * alias dictionary, first by exact normalized text and then by containment.
 * Missing required fields are reported, never defaulted.
 */

import {
  CANONICAL_FIELDS,
  CanonicalField,
  ColumnLocator,
  ColumnMapping,
  ColumnResolution,
  ExplicitColumnMapping,
  FIELD_DISPLAY_NAMES,
  MappingIssue,
  MappingSource,
  RECOMMENDED_FIELDS,
  REQUIRED_FIELDS,
  ResolvedColumn
} from '../types';
import { COLUMN_ALIASES, lookupFieldName, normalizeHeader } from './columnAliases';

// Aliases and headers shorter than this only ever match exactly ("cc", "mp", "p1").
const MIN_HEURISTIC_ALIAS_LENGTH = 3;

// ============================================================================
// EXPLICIT MAPPING
// ============================================================================

function locateColumn(
  locator: ColumnLocator,
  normalizedHeaders: readonly string[]
): number | null {
  if (typeof locator === 'number') {
    return Number.isInteger(locator) && locator >= 0 && locator < normalizedHeaders.length
      ? locator
      : null;
  }

  const target = normalizeHeader(locator);
  if (!target) return null;

  const exact = normalizedHeaders.indexOf(target);
  if (exact >= 0) return exact;

  const partial = normalizedHeaders.findIndex(h => h.length > 0 && h.includes(target));
  return partial >= 0 ? partial : null;
}

/**
 * Turns a user-supplied mapping (keys in any spelling, values as header names
 * or index strings) into an explicit column mapping.
 */
export function parseExplicitMapping(
  raw: Record<string, string | number>
): { mapping: ExplicitColumnMapping; issues: MappingIssue[] } {
  const mapping: ExplicitColumnMapping = {};
  const issues: MappingIssue[] = [];

  for (const [key, value] of Object.entries(raw)) {
    const field = lookupFieldName(key);
    if (!field) {
      issues.push({
        code: 'WARN_UNKNOWN_MAPPING_KEY',
        field: key,
        message: `Unknown column name in mapping: '${key}'`,
        severity: 'warning'
      });
      continue;
    }

    if (typeof value === 'number') {
      mapping[field] = value;
    } else {
      const trimmed = value.trim();
      mapping[field] = /^\d+$/.test(trimmed) ? parseInt(trimmed, 10) : trimmed;
    }
  }

  return { mapping, issues };
}

// ============================================================================
// RESOLUTION
// ============================================================================

export function resolveColumns(
  rawHeaders: readonly string[],
  explicitMapping?: ExplicitColumnMapping
): ColumnResolution {
  const normalizedHeaders = rawHeaders.map(normalizeHeader);
  const mapping: ColumnMapping = {};
  const sources = new Map<CanonicalField, MappingSource>();
  const usedColumns = new Set<number>();
  const issues: MappingIssue[] = [];

  const assign = (field: CanonicalField, index: number, source: MappingSource) => {
    mapping[field] = index;
    sources.set(field, source);
    usedColumns.add(index);
  };

  // Pass 0: explicit entries
  if (explicitMapping) {
    for (const field of CANONICAL_FIELDS) {
      const locator = explicitMapping[field];
      if (locator === undefined) continue;

      const index = locateColumn(locator, normalizedHeaders);
      if (index === null) {
        issues.push({
          code: 'WARN_EXPLICIT_COLUMN_NOT_FOUND',
          field,
          message: `Source column '${locator}' for ${FIELD_DISPLAY_NAMES[field]} not found in headers`,
          severity: 'warning'
        });
        continue;
      }
      assign(field, index, 'explicit');
    }
  }

  // Pass 1: exact alias matches
  for (const { field, aliases } of COLUMN_ALIASES) {
    if (mapping[field] !== undefined) continue;
    for (const alias of aliases) {
      const index = normalizedHeaders.findIndex((h, i) => !usedColumns.has(i) && h === alias);
      if (index >= 0) {
        assign(field, index, 'alias');
        break;
      }
    }
  }

  // Pass 2: containment either way
  for (const { field, aliases } of COLUMN_ALIASES) {
    if (mapping[field] !== undefined) continue;
    for (const alias of aliases) {
      if (alias.length < MIN_HEURISTIC_ALIAS_LENGTH) continue;
      const index = normalizedHeaders.findIndex(
        (h, i) =>
          !usedColumns.has(i) &&
          h.length >= MIN_HEURISTIC_ALIAS_LENGTH &&
          (h.includes(alias) || alias.includes(h))
      );
      if (index >= 0) {
        assign(field, index, 'heuristic');
        break;
      }
    }
  }

  const columns: ResolvedColumn[] = [];
  for (const field of CANONICAL_FIELDS) {
    const index = mapping[field];
    const source = sources.get(field);
    if (index === undefined || source === undefined) continue;
    columns.push({ field, column_index: index, header: rawHeaders[index] ?? '', source });
  }

  const unresolvedRequired = REQUIRED_FIELDS.filter(f => mapping[f] === undefined);
  for (const field of unresolvedRequired) {
    issues.push({
      code: 'ERR_REQUIRED_COLUMN_MISSING',
      field,
      message: `Required column missing: ${FIELD_DISPLAY_NAMES[field]}`,
      severity: 'error'
    });
  }

  const missingRecommended = RECOMMENDED_FIELDS.filter(f => mapping[f] === undefined);
  for (const field of missingRecommended) {
    issues.push({
      code: 'WARN_RECOMMENDED_COLUMN_MISSING',
      field,
      message: `Recommended column missing: ${FIELD_DISPLAY_NAMES[field]} (will use defaults)`,
      severity: 'warning'
    });
  }

  const unmappedHeaders = rawHeaders.filter(
    (header, i) => !usedColumns.has(i) && header.trim() !== ''
  );

  return {
    mapping,
    columns,
    unresolved_required: unresolvedRequired,
    missing_recommended: missingRecommended,
    unmapped_headers: unmappedHeaders,
    issues
  };
}

/** True when at least one required field resolved; otherwise no record can be built. */
export function hasUsableMapping(resolution: ColumnResolution): boolean {
  return REQUIRED_FIELDS.some(field => resolution.mapping[field] !== undefined);
}
