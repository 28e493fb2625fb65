/**
 * Logbook Conversion - Header Alias Dictionary
 *
 * Known header spellings (English, Hebrew, LogTen Pro field names) for each
 * canonical field. Loaded once from the bundled JSON table; dictionary order
 * decides which field claims an ambiguous header first.
 */

import { z } from 'zod';
import aliasData from '../data/columnAliases.json';
import { CANONICAL_FIELDS, CanonicalField, FIELD_DISPLAY_NAMES, isCanonicalField } from '../types';

const aliasTableSchema = z.record(z.enum(CANONICAL_FIELDS), z.array(z.string().min(1)).min(1));

export interface FieldAliases {
  field: CanonicalField;
  aliases: readonly string[]; // normalized
}

/**
 * Lower-cases and strips punctuation so that "A/C Type", "a/c type" and
 * "A-C  TYPE" compare equal. Letters of any script, digits and underscores
 * are kept.
 */
export function normalizeHeader(header: string): string {
  return header
    .trim()
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s_]/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

function loadAliasTable(): readonly FieldAliases[] {
  const parsed = aliasTableSchema.parse(aliasData);
  const entries: FieldAliases[] = [];
  for (const key of Object.keys(parsed)) {
    if (!isCanonicalField(key)) continue;
    const aliases = parsed[key] ?? [];
    entries.push({
      field: key,
      aliases: Object.freeze(aliases.map(normalizeHeader).filter(a => a.length > 0))
    });
  }
  return Object.freeze(entries);
}

export const COLUMN_ALIASES: readonly FieldAliases[] = loadAliasTable();

/**
 * Resolves a user-written field name (canonical id, display name or any
 * alias) to its canonical field.
 */
export function lookupFieldName(name: string): CanonicalField | null {
  const trimmed = name.trim();
  if (isCanonicalField(trimmed)) return trimmed;

  const norm = normalizeHeader(trimmed);
  if (!norm) return null;

  for (const field of CANONICAL_FIELDS) {
    if (normalizeHeader(field) === norm || normalizeHeader(FIELD_DISPLAY_NAMES[field]) === norm) {
      return field;
    }
  }
  for (const entry of COLUMN_ALIASES) {
    if (entry.aliases.includes(norm)) return entry.field;
  }
  return null;
}
