/**
 * Schema normalizer for indicator datasets.
 * Handles field mapping, lenient numeric/year coercion and the country-code filter
 * shared by every tabular source family.
 */
import type { IndicatorRecord } from '../schemas/records.js';

// ============================================================================
// Field Mapping
// ============================================================================

/** A field name, a list of candidates, or a dotted path into nested objects. */
export type FieldRef = string | string[];

export interface IndicatorFieldMapping {
  countryCode: FieldRef;
  year: FieldRef;
  value: FieldRef;
  /** Source-specific identifier, e.g. the indicator code */
  identifier: FieldRef;
}

function getPath(record: Record<string, unknown>, path: string): unknown {
  let current: unknown = record;
  for (const part of path.split('.')) {
    if (typeof current !== 'object' || current === null) return null;
    current = Reflect.get(current, part);
  }
  return current;
}

/**
 * Get first non-null value from candidate field names.
 */
export function getField(record: Record<string, unknown>, mapping: FieldRef | undefined): unknown {
  if (!mapping) return null;

  const fields = Array.isArray(mapping) ? mapping : [mapping];
  for (const field of fields) {
    const value = getPath(record, field);
    if (value !== null && value !== undefined && value !== '') {
      return value;
    }
  }
  return null;
}

// ============================================================================
// Coercion
// ============================================================================

/**
 * Parse a numeric value, or null. Never throws.
 */
export function parseNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value !== 'string') return null;

  const str = value.trim();
  if (!str) return null;

  const num = Number(str);
  return Number.isFinite(num) ? num : null;
}

const MIN_YEAR = 1400;
const MAX_YEAR = 2100;

function plausibleYear(year: number): number | null {
  return year >= MIN_YEAR && year <= MAX_YEAR ? year : null;
}

/**
 * Parse an integer year ("2021", 2021, 2021.0) between 1400 and 2100.
 * Anything else is null.
 */
export function parseYear(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? plausibleYear(Math.trunc(value)) : null;
  }
  if (typeof value !== 'string') return null;

  const str = value.trim();
  if (!/^[+-]?\d+$/.test(str)) return null;
  return plausibleYear(parseInt(str, 10));
}

export function asString(value: unknown): string | null {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return null;
}

/**
 * ISO alpha-3 filter. Aggregates ("WLD", "AFR_SUB", "1A") use codes of other
 * lengths and are rejected here.
 */
export function isCountryCode(value: unknown): value is string {
  return typeof value === 'string' && value.length === 3;
}

/**
 * Unwrap the list of source records from a payload.
 * Accepts a bare list or an OData-style `{ value: [...] }` document.
 */
export function recordList(payload: unknown): Record<string, unknown>[] {
  let list: unknown = payload;
  if (typeof payload === 'object' && payload !== null && !Array.isArray(payload) && 'value' in payload) {
    list = payload.value;
  }
  if (!Array.isArray(list)) return [];
  return list.filter(
    (item): item is Record<string, unknown> =>
      typeof item === 'object' && item !== null && !Array.isArray(item)
  );
}

// ============================================================================
// Indicator rows
// ============================================================================

export interface NormalizedIndicator extends IndicatorRecord {
  identifier: string | null;
}

/**
 * Normalize indicator records: coerce value (null on failure), coerce year
 * (row dropped on failure), keep 3-character country codes only.
 */
export function normalizeIndicators(
  records: Record<string, unknown>[],
  fieldMapping: IndicatorFieldMapping
): NormalizedIndicator[] {
  const rows: NormalizedIndicator[] = [];

  for (const record of records) {
    const year = parseYear(getField(record, fieldMapping.year));
    if (year === null) continue;

    const countryCode = getField(record, fieldMapping.countryCode);
    if (!isCountryCode(countryCode)) continue;

    rows.push({
      country_code: countryCode,
      year,
      value: parseNumber(getField(record, fieldMapping.value)),
      identifier: asString(getField(record, fieldMapping.identifier)),
    });
  }

  return rows;
}
