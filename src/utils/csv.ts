/**
 * CSV serialization for query results.
 */
import { stringify } from 'csv-stringify/sync';
import type { ResultRow } from '../analytics/types.js';

/** Union of row keys in first-seen order. */
export function csvColumns(rows: ResultRow[]): string[] {
  const columns = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) columns.add(key);
  }
  return [...columns];
}

/**
 * Header row plus one line per row, each ending in "\n". Missing cells are
 * empty; an empty result is an empty string.
 */
export function toCsv(rows: ResultRow[]): string {
  const columns = csvColumns(rows);
  if (columns.length === 0) return '';

  return stringify(rows, {
    header: true,
    columns,
    cast: {
      date: (value) => value.toISOString(),
      boolean: (value) => String(value),
      bigint: (value) => value.toString(),
    },
  });
}
