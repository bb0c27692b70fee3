/**
 * Normalized record shapes written to the clean lake.
 */

export type ColumnType = 'STRING' | 'INT32' | 'DOUBLE' | 'TIMESTAMP';

export interface ColumnSpec {
  name: string;
  type: ColumnType;
}

/** Column list whose names are checked against the record type. */
export function columns<R>(specs: Array<{ name: keyof R & string; type: ColumnType }>): ColumnSpec[] {
  return specs;
}

export interface YearRow {
  year: number;
}

/**
 * Parser output: rows plus the column schema used to serialize them.
 * Every table has an integer `year`, the partition key.
 */
export interface Table<R extends YearRow = YearRow> {
  columns: ColumnSpec[];
  rows: R[];
}

// ============================================================================
// Indicator families (GHO, World Bank)
// ============================================================================

export interface IndicatorRecord {
  country_code: string;  // ISO 3166-1 alpha-3
  year: number;
  value: number | null;
}

export interface GhoRecord extends IndicatorRecord {
  indicator_code: string | null;
}

export interface WorldBankRecord extends IndicatorRecord {
  indicator_id: string | null;
}

// ============================================================================
// Outbreak news
// ============================================================================

export interface CountryIdentity {
  country: string | null;
  country_iso2: string | null;
  country_iso3: string | null;
}

export interface OutbreakRecord extends CountryIdentity {
  outbreak_id: string | null;
  title: string | null;
  summary: string | null;
  publication_date: Date;
  year: number;
  source_url: string | null;
  disease: string | null;
}
