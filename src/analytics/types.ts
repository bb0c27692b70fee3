/**
 * Query engine contract shared by the DuckDB and Athena backends.
 */

export type SqlDialect = 'athena' | 'duckdb';

/** One result record, keyed by column name. */
export type ResultRow = Record<string, unknown>;

export interface QueryEngine {
  readonly name: string;
  /** Dialect the engine executes; query text is written for Athena */
  readonly dialect: SqlDialect;
  /** Register datasets (views or external tables) before the first query. */
  prepare(): Promise<void>;
  execute(sql: string): Promise<ResultRow[]>;
  close(): Promise<void>;
}
