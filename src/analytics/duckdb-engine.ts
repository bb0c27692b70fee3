/**
 * Local analytics on an in-memory DuckDB over the clean Parquet lake.
 *
 * Each clean dataset becomes a view `<database>."<name>"` over its year
 * partitions, so Athena-qualified table names resolve unchanged.
 */
import { DuckDBInstance, type DuckDBConnection } from '@duckdb/node-api';
import type { BlobStore } from '../core/storage.js';
import { NoDatasetsError } from '../core/errors.js';
import { listSourcesByFamily, type SourceFamily } from '../registry/sources.js';
import type { QueryEngine, ResultRow } from './types.js';

export interface DatasetLocation {
  name: string;
  /** Glob over the dataset's partition files */
  glob: string;
}

const PARTITION_KEY = /^([^/]+)\/year=[^/]+\/data\.parquet$/;

/** Union views over every present member of a source family. */
const UNION_VIEWS: Array<{ name: string; family: SourceFamily; columns: string[] }> = [
  { name: 'who_indicators', family: 'gho', columns: ['country_code', 'indicator_code', 'year', 'value'] },
  { name: 'worldbank_indicators', family: 'worldbank', columns: ['country_code', 'indicator_id', 'year', 'value'] },
];

function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

function quoteLiteral(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

/**
 * Datasets present in a clean store: the top-level names that have at least
 * one `year=*` partition.
 */
export async function discoverDatasets(clean: BlobStore): Promise<DatasetLocation[]> {
  const names = new Set<string>();
  for (const key of await clean.list()) {
    const match = PARTITION_KEY.exec(key);
    if (match?.[1]) names.add(match[1]);
  }
  return [...names].sort().map((name) => ({
    name,
    glob: `${clean.describe(name)}/year=*/data.parquet`,
  }));
}

/**
 * DDL for the schema, the per-dataset views and the family union views.
 */
export function buildViewStatements(database: string, datasets: DatasetLocation[]): string[] {
  const schema = quoteIdent(database);
  const statements = [`CREATE SCHEMA IF NOT EXISTS ${schema}`];

  for (const dataset of datasets) {
    statements.push(
      `CREATE OR REPLACE VIEW ${schema}.${quoteIdent(dataset.name)} AS ` +
        `SELECT * FROM read_parquet(${quoteLiteral(dataset.glob)}, hive_partitioning = false)`
    );
  }

  const present = new Set(datasets.map((d) => d.name));
  for (const view of UNION_VIEWS) {
    const members = listSourcesByFamily(view.family)
      .map((source) => source.name)
      .filter((name) => present.has(name));
    if (members.length === 0 || present.has(view.name)) continue;

    const columnList = view.columns.join(', ');
    const selects = members.map(
      (name) => `SELECT ${columnList} FROM ${schema}.${quoteIdent(name)}`
    );
    statements.push(
      `CREATE OR REPLACE VIEW ${schema}.${quoteIdent(view.name)} AS ${selects.join(' UNION ALL ')}`
    );
  }

  return statements;
}

export class DuckDbEngine implements QueryEngine {
  readonly name = 'duckdb';
  readonly dialect = 'duckdb';
  private instance: DuckDBInstance | null = null;
  private connection: DuckDBConnection | null = null;

  constructor(
    private readonly clean: BlobStore,
    private readonly database: string
  ) {}

  private async connect(): Promise<DuckDBConnection> {
    if (!this.connection) {
      this.instance = await DuckDBInstance.create(':memory:');
      this.connection = await this.instance.connect();
    }
    return this.connection;
  }

  async prepare(): Promise<void> {
    const datasets = await discoverDatasets(this.clean);
    if (datasets.length === 0) {
      throw new NoDatasetsError(this.clean.describe(''));
    }

    const connection = await this.connect();
    for (const statement of buildViewStatements(this.database, datasets)) {
      await connection.run(statement);
    }
    console.log(`Registered datasets: ${datasets.map((d) => d.name).join(', ')}`);
  }

  async execute(sql: string): Promise<ResultRow[]> {
    const connection = await this.connect();
    const reader = await connection.runAndReadAll(sql);
    return reader.getRowObjectsJson();
  }

  async close(): Promise<void> {
    this.connection?.closeSync();
    this.connection = null;
    this.instance?.closeSync();
    this.instance = null;
  }
}
