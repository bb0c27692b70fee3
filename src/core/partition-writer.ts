/**
 * Year-partitioned Parquet output.
 *
 * Layout under the clean store: `<endpoint>/year=<Y>/data.parquet`. A partition
 * is always rewritten whole; there is no merge with what was there before.
 */
import type { SchemaElement } from 'hyparquet';
import { parquetWriteBuffer } from 'hyparquet-writer';
import type { BlobStore } from './storage.js';
import type { ColumnSpec, ColumnType, Table, YearRow } from '../schemas/records.js';

export const PARQUET_CONTENT_TYPE = 'application/parquet';

export interface WrittenPartition {
  endpoint: string;
  year: number;
  key: string;
  rows: number;
}

export function partitionKey(endpoint: string, year: number): string {
  return `${endpoint}/year=${year}/data.parquet`;
}

/**
 * Group rows by year, ascending. Row order within a year is preserved.
 */
export function groupByYear<R extends YearRow>(rows: R[]): Array<[number, R[]]> {
  const groups = new Map<number, R[]>();
  for (const row of rows) {
    const group = groups.get(row.year);
    if (group) {
      group.push(row);
    } else {
      groups.set(row.year, [row]);
    }
  }
  return [...groups.entries()].sort(([a], [b]) => a - b);
}

// ============================================================================
// Parquet schema
// ============================================================================

/** Physical type and annotation per logical column type. */
const PARQUET_TYPES: Record<ColumnType, Pick<SchemaElement, 'type' | 'converted_type'>> = {
  STRING: { type: 'BYTE_ARRAY', converted_type: 'UTF8' },
  INT32: { type: 'INT32' },
  DOUBLE: { type: 'DOUBLE' },
  TIMESTAMP: { type: 'INT64', converted_type: 'TIMESTAMP_MILLIS' },
};

/**
 * Flat schema for a table. Every column is OPTIONAL except the `year`
 * partition key.
 */
export function parquetSchema(columns: ColumnSpec[]): SchemaElement[] {
  return [
    { name: 'root', num_children: columns.length },
    ...columns.map(
      (column): SchemaElement => ({
        name: column.name,
        ...PARQUET_TYPES[column.type],
        repetition_type: column.name === 'year' ? 'REQUIRED' : 'OPTIONAL',
      })
    ),
  ];
}

/**
 * Serialize rows with the table's column schema.
 */
export function encodeParquet(columns: ColumnSpec[], rows: YearRow[]): Uint8Array {
  const buffer = parquetWriteBuffer({
    columnData: columns.map((column) => ({
      name: column.name,
      data: rows.map((row): unknown => Reflect.get(row, column.name) ?? null),
    })),
    schema: parquetSchema(columns),
  });
  return new Uint8Array(buffer);
}

export class PartitionWriter {
  constructor(private readonly clean: BlobStore) {}

  async writePartition(endpoint: string, year: number, body: Uint8Array): Promise<string> {
    const key = partitionKey(endpoint, year);
    await this.clean.put(key, body, PARQUET_CONTENT_TYPE);
    return key;
  }

  async writeTable(endpoint: string, table: Table): Promise<WrittenPartition[]> {
    const written: WrittenPartition[] = [];
    for (const [year, rows] of groupByYear(table.rows)) {
      const key = await this.writePartition(endpoint, year, encodeParquet(table.columns, rows));
      written.push({ endpoint, year, key, rows: rows.length });
    }
    return written;
  }
}
