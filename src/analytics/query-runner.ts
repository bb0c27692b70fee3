/**
 * Runs a directory of queries against an engine and writes each result, plus
 * a metrics document, to the evidence sink.
 */
import { performance } from 'node:perf_hooks';
import type { BlobStore } from '../core/storage.js';
import { toCsv } from '../utils/csv.js';
import { translateAthenaToDuckDb } from './sql-translator.js';
import type { SqlFile } from './sql-loader.js';
import type { QueryEngine, ResultRow } from './types.js';

export const METRICS_KEY = '_query_metrics.json';

export interface ExportFormats {
  json: boolean;
  csv: boolean;
}

export interface QueryMetric {
  query: string;
  rows: number;
  duration_ms: number;
  outputs: string[];
  formats: ExportFormats;
  translated: boolean;
}

export interface QueryFailure {
  query: string;
  error: string;
}

export interface RunReport {
  engine: string;
  metrics: QueryMetric[];
  failures: QueryFailure[];
}

export interface QueryRunnerOptions {
  engine: QueryEngine;
  evidence: BlobStore;
  exports: ExportFormats;
}

function encodeJson(value: unknown): Uint8Array {
  const text = JSON.stringify(
    value,
    (_key: string, v: unknown) => (typeof v === 'bigint' ? v.toString() : v),
    2
  );
  return new TextEncoder().encode(text);
}

export class QueryRunner {
  constructor(private readonly options: QueryRunnerOptions) {}

  /** Query text as the engine will run it. */
  prepareSql(sql: string): string {
    return this.options.engine.dialect === 'duckdb' ? translateAthenaToDuckDb(sql) : sql;
  }

  private async writeOutputs(name: string, rows: ResultRow[]): Promise<string[]> {
    const { evidence, exports } = this.options;
    const outputs: string[] = [];

    if (exports.json) {
      const key = `${name}.json`;
      await evidence.put(key, encodeJson(rows), 'application/json');
      outputs.push(evidence.describe(key));
    }
    if (exports.csv) {
      const key = `${name}.csv`;
      await evidence.put(key, new TextEncoder().encode(toCsv(rows)), 'text/csv');
      outputs.push(evidence.describe(key));
    }

    return outputs;
  }

  /**
   * Prepare the engine, then run every query in order. A failing query is
   * logged and left out of the metrics; the run continues.
   */
  async run(queries: SqlFile[]): Promise<RunReport> {
    const { engine, evidence, exports } = this.options;
    if (!exports.json && !exports.csv) {
      console.warn('Both JSON and CSV exports are disabled; only metrics will be written');
    }

    await engine.prepare();

    const metrics: QueryMetric[] = [];
    const failures: QueryFailure[] = [];

    for (const query of queries) {
      const sql = this.prepareSql(query.sql);
      console.log(`Executing query: ${query.name}`);

      const start = performance.now();
      let rows: ResultRow[];
      try {
        rows = await engine.execute(sql);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`Query failed: ${query.name}: ${message}`);
        if (sql !== query.sql) console.error(`Translated SQL: ${sql.slice(0, 500)}`);
        failures.push({ query: query.name, error: message });
        continue;
      }
      const durationMs = Math.trunc(performance.now() - start);

      const outputs = await this.writeOutputs(query.name, rows);
      metrics.push({
        query: query.name,
        rows: rows.length,
        duration_ms: durationMs,
        outputs,
        formats: { ...exports },
        translated: sql !== query.sql,
      });
      console.log(`Query ${query.name} → ${rows.length} rows (${durationMs} ms)`);
    }

    await evidence.put(METRICS_KEY, encodeJson(metrics), 'application/json');
    console.log(`Analytics complete (${engine.name}): ${metrics.length} queries executed, ${failures.length} failed`);

    return { engine: engine.name, metrics, failures };
  }
}
