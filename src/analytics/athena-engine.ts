/**
 * Amazon Athena query engine.
 *
 * Queries are submitted with StartQueryExecution, polled at a fixed interval,
 * and read back page by page. Table DDL runs once per invocation in prepare().
 */
import {
  GetQueryExecutionCommand,
  GetQueryResultsCommand,
  StartQueryExecutionCommand,
  type AthenaClient,
  type Row,
} from '@aws-sdk/client-athena';
import { AthenaTimeoutError, QueryFailedError } from '../core/errors.js';
import type { SqlFile } from './sql-loader.js';
import type { QueryEngine, ResultRow } from './types.js';

export interface AthenaEngineOptions {
  client: AthenaClient;
  database: string;
  workGroup: string;
  /** `s3://bucket/prefix/` for result files */
  outputLocation: string;
  /** Substituted for `<CLEAN_BUCKET>` and `<CLEAN_PREFIX>` in query text */
  cleanBucket: string;
  cleanPrefix: string;
  ddls?: SqlFile[];
  /** DDL file names left to other tooling; the union views by default */
  skipDdls?: string[];
  pollIntervalMs?: number;
  maxPolls?: number;
  /** Pause after DDL so the catalog settles before queries run */
  cooldownMs?: number;
}

export const DEFAULT_SKIPPED_DDLS = ['ddl_who_indicators', 'ddl_worldbank_indicators'];

async function delay(ms: number): Promise<void> {
  if (ms <= 0) return;
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Header row plus data rows to records. Missing cells are null.
 */
export function rowsToRecords(rows: Row[]): ResultRow[] {
  const [header, ...data] = rows;
  if (!header) return [];
  const columns = (header.Data ?? []).map((datum, i) => datum.VarCharValue ?? `_col${i}`);

  return data.map((row) => {
    const record: ResultRow = {};
    columns.forEach((column, i) => {
      record[column] = row.Data?.[i]?.VarCharValue ?? null;
    });
    return record;
  });
}

export class AthenaEngine implements QueryEngine {
  readonly name = 'athena';
  readonly dialect = 'athena';
  private readonly client: AthenaClient;
  private readonly pollIntervalMs: number;
  private readonly maxPolls: number;
  private readonly cooldownMs: number;
  private readonly skipDdls: Set<string>;

  constructor(private readonly options: AthenaEngineOptions) {
    this.client = options.client;
    this.pollIntervalMs = options.pollIntervalMs ?? 2000;
    this.maxPolls = options.maxPolls ?? 60;
    this.cooldownMs = options.cooldownMs ?? 3000;
    this.skipDdls = new Set(options.skipDdls ?? DEFAULT_SKIPPED_DDLS);
  }

  substitute(sql: string): string {
    return sql
      .replaceAll('<CLEAN_BUCKET>', this.options.cleanBucket)
      .replaceAll('<CLEAN_PREFIX>', this.options.cleanPrefix);
  }

  async start(sql: string): Promise<string> {
    const response = await this.client.send(
      new StartQueryExecutionCommand({
        QueryString: this.substitute(sql),
        QueryExecutionContext: { Database: this.options.database },
        ResultConfiguration: { OutputLocation: this.options.outputLocation },
        WorkGroup: this.options.workGroup,
      })
    );
    if (!response.QueryExecutionId) {
      throw new Error('Athena returned no QueryExecutionId');
    }
    return response.QueryExecutionId;
  }

  async waitForCompletion(queryId: string): Promise<void> {
    for (let polls = 0; polls < this.maxPolls; polls++) {
      const response = await this.client.send(
        new GetQueryExecutionCommand({ QueryExecutionId: queryId })
      );
      const status = response.QueryExecution?.Status;
      const state = status?.State;

      if (state === 'SUCCEEDED') return;
      if (state === 'FAILED' || state === 'CANCELLED') {
        throw new QueryFailedError(queryId, state, status?.StateChangeReason);
      }

      await delay(this.pollIntervalMs);
    }

    throw new AthenaTimeoutError(queryId, this.maxPolls * this.pollIntervalMs);
  }

  async fetchResults(queryId: string): Promise<ResultRow[]> {
    const rows: Row[] = [];
    let nextToken: string | undefined;

    do {
      const page = await this.client.send(
        new GetQueryResultsCommand({ QueryExecutionId: queryId, NextToken: nextToken })
      );
      rows.push(...(page.ResultSet?.Rows ?? []));
      nextToken = page.NextToken;
    } while (nextToken);

    return rowsToRecords(rows);
  }

  async prepare(): Promise<void> {
    const ddls = (this.options.ddls ?? []).filter((ddl) => !this.skipDdls.has(ddl.name));

    for (const ddl of ddls) {
      console.log(`Executing DDL: ${ddl.name}`);
      await this.waitForCompletion(await this.start(ddl.sql));
    }

    if (ddls.length > 0) {
      console.log('Waiting for catalog propagation...');
      await delay(this.cooldownMs);
    }
  }

  async execute(sql: string): Promise<ResultRow[]> {
    const queryId = await this.start(sql);
    await this.waitForCompletion(queryId);
    return this.fetchResults(queryId);
  }

  async close(): Promise<void> {
    this.client.destroy();
  }
}
