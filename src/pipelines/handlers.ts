/**
 * Pipeline runs shared by the entry scripts and event-driven deployments.
 *
 * Each run takes an Environment, so the same code serves LOCAL and CLOUD.
 */
import { join } from 'node:path';
import { loadConfig, type AppConfig } from '../core/config.js';
import { createEnvironment, type Environment } from '../core/environment.js';
import { extractObjectRefs } from '../core/events.js';
import { ingestEndpoints, type IngestResult } from '../core/fetcher.js';
import { Transformer, summarize, type TransformSummary } from '../core/transform.js';
import { loadSqlFiles } from '../analytics/sql-loader.js';
import { QueryRunner, type RunReport } from '../analytics/query-runner.js';
import { getSource, listSources } from '../registry/sources.js';

// ============================================================================
// Ingest
// ============================================================================

export async function runIngest(
  env: Environment,
  config: AppConfig,
  sourceNames: string[] = []
): Promise<IngestResult[]> {
  const sources = sourceNames.length > 0 ? sourceNames.map(getSource) : listSources();
  console.log(`Ingesting ${sources.length} endpoints (${env.label})`);
  return ingestEndpoints(sources, env.raw, { concurrency: config.ingestConcurrency });
}

// ============================================================================
// Transform
// ============================================================================

/**
 * Transform the given raw keys, or everything in the raw store when none
 * are given.
 */
export async function runTransform(env: Environment, rawKeys: string[] = []): Promise<TransformSummary> {
  const transformer = new Transformer({ raw: env.raw, clean: env.clean, label: env.label });
  return rawKeys.length > 0
    ? transformer.transformAll(rawKeys)
    : transformer.transformPending();
}

/**
 * Transform the objects named by an object-created notification.
 */
export async function handleObjectCreated(env: Environment, event: unknown): Promise<TransformSummary> {
  const refs = extractObjectRefs(event);
  if (refs.length === 0) {
    console.warn('Event carries no object references; nothing to do');
    return summarize([]);
  }
  return runTransform(env, refs.map((ref) => env.toRawKey(ref.key)));
}

// ============================================================================
// Analytics
// ============================================================================

export interface AnalyticsOptions {
  /** Run every DDL file, including the ones skipped by default */
  includeAllDdls?: boolean;
}

export async function runAnalytics(
  env: Environment,
  config: AppConfig,
  options: AnalyticsOptions = {}
): Promise<RunReport> {
  const queries = await loadSqlFiles(join(config.paths.sql, 'queries'));
  const ddls = env.mode === 'CLOUD' ? await loadSqlFiles(join(config.paths.sql, 'ddl')) : [];
  console.log(`Found ${queries.length} queries`);

  const engine = env.createQueryEngine({ ddls, includeAllDdls: options.includeAllDdls });
  try {
    const runner = new QueryRunner({ engine, evidence: env.evidence, exports: config.exports });
    return await runner.run(queries);
  } finally {
    await engine.close();
  }
}

// ============================================================================
// Event handlers
// ============================================================================

export async function transformHandler(event: unknown): Promise<TransformSummary> {
  const config = loadConfig();
  return handleObjectCreated(createEnvironment(config), event);
}

export async function ingestHandler(): Promise<IngestResult[]> {
  const config = loadConfig();
  return runIngest(createEnvironment(config), config);
}

export async function analyticsHandler(): Promise<RunReport> {
  const config = loadConfig();
  return runAnalytics(createEnvironment(config), config);
}
