/**
 * Pipeline runs against in-memory stores.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { handleObjectCreated, runAnalytics, runIngest, runTransform } from '../handlers.js';
import { loadConfig } from '../../core/config.js';
import { MemoryBlobStore } from '../../core/storage.js';
import { METRICS_KEY } from '../../analytics/query-runner.js';
import type { EngineOptions, Environment } from '../../core/environment.js';
import type { QueryEngine } from '../../analytics/types.js';

const SQL_DIR = new URL('../../../sql', import.meta.url).pathname;
const config = loadConfig({ SQL_DIR }, '/srv/healthlake');

const GHO_PAYLOAD = JSON.stringify({
  value: [{ SpatialDim: 'NGA', TimeDim: 2021, NumericValue: 52.3, IndicatorCode: 'WHOSIS_000001' }],
});

function memoryEnvironment(engine: QueryEngine) {
  const raw = new MemoryBlobStore('raw');
  const clean = new MemoryBlobStore('clean');
  const evidence = new MemoryBlobStore('evidence');
  const createQueryEngine = vi.fn((_options?: EngineOptions) => engine);
  const env: Environment = {
    mode: 'LOCAL',
    label: 'memory',
    raw,
    clean,
    evidence,
    createQueryEngine,
    toRawKey: (key) => key.replace(/^public-health\/raw\//, ''),
    bootstrap: async () => {},
  };
  return { env, raw, clean, evidence, createQueryEngine };
}

function emptyEngine(): QueryEngine {
  return {
    name: 'fake',
    dialect: 'duckdb',
    prepare: vi.fn(async () => {}),
    execute: vi.fn(async () => []),
    close: vi.fn(async () => {}),
  };
}

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('runIngest', () => {
  it('rejects unknown source names', async () => {
    const { env } = memoryEnvironment(emptyEngine());
    await expect(runIngest(env, config, ['measles'])).rejects.toThrow('Unknown source: measles');
  });
});

describe('runTransform', () => {
  it('transforms the whole raw store when no keys are given', async () => {
    const { env, raw, clean } = memoryEnvironment(emptyEngine());
    await raw.put('life_expectancy/a.json', new TextEncoder().encode(GHO_PAYLOAD), 'application/json');

    const summary = await runTransform(env);

    expect(summary.counts.processed).toBe(1);
    expect(clean.has('life_expectancy/year=2021/data.parquet')).toBe(true);
  });
});

describe('handleObjectCreated', () => {
  it('transforms the objects named in the event', async () => {
    const { env, raw, clean } = memoryEnvironment(emptyEngine());
    await raw.put('life_expectancy/a.json', new TextEncoder().encode(GHO_PAYLOAD), 'application/json');

    const summary = await handleObjectCreated(env, {
      Records: [
        { s3: { bucket: { name: 'raw-bucket' }, object: { key: 'public-health/raw/life_expectancy/a.json' } } },
      ],
    });

    expect(summary.results.map((r) => [r.rawKey, r.outcome])).toEqual([['life_expectancy/a.json', 'processed']]);
    expect(clean.has('life_expectancy/year=2021/data.parquet')).toBe(true);
  });

  it('does nothing for an unrecognised event', async () => {
    const { env, clean } = memoryEnvironment(emptyEngine());

    const summary = await handleObjectCreated(env, { hello: 'world' });

    expect(summary.results).toEqual([]);
    expect(clean.writes).toEqual([]);
  });
});

describe('runAnalytics', () => {
  it('runs every bundled query and closes the engine', async () => {
    const engine = emptyEngine();
    const { env, evidence, createQueryEngine } = memoryEnvironment(engine);

    const report = await runAnalytics(env, config, { includeAllDdls: true });

    expect(createQueryEngine).toHaveBeenCalledWith({ ddls: [], includeAllDdls: true });
    expect(report.metrics).toHaveLength(9);
    expect(report.failures).toEqual([]);
    expect(evidence.has(METRICS_KEY)).toBe(true);
    expect(engine.close).toHaveBeenCalledTimes(1);
  });

  it('closes the engine when preparation fails', async () => {
    const engine = emptyEngine();
    engine.prepare = vi.fn(async () => {
      throw new Error('no datasets');
    });
    const { env } = memoryEnvironment(engine);

    await expect(runAnalytics(env, config)).rejects.toThrow('no datasets');
    expect(engine.close).toHaveBeenCalledTimes(1);
  });
});
