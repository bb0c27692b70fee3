/**
 * Execution environment: the one place LOCAL and CLOUD differ.
 *
 * Built once from config; pipelines take stores and engines from it and never
 * branch on the mode themselves.
 */
import { mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import { S3Client } from '@aws-sdk/client-s3';
import { AthenaClient } from '@aws-sdk/client-athena';
import type { AppConfig, ExecutionMode } from './config.js';
import { FsBlobStore, S3BlobStore, type BlobStore } from './storage.js';
import { DuckDbEngine } from '../analytics/duckdb-engine.js';
import { AthenaEngine } from '../analytics/athena-engine.js';
import type { SqlFile } from '../analytics/sql-loader.js';
import type { QueryEngine } from '../analytics/types.js';

export interface EngineOptions {
  /** Table DDL for engines that need it (Athena) */
  ddls?: SqlFile[];
  /** Also run DDL files the engine skips by default */
  includeAllDdls?: boolean;
}

export interface Environment {
  readonly mode: ExecutionMode;
  /** Short name used in log lines */
  readonly label: string;
  readonly raw: BlobStore;
  readonly clean: BlobStore;
  readonly evidence: BlobStore;
  createQueryEngine(options?: EngineOptions): QueryEngine;
  /** Logical raw key for an object key taken from a trigger event. */
  toRawKey(objectKey: string): string;
  /** Create whatever local structure the stores expect. */
  bootstrap(): Promise<void>;
}

export interface EnvironmentClients {
  s3?: S3Client;
  athena?: AthenaClient;
}

function stripPrefix(key: string, prefix: string): string {
  const clean = key.replace(/^\/+/, '');
  if (prefix && clean.startsWith(`${prefix}/`)) {
    return clean.slice(prefix.length + 1);
  }
  return clean;
}

// ============================================================================
// LOCAL
// ============================================================================

export class LocalEnvironment implements Environment {
  readonly mode = 'LOCAL';
  readonly label = 'local';
  readonly raw: FsBlobStore;
  readonly clean: FsBlobStore;
  readonly evidence: FsBlobStore;

  constructor(private readonly config: AppConfig) {
    this.raw = new FsBlobStore(config.paths.raw);
    this.clean = new FsBlobStore(config.paths.clean);
    this.evidence = new FsBlobStore(join(config.paths.evidence, config.prefixes.evidence));
  }

  createQueryEngine(): QueryEngine {
    return new DuckDbEngine(this.clean, this.config.athena.database);
  }

  toRawKey(objectKey: string): string {
    return stripPrefix(objectKey, this.config.prefixes.raw);
  }

  async bootstrap(): Promise<void> {
    for (const root of [this.raw.root, this.clean.root, this.evidence.root]) {
      await mkdir(root, { recursive: true });
    }
  }
}

// ============================================================================
// CLOUD
// ============================================================================

export class CloudEnvironment implements Environment {
  readonly mode = 'CLOUD';
  readonly label = 'cloud';
  readonly raw: S3BlobStore;
  readonly clean: S3BlobStore;
  readonly evidence: S3BlobStore;
  private readonly athenaClient: AthenaClient | undefined;

  constructor(
    private readonly config: AppConfig,
    clients: EnvironmentClients = {}
  ) {
    const s3 = clients.s3 ?? new S3Client({ region: config.awsRegion });
    this.athenaClient = clients.athena;
    this.raw = new S3BlobStore(s3, config.buckets.raw, config.prefixes.raw);
    this.clean = new S3BlobStore(s3, config.buckets.clean, config.prefixes.clean);
    this.evidence = new S3BlobStore(s3, config.buckets.evidence, config.prefixes.evidence);
  }

  createQueryEngine(options: EngineOptions = {}): QueryEngine {
    const { athena, buckets, prefixes } = this.config;
    return new AthenaEngine({
      client: this.athenaClient ?? new AthenaClient({ region: this.config.awsRegion }),
      database: athena.database,
      workGroup: athena.workGroup,
      outputLocation: `s3://${buckets.evidence}/${athena.outputPrefix}/`,
      cleanBucket: buckets.clean,
      cleanPrefix: prefixes.clean,
      ddls: options.ddls,
      skipDdls: options.includeAllDdls ? [] : undefined,
      pollIntervalMs: athena.pollIntervalMs,
      maxPolls: athena.maxPolls,
    });
  }

  toRawKey(objectKey: string): string {
    return stripPrefix(objectKey, this.config.prefixes.raw);
  }

  async bootstrap(): Promise<void> {
    // Buckets are provisioned outside the pipelines
  }
}

export function createEnvironment(config: AppConfig, clients?: EnvironmentClients): Environment {
  return config.mode === 'CLOUD'
    ? new CloudEnvironment(config, clients)
    : new LocalEnvironment(config);
}
