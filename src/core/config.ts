/**
 * Environment-driven configuration.
 * Entry scripts load `.env` via dotenv before calling loadConfig().
 */
import { resolve } from 'node:path';
import { z } from 'zod';
import { ConfigError } from './errors.js';

// ============================================================================
// Types
// ============================================================================

export type ExecutionMode = 'LOCAL' | 'CLOUD';

export interface AppConfig {
  mode: ExecutionMode;
  awsRegion: string;
  buckets: {
    raw: string;
    clean: string;
    evidence: string;
  };
  prefixes: {
    raw: string;
    clean: string;
    evidence: string;
  };
  paths: {
    data: string;
    raw: string;
    clean: string;
    evidence: string;
    sql: string;
  };
  athena: {
    database: string;
    workGroup: string;
    outputPrefix: string;
    pollIntervalMs: number;
    maxPolls: number;
  };
  exports: {
    json: boolean;
    csv: boolean;
  };
  ingestConcurrency: number;
}

// ============================================================================
// Schema
// ============================================================================

const booleanFlag = z
  .string()
  .trim()
  .toLowerCase()
  .refine((v) => ['true', 'false', '1', '0', 'yes', 'no'].includes(v), {
    message: 'expected true/false',
  })
  .transform((v) => v === 'true' || v === '1' || v === 'yes');

const bucketName = z.string().trim().toLowerCase().default('');

const EnvSchema = z
  .object({
    MODE: z
      .string()
      .trim()
      .toUpperCase()
      .pipe(z.enum(['LOCAL', 'CLOUD']))
      .default('LOCAL'),
    AWS_REGION: z.string().trim().min(1).default('eu-west-1'),
    RAW_BUCKET: bucketName,
    CLEAN_BUCKET: bucketName,
    EVIDENCE_BUCKET: bucketName,
    RAW_PREFIX: z.string().default('public-health/raw'),
    CLEAN_PREFIX: z.string().default('public-health/clean'),
    EVIDENCE_PREFIX: z.string().default('athena'),
    DATA_DIR: z.string().min(1).default('data'),
    EVIDENCE_DIR: z.string().min(1).default('evidence'),
    SQL_DIR: z.string().min(1).default('sql'),
    ATHENA_DATABASE: z
      .string()
      .regex(/^[a-z_][a-z0-9_]*$/, 'must be a lower-case SQL identifier')
      .default('healthlake_db'),
    ATHENA_WORKGROUP: z.string().min(1).default('primary'),
    ATHENA_OUTPUT_PREFIX: z.string().default('athena-results'),
    ATHENA_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(2000),
    ATHENA_MAX_POLLS: z.coerce.number().int().positive().default(60),
    EXPORT_JSON: booleanFlag.default('true'),
    EXPORT_CSV: booleanFlag.default('true'),
    INGEST_CONCURRENCY: z.coerce.number().int().min(1).max(16).default(2),
  })
  .superRefine((env, ctx) => {
    if (env.MODE !== 'CLOUD') return;
    for (const key of ['RAW_BUCKET', 'CLEAN_BUCKET', 'EVIDENCE_BUCKET'] as const) {
      if (!env[key]) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: 'required when MODE=CLOUD',
        });
      }
    }
  });

/**
 * Strip leading and trailing slashes so prefixes join as `prefix/key`.
 */
export function normalizePrefix(prefix: string): string {
  return prefix.trim().replace(/^\/+|\/+$/g, '');
}

// ============================================================================
// Loader
// ============================================================================

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  cwd: string = process.cwd()
): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const e = parsed.data;
  const dataDir = resolve(cwd, e.DATA_DIR);

  return {
    mode: e.MODE,
    awsRegion: e.AWS_REGION,
    buckets: {
      raw: e.RAW_BUCKET,
      clean: e.CLEAN_BUCKET,
      evidence: e.EVIDENCE_BUCKET,
    },
    prefixes: {
      raw: normalizePrefix(e.RAW_PREFIX),
      clean: normalizePrefix(e.CLEAN_PREFIX),
      evidence: normalizePrefix(e.EVIDENCE_PREFIX),
    },
    paths: {
      data: dataDir,
      raw: resolve(dataDir, 'raw'),
      clean: resolve(dataDir, 'clean'),
      evidence: resolve(cwd, e.EVIDENCE_DIR),
      sql: resolve(cwd, e.SQL_DIR),
    },
    athena: {
      database: e.ATHENA_DATABASE,
      workGroup: e.ATHENA_WORKGROUP,
      outputPrefix: normalizePrefix(e.ATHENA_OUTPUT_PREFIX),
      pollIntervalMs: e.ATHENA_POLL_INTERVAL_MS,
      maxPolls: e.ATHENA_MAX_POLLS,
    },
    exports: {
      json: e.EXPORT_JSON,
      csv: e.EXPORT_CSV,
    },
    ingestConcurrency: e.INGEST_CONCURRENCY,
  };
}
