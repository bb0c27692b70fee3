/**
 * Raw-to-clean transform.
 *
 * One raw object in, zero or more year partitions out. The manifest records the
 * SHA-256 of every processed object so re-delivery of the same bytes is a no-op.
 */
import { createHash } from 'node:crypto';
import type { BlobStore } from './storage.js';
import { ManifestStore } from './manifest.js';
import { PartitionWriter, type WrittenPartition } from './partition-writer.js';
import { InvalidPayloadError } from './errors.js';
import { decodePayload } from '../sources/payload.js';
import { routeRawKey } from '../registry/sources.js';

// ============================================================================
// Types
// ============================================================================

export type TransformOutcome =
  | 'unrouted'
  | 'unchanged'
  | 'invalid-payload'
  | 'empty-result'
  | 'processed';

export interface TransformResult {
  rawKey: string;
  outcome: TransformOutcome;
  /** True only when partitions were written */
  processed: boolean;
  source: string | null;
  rows: number;
  partitions: WrittenPartition[];
}

export interface TransformSummary {
  results: TransformResult[];
  counts: Record<TransformOutcome, number>;
}

export interface TransformerOptions {
  raw: BlobStore;
  clean: BlobStore;
  /** Defaults to the manifest under the clean store */
  manifest?: ManifestStore;
  /** Appended to log lines, e.g. "local" */
  label?: string;
  now?: () => Date;
}

export function sha256Hex(body: Uint8Array): string {
  return createHash('sha256').update(body).digest('hex');
}

// ============================================================================
// Transformer
// ============================================================================

export class Transformer {
  private readonly raw: BlobStore;
  private readonly writer: PartitionWriter;
  private readonly label: string;
  private readonly now: () => Date;
  readonly manifest: ManifestStore;

  constructor(options: TransformerOptions) {
    this.raw = options.raw;
    this.writer = new PartitionWriter(options.clean);
    this.manifest = options.manifest ?? new ManifestStore(options.clean);
    this.label = options.label ?? options.clean.kind;
    this.now = options.now ?? (() => new Date());
  }

  async transform(rawKey: string): Promise<TransformResult> {
    const source = routeRawKey(rawKey);
    if (!source) {
      console.warn(`No source family matches ${rawKey}; ignoring`);
      return result(rawKey, 'unrouted', null);
    }

    return this.manifest.exclusive(async (manifest, commit) => {
      const blob = await this.raw.get(rawKey);
      const hash = sha256Hex(blob.body);

      if (manifest.processed[rawKey]?.hash === hash) {
        console.log(`Unchanged ${rawKey}; skipping`);
        return result(rawKey, 'unchanged', source.name);
      }

      let payload: unknown;
      try {
        payload = decodePayload(rawKey, blob.body, blob.contentType);
      } catch (error) {
        if (error instanceof InvalidPayloadError) {
          console.error(`Failed to decode ${rawKey}: ${error.message}`);
          return result(rawKey, 'invalid-payload', source.name);
        }
        throw error;
      }

      const table = source.parse(payload);
      if (table.rows.length === 0) {
        manifest.processed[rawKey] = {
          hash,
          rows: 0,
          written_partitions: 0,
          processed_at: this.now().toISOString(),
        };
        await commit();
        console.warn(`No rows parsed from ${rawKey} (${source.name})`);
        return result(rawKey, 'empty-result', source.name);
      }

      const partitions = await this.writer.writeTable(source.name, table);
      manifest.processed[rawKey] = {
        hash,
        rows: table.rows.length,
        written_partitions: partitions.length,
        processed_at: this.now().toISOString(),
      };
      await commit();

      console.log(`Processed ${rawKey} → ${partitions.length} partitions (${this.label})`);
      return {
        rawKey,
        outcome: 'processed',
        processed: true,
        source: source.name,
        rows: table.rows.length,
        partitions,
      };
    });
  }

  /**
   * Transform keys one after another.
   */
  async transformAll(rawKeys: string[]): Promise<TransformSummary> {
    const results: TransformResult[] = [];
    for (const rawKey of rawKeys) {
      results.push(await this.transform(rawKey));
    }
    return summarize(results);
  }

  /**
   * Transform every object in the raw store.
   */
  async transformPending(prefix = ''): Promise<TransformSummary> {
    const keys = await this.raw.list(prefix);
    console.log(`Found ${keys.length} raw objects in ${this.raw.describe(prefix)}`);
    return this.transformAll(keys);
  }
}

function result(rawKey: string, outcome: TransformOutcome, source: string | null): TransformResult {
  return { rawKey, outcome, processed: false, source, rows: 0, partitions: [] };
}

export function summarize(results: TransformResult[]): TransformSummary {
  const counts: Record<TransformOutcome, number> = {
    unrouted: 0,
    unchanged: 0,
    'invalid-payload': 0,
    'empty-result': 0,
    processed: 0,
  };
  for (const r of results) counts[r.outcome]++;
  return { results, counts };
}
