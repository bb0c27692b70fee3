/**
 * ETL manifest: the idempotency ledger mapping each raw object key to the
 * content hash it was last processed with.
 *
 * One JSON document per clean root, rewritten whole on every update.
 */
import pLimit from 'p-limit';
import type { BlobStore } from './storage.js';
import { BlobNotFoundError, ManifestCorruptError } from './errors.js';

// ============================================================================
// Types
// ============================================================================

export interface ManifestEntry {
  hash: string;
  rows: number;
  written_partitions: number;
  processed_at: string;
}

export interface Manifest {
  processed: Record<string, ManifestEntry>;
}

export const MANIFEST_KEY = 'manifest/etl_manifest.json';

// ============================================================================
// Validation
// ============================================================================

function isManifestEntry(value: unknown): value is ManifestEntry {
  if (typeof value !== 'object' || value === null) return false;
  const partitions: unknown = Reflect.get(value, 'written_partitions');
  return (
    typeof Reflect.get(value, 'hash') === 'string' &&
    typeof Reflect.get(value, 'rows') === 'number' &&
    // older manifests omit the partition count on zero-row entries
    (partitions === undefined || typeof partitions === 'number') &&
    typeof Reflect.get(value, 'processed_at') === 'string'
  );
}

export function parseManifest(text: string, key = MANIFEST_KEY): Manifest {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new ManifestCorruptError(key, error instanceof Error ? error.message : String(error));
  }

  if (typeof data !== 'object' || data === null || !('processed' in data)) {
    throw new ManifestCorruptError(key, 'missing "processed" map');
  }

  const processed = data.processed;
  if (typeof processed !== 'object' || processed === null || Array.isArray(processed)) {
    throw new ManifestCorruptError(key, '"processed" is not an object');
  }

  const entries: Record<string, ManifestEntry> = {};
  for (const [rawKey, entry] of Object.entries(processed)) {
    if (!isManifestEntry(entry)) {
      throw new ManifestCorruptError(key, `malformed entry for ${rawKey}`);
    }
    entries[rawKey] = {
      hash: entry.hash,
      rows: entry.rows,
      written_partitions: entry.written_partitions ?? 0,
      processed_at: entry.processed_at,
    };
  }

  return { processed: entries };
}

// ============================================================================
// Store
// ============================================================================

export class ManifestStore {
  // Serializes read-modify-write cycles issued through this instance
  private readonly lock = pLimit(1);

  constructor(
    private readonly store: BlobStore,
    readonly key: string = MANIFEST_KEY
  ) {}

  /**
   * Read the manifest. A missing blob is an empty manifest, not an error.
   */
  async load(): Promise<Manifest> {
    let text: string;
    try {
      const blob = await this.store.get(this.key);
      text = new TextDecoder().decode(blob.body);
    } catch (error) {
      if (error instanceof BlobNotFoundError) {
        return { processed: {} };
      }
      throw error;
    }
    return parseManifest(text, this.key);
  }

  async save(manifest: Manifest): Promise<void> {
    const body = new TextEncoder().encode(JSON.stringify(manifest, null, 2));
    await this.store.put(this.key, body, 'application/json');
  }

  /**
   * Run `work` against a freshly loaded manifest while holding this store's
   * lock. `commit` persists the (mutated) document; work that never calls it
   * leaves the stored manifest untouched.
   */
  exclusive<T>(
    work: (manifest: Manifest, commit: () => Promise<void>) => Promise<T>
  ): Promise<T> {
    return this.lock(async () => {
      const manifest = await this.load();
      return work(manifest, () => this.save(manifest));
    });
  }

  async get(rawKey: string): Promise<ManifestEntry | null> {
    const manifest = await this.load();
    return manifest.processed[rawKey] ?? null;
  }
}
