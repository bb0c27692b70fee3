/**
 * Blob storage backends.
 *
 * Every component addresses data by logical key (`life_expectancy/year=2021/data.parquet`);
 * the backend decides whether that lands under a local directory or an S3 bucket/prefix.
 */
import { mkdir, readFile, readdir, rename, stat, writeFile } from 'node:fs/promises';
import { dirname, join, resolve, sep } from 'node:path';
import { randomBytes } from 'node:crypto';
import {
  GetObjectCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  type S3Client,
} from '@aws-sdk/client-s3';
import { BlobNotFoundError } from './errors.js';

// ============================================================================
// Types
// ============================================================================

export interface StoredBlob {
  body: Uint8Array;
  contentType?: string;
}

export interface BlobStore {
  readonly kind: 'fs' | 's3' | 'memory';
  /** Read a blob. Throws BlobNotFoundError if the key does not exist. */
  get(key: string): Promise<StoredBlob>;
  /** Write a blob, replacing whatever was stored under the key. */
  put(key: string, body: Uint8Array, contentType: string): Promise<void>;
  /** Keys under a prefix, sorted. */
  list(prefix?: string): Promise<string[]>;
  /** Path or URI of a key, for logs and engine registration. */
  describe(key: string): string;
}

function joinKey(prefix: string, key: string): string {
  const cleanKey = key.replace(/^\/+/, '');
  return prefix ? `${prefix}/${cleanKey}` : cleanKey;
}

// ============================================================================
// Local filesystem
// ============================================================================

export class FsBlobStore implements BlobStore {
  readonly kind = 'fs';
  readonly root: string;

  constructor(root: string) {
    this.root = resolve(root);
  }

  describe(key: string): string {
    return this.resolveKey(key);
  }

  private resolveKey(key: string): string {
    const path = resolve(this.root, key.replace(/^\/+/, ''));
    if (path !== this.root && !path.startsWith(this.root + sep)) {
      throw new Error(`Key escapes storage root: ${key}`);
    }
    return path;
  }

  async get(key: string): Promise<StoredBlob> {
    const path = this.resolveKey(key);
    try {
      const body = await readFile(path);
      return { body: new Uint8Array(body.buffer, body.byteOffset, body.byteLength) };
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT') || isErrnoCode(error, 'EISDIR')) {
        throw new BlobNotFoundError(key, path);
      }
      throw error;
    }
  }

  async put(key: string, body: Uint8Array, _contentType: string): Promise<void> {
    const path = this.resolveKey(key);
    await mkdir(dirname(path), { recursive: true });

    // Write beside the target and rename so readers never see a partial file
    const tmpPath = `${path}.${randomBytes(6).toString('hex')}.tmp`;
    await writeFile(tmpPath, body);
    await rename(tmpPath, path);
  }

  async list(prefix = ''): Promise<string[]> {
    let entries: string[];
    try {
      entries = await readdir(this.root, { recursive: true });
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT')) return [];
      throw error;
    }

    const keys: string[] = [];
    for (const entry of entries) {
      const key = entry.split(sep).join('/');
      if (!key.startsWith(prefix) || key.endsWith('.tmp')) continue;
      // readdir lists directories too; keep files only
      if (await isFile(join(this.root, entry))) keys.push(key);
    }
    return keys.sort();
  }
}

function isErrnoCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

// ============================================================================
// S3
// ============================================================================

export class S3BlobStore implements BlobStore {
  readonly kind = 's3';

  constructor(
    private readonly client: S3Client,
    readonly bucket: string,
    readonly prefix = ''
  ) {}

  describe(key: string): string {
    return `s3://${this.bucket}/${joinKey(this.prefix, key)}`;
  }

  /** Object key (bucket-relative) for a logical key. */
  objectKey(key: string): string {
    return joinKey(this.prefix, key);
  }

  async get(key: string): Promise<StoredBlob> {
    try {
      const response = await this.client.send(
        new GetObjectCommand({ Bucket: this.bucket, Key: this.objectKey(key) })
      );
      if (!response.Body) {
        throw new BlobNotFoundError(key, this.describe(key));
      }
      return {
        body: await response.Body.transformToByteArray(),
        contentType: response.ContentType,
      };
    } catch (error) {
      if (error instanceof Error && (error.name === 'NoSuchKey' || error.name === 'NotFound')) {
        throw new BlobNotFoundError(key, this.describe(key));
      }
      throw error;
    }
  }

  async put(key: string, body: Uint8Array, contentType: string): Promise<void> {
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: this.objectKey(key),
        Body: body,
        ContentType: contentType,
      })
    );
  }

  async list(prefix = ''): Promise<string[]> {
    const fullPrefix = this.prefix ? `${this.prefix}/${prefix}` : prefix;
    const keys: string[] = [];
    let continuationToken: string | undefined;

    do {
      const page = await this.client.send(
        new ListObjectsV2Command({
          Bucket: this.bucket,
          Prefix: fullPrefix,
          ContinuationToken: continuationToken,
        })
      );
      for (const object of page.Contents ?? []) {
        if (!object.Key || object.Key.endsWith('/')) continue;
        keys.push(this.prefix ? object.Key.slice(this.prefix.length + 1) : object.Key);
      }
      continuationToken = page.IsTruncated ? page.NextContinuationToken : undefined;
    } while (continuationToken);

    return keys.sort();
  }
}

// ============================================================================
// In-memory
// ============================================================================

export class MemoryBlobStore implements BlobStore {
  readonly kind = 'memory';
  private readonly blobs = new Map<string, StoredBlob>();
  /** Every put, in order. */
  readonly writes: Array<{ key: string; contentType: string; size: number }> = [];

  constructor(readonly label = 'memory') {}

  describe(key: string): string {
    return `${this.label}://${key}`;
  }

  async get(key: string): Promise<StoredBlob> {
    const blob = this.blobs.get(key);
    if (!blob) throw new BlobNotFoundError(key, this.describe(key));
    return { body: blob.body.slice(), contentType: blob.contentType };
  }

  async put(key: string, body: Uint8Array, contentType: string): Promise<void> {
    this.blobs.set(key, { body: body.slice(), contentType });
    this.writes.push({ key, contentType, size: body.byteLength });
  }

  async list(prefix = ''): Promise<string[]> {
    return [...this.blobs.keys()].filter((key) => key.startsWith(prefix)).sort();
  }

  has(key: string): boolean {
    return this.blobs.has(key);
  }
}
