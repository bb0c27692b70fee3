/**
 * Upstream fetcher: GET with bounded exponential backoff, and the ingest loop
 * that lands each endpoint's payload in the raw store.
 */
import { randomBytes } from 'node:crypto';
import pLimit from 'p-limit';
import type { BlobStore } from './storage.js';
import { HttpStatusError } from './errors.js';

// ============================================================================
// Types
// ============================================================================

export interface FetchedPayload {
  body: Uint8Array;
  contentType: string;
}

export interface RetryOptions {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface IngestEndpoint {
  name: string;
  url: string;
}

export interface IngestResult {
  name: string;
  url: string;
  key: string | null;
  bytes: number;
  error: string | null;
}

export interface IngestOptions {
  concurrency?: number;
  retry?: Partial<RetryOptions>;
  now?: () => Date;
}

// ============================================================================
// Retry Logic
// ============================================================================

const DEFAULT_RETRY: RetryOptions = {
  maxRetries: 3,
  baseDelayMs: 1500,
  maxDelayMs: 30000,
};

async function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * GET a URL and return its bytes. Network errors, 429 and 5xx are retried;
 * other statuses fail immediately.
 */
export async function fetchPayload(
  url: string,
  retry: Partial<RetryOptions> = {}
): Promise<FetchedPayload> {
  const options = { ...DEFAULT_RETRY, ...retry };
  let lastError: Error | null = null;

  for (let attempt = 0; attempt <= options.maxRetries; attempt++) {
    try {
      const res = await fetch(url);
      if (!res.ok) {
        throw new HttpStatusError(url, res.status, await res.text());
      }
      return {
        body: new Uint8Array(await res.arrayBuffer()),
        contentType: res.headers.get('content-type') ?? 'application/json',
      };
    } catch (err) {
      lastError = err instanceof Error ? err : new Error(String(err));
      if (lastError instanceof HttpStatusError && !lastError.retryable) {
        throw lastError;
      }

      if (attempt < options.maxRetries) {
        const delay = Math.min(
          options.baseDelayMs * Math.pow(2, attempt),
          options.maxDelayMs
        );
        console.warn(
          `Fetch failed (attempt ${attempt + 1}/${options.maxRetries + 1}): ${lastError.message}. Retrying in ${delay}ms...`
        );
        await sleep(delay);
      }
    }
  }

  throw lastError ?? new Error(`Fetch failed: ${url}`);
}

// ============================================================================
// Ingest
// ============================================================================

/** `20240501T120000Z` */
export function compactTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z').replace(/[-:]/g, '');
}

export function rawObjectKey(name: string, contentType: string, date: Date): string {
  const ext = contentType.toLowerCase().includes('csv') ? 'csv' : 'json';
  return `${name}/${compactTimestamp(date)}-${randomBytes(16).toString('hex')}.${ext}`;
}

/**
 * Fetch every endpoint into the raw store. A failed endpoint is reported in
 * its result and does not stop the others.
 */
export async function ingestEndpoints(
  endpoints: IngestEndpoint[],
  raw: BlobStore,
  options: IngestOptions = {}
): Promise<IngestResult[]> {
  const limit = pLimit(options.concurrency ?? 2);
  const now = options.now ?? (() => new Date());

  return Promise.all(
    endpoints.map((endpoint) =>
      limit(async (): Promise<IngestResult> => {
        try {
          const payload = await fetchPayload(endpoint.url, options.retry);
          const key = rawObjectKey(endpoint.name, payload.contentType, now());
          await raw.put(key, payload.body, payload.contentType);
          console.log(`Fetched ${endpoint.name} → ${raw.describe(key)} (${payload.body.byteLength} bytes)`);
          return { name: endpoint.name, url: endpoint.url, key, bytes: payload.body.byteLength, error: null };
        } catch (err) {
          const message = err instanceof Error ? err.message : String(err);
          console.error(`Failed to ingest ${endpoint.name}: ${message}`);
          return { name: endpoint.name, url: endpoint.url, key: null, bytes: 0, error: message };
        }
      })
    )
  );
}
