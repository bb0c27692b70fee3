/**
 * Unit tests for the upstream fetcher and the ingest loop.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { compactTimestamp, fetchPayload, ingestEndpoints, rawObjectKey } from '../fetcher.js';
import { HttpStatusError } from '../errors.js';
import { MemoryBlobStore } from '../storage.js';

// Mock fetch globally
const mockFetch = vi.fn<(url: string) => Promise<Response>>();
vi.stubGlobal('fetch', mockFetch);

const NO_DELAY = { baseDelayMs: 0, maxDelayMs: 0 };

beforeEach(() => {
  mockFetch.mockReset();
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

// ============================================================================
// Helper functions
// ============================================================================

function jsonResponse(data: unknown): Response {
  return new Response(JSON.stringify(data), {
    status: 200,
    headers: { 'content-type': 'application/json; charset=utf-8' },
  });
}

function errorResponse(status: number, message: string): Response {
  return new Response(message, { status });
}

// ============================================================================
// fetchPayload
// ============================================================================

describe('fetchPayload', () => {
  it('returns the body and content type', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ value: [] }));

    const payload = await fetchPayload('https://example.test/gho');

    expect(new TextDecoder().decode(payload.body)).toBe('{"value":[]}');
    expect(payload.contentType).toBe('application/json; charset=utf-8');
    expect(mockFetch).toHaveBeenCalledWith('https://example.test/gho');
  });

  it('defaults the content type to JSON', async () => {
    mockFetch.mockResolvedValueOnce(new Response(new Uint8Array([123, 125])));

    expect((await fetchPayload('https://example.test/x')).contentType).toBe('application/json');
  });

  it('retries server errors', async () => {
    mockFetch
      .mockResolvedValueOnce(errorResponse(503, 'busy'))
      .mockResolvedValueOnce(errorResponse(429, 'slow down'))
      .mockResolvedValueOnce(jsonResponse({ ok: true }));

    const payload = await fetchPayload('https://example.test/x', { maxRetries: 3, ...NO_DELAY });

    expect(new TextDecoder().decode(payload.body)).toBe('{"ok":true}');
    expect(mockFetch).toHaveBeenCalledTimes(3);
  });

  it('does not retry client errors', async () => {
    mockFetch.mockResolvedValue(errorResponse(404, 'missing'));

    const attempt = fetchPayload('https://example.test/x', { maxRetries: 3, ...NO_DELAY });

    await expect(attempt).rejects.toBeInstanceOf(HttpStatusError);
    await expect(attempt).rejects.toThrow('HTTP 404 from https://example.test/x: missing');
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it('gives up after the last retry', async () => {
    mockFetch.mockRejectedValue(new TypeError('fetch failed'));

    await expect(fetchPayload('https://example.test/x', { maxRetries: 2, ...NO_DELAY })).rejects.toThrow(
      'fetch failed'
    );
    expect(mockFetch).toHaveBeenCalledTimes(3);
  });
});

// ============================================================================
// Raw keys
// ============================================================================

describe('compactTimestamp', () => {
  it('drops separators and milliseconds', () => {
    expect(compactTimestamp(new Date('2024-05-01T12:00:00.123Z'))).toBe('20240501T120000Z');
  });
});

describe('rawObjectKey', () => {
  const date = new Date('2024-05-01T12:00:00Z');

  it('names the object after the endpoint and fetch time', () => {
    expect(rawObjectKey('cholera', 'text/csv', date)).toMatch(/^cholera\/20240501T120000Z-[0-9a-f]{32}\.csv$/);
    expect(rawObjectKey('cholera', 'application/json', date)).toMatch(
      /^cholera\/20240501T120000Z-[0-9a-f]{32}\.json$/
    );
  });

  it('never repeats a key', () => {
    expect(rawObjectKey('cholera', 'application/json', date)).not.toBe(
      rawObjectKey('cholera', 'application/json', date)
    );
  });
});

// ============================================================================
// ingestEndpoints
// ============================================================================

describe('ingestEndpoints', () => {
  it('stores each payload and isolates failures', async () => {
    mockFetch.mockImplementation(async (url) =>
      url.includes('cholera') ? errorResponse(500, 'down') : jsonResponse({ value: [1] })
    );
    const raw = new MemoryBlobStore('raw');

    const results = await ingestEndpoints(
      [
        { name: 'life_expectancy', url: 'https://example.test/life' },
        { name: 'cholera', url: 'https://example.test/cholera' },
      ],
      raw,
      { retry: { maxRetries: 0 }, now: () => new Date('2024-05-01T12:00:00Z') }
    );

    expect(results.map((r) => [r.name, r.bytes, r.error])).toEqual([
      ['life_expectancy', 13, null],
      ['cholera', 0, 'HTTP 500 from https://example.test/cholera: down'],
    ]);
    expect(results[1]?.key).toBeNull();

    const key = results[0]?.key ?? '';
    expect(key).toMatch(/^life_expectancy\/20240501T120000Z-[0-9a-f]{32}\.json$/);
    expect(await raw.list()).toEqual([key]);
    const blob = await raw.get(key);
    expect(new TextDecoder().decode(blob.body)).toBe('{"value":[1]}');
    expect(blob.contentType).toBe('application/json; charset=utf-8');
  });
});
