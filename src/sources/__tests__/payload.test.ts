/**
 * Unit tests for raw payload decoding.
 */
import { describe, it, expect } from 'vitest';
import { decodePayload, detectFormat } from '../payload.js';
import { InvalidPayloadError } from '../../core/errors.js';

const encode = (text: string) => new TextEncoder().encode(text);

describe('detectFormat', () => {
  it('prefers the content type', () => {
    expect(detectFormat('x.json', 'text/csv; charset=utf-8')).toBe('csv');
    expect(detectFormat('x.csv', 'application/json')).toBe('json');
  });

  it('falls back to the key extension', () => {
    expect(detectFormat('cholera/1.CSV')).toBe('csv');
    expect(detectFormat('cholera/1.json')).toBe('json');
  });
});

describe('decodePayload', () => {
  it('parses JSON documents', () => {
    expect(decodePayload('a.json', encode('{"value":[{"x":1}]}'))).toEqual({ value: [{ x: 1 }] });
  });

  it('parses CSV into header-keyed records, dropping a byte-order mark', () => {
    const records = decodePayload('a.csv', encode('\uFEFFSpatialDim,TimeDim\nNGA, 2021\n\n'), 'text/csv');
    expect(records).toEqual([{ SpatialDim: 'NGA', TimeDim: '2021' }]);
  });

  it('raises InvalidPayloadError on malformed JSON', () => {
    expect(() => decodePayload('a.json', encode('{"value": ['))).toThrow(InvalidPayloadError);
  });

  it('raises InvalidPayloadError on bytes that are not UTF-8', () => {
    expect(() => decodePayload('a.json', new Uint8Array([0xff, 0xfe, 0xfd]))).toThrow('not valid UTF-8');
  });
});
