/**
 * Raw payload decoding. Upstream APIs answer with JSON or CSV; parsers see
 * the decoded value (a document, or a list of header-keyed records).
 */
import { parse as parseCsv } from 'csv-parse/sync';
import { InvalidPayloadError } from '../core/errors.js';

export type PayloadFormat = 'json' | 'csv';

export function detectFormat(key: string, contentType?: string): PayloadFormat {
  if (contentType && contentType.toLowerCase().includes('csv')) return 'csv';
  if (!contentType && key.toLowerCase().endsWith('.csv')) return 'csv';
  return 'json';
}

export function decodePayload(
  key: string,
  body: Uint8Array,
  contentType?: string
): unknown {
  const format = detectFormat(key, contentType);

  let text: string;
  try {
    text = new TextDecoder('utf-8', { fatal: true }).decode(body);
  } catch {
    throw new InvalidPayloadError(key, format, 'not valid UTF-8');
  }
  // Strip a byte-order mark; some CSV exports carry one
  text = text.replace(/^\uFEFF/, '');

  if (format === 'csv') {
    try {
      const records: unknown = parseCsv(text, {
        columns: true,
        skip_empty_lines: true,
        trim: true,
      });
      return records;
    } catch (error) {
      throw new InvalidPayloadError(key, format, error instanceof Error ? error.message : String(error));
    }
  }

  try {
    const document: unknown = JSON.parse(text);
    return document;
  } catch (error) {
    throw new InvalidPayloadError(key, format, error instanceof Error ? error.message : String(error));
  }
}
