/**
 * World Bank indicator API (v2, format=json).
 *
 * Payload is a two-element array: [pageInfo, records]. Each record carries
 * `countryiso3code`, `date` (year as a string), `value` and `indicator.id`.
 */
import { normalizeIndicators, recordList, type IndicatorFieldMapping } from '../core/schema-normalizer.js';
import { columns, type Table, type WorldBankRecord } from '../schemas/records.js';

export const WORLDBANK_FIELDS: IndicatorFieldMapping = {
  countryCode: 'countryiso3code',
  year: 'date',
  value: 'value',
  identifier: ['indicator.id', 'indicator_id'],
};

/**
 * Records from `[pageInfo, records]`, or from a bare list / `{ value: [...] }`.
 */
export function worldBankRecords(payload: unknown): Record<string, unknown>[] {
  if (
    Array.isArray(payload) &&
    payload.length >= 2 &&
    !Array.isArray(payload[0]) &&
    Array.isArray(payload[1])
  ) {
    return recordList(payload[1]);
  }
  return recordList(payload);
}

export function parseWorldBank(payload: unknown): Table<WorldBankRecord> {
  const rows = normalizeIndicators(worldBankRecords(payload), WORLDBANK_FIELDS).map(
    ({ identifier, ...row }): WorldBankRecord => ({ ...row, indicator_id: identifier })
  );

  return {
    columns: columns<WorldBankRecord>([
      { name: 'country_code', type: 'STRING' },
      { name: 'year', type: 'INT32' },
      { name: 'value', type: 'DOUBLE' },
      { name: 'indicator_id', type: 'STRING' },
    ]),
    rows,
  };
}
