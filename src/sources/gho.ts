/**
 * WHO Global Health Observatory (GHO) OData indicators.
 *
 * Payload: { "value": [{ "SpatialDim": "NGA", "TimeDim": 2021, "NumericValue": 52.3, "IndicatorCode": "..." }] }
 */
import { normalizeIndicators, recordList, type IndicatorFieldMapping } from '../core/schema-normalizer.js';
import { columns, type GhoRecord, type Table } from '../schemas/records.js';

export const GHO_FIELDS: IndicatorFieldMapping = {
  countryCode: 'SpatialDim',
  year: 'TimeDim',
  value: 'NumericValue',
  identifier: 'IndicatorCode',
};

export function parseGho(payload: unknown): Table<GhoRecord> {
  const rows = normalizeIndicators(recordList(payload), GHO_FIELDS).map(
    ({ identifier, ...row }): GhoRecord => ({ ...row, indicator_code: identifier })
  );

  return {
    columns: columns<GhoRecord>([
      { name: 'country_code', type: 'STRING' },
      { name: 'year', type: 'INT32' },
      { name: 'value', type: 'DOUBLE' },
      { name: 'indicator_code', type: 'STRING' },
    ]),
    rows,
  };
}
