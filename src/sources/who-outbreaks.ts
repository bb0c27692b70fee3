/**
 * WHO Disease Outbreak News parser.
 *
 * The news API is an OData feed: `{ value: [{ Id, Title, Summary, PublicationDate, ... }] }`.
 * Summaries arrive as HTML fragments and are reduced to plain text.
 */
import { load } from 'cheerio';
import { columns, type OutbreakRecord, type Table } from '../schemas/records.js';
import { asString, getField, recordList } from '../core/schema-normalizer.js';
import { extractCountry, extractDisease, type CountryLookup } from '../utils/title-extractor.js';

const WHO_SITE = 'https://www.who.int';

export const OUTBREAK_FIELDS = {
  id: ['Id', 'DonId', 'UrlName'],
  title: ['Title', 'OverrideTitle'],
  summary: ['Summary', 'Overview'],
  publicationDate: ['PublicationDate', 'PublicationDateAndTime'],
  url: 'Url',
  itemPath: 'ItemDefaultUrl',
};

export const OUTBREAK_COLUMNS = columns<OutbreakRecord>([
  { name: 'outbreak_id', type: 'STRING' },
  { name: 'title', type: 'STRING' },
  { name: 'summary', type: 'STRING' },
  { name: 'publication_date', type: 'TIMESTAMP' },
  { name: 'year', type: 'INT32' },
  { name: 'source_url', type: 'STRING' },
  { name: 'country', type: 'STRING' },
  { name: 'country_iso2', type: 'STRING' },
  { name: 'country_iso3', type: 'STRING' },
  { name: 'disease', type: 'STRING' },
]);

/**
 * HTML fragment to plain text with entities decoded and whitespace collapsed.
 */
export function htmlToText(html: string | null): string | null {
  if (html === null) return null;
  const text = load(html).text().replace(/\s+/g, ' ').trim();
  return text || null;
}

function parseDate(value: unknown): Date | null {
  if (typeof value !== 'string' && typeof value !== 'number') return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

function sourceUrl(record: Record<string, unknown>): string | null {
  const url = asString(getField(record, OUTBREAK_FIELDS.url));
  if (url) return url;

  const path = asString(getField(record, OUTBREAK_FIELDS.itemPath));
  if (!path) return null;
  return `${WHO_SITE}/${path.replace(/^\/+/, '')}`;
}

/**
 * Rows without a parseable publication date are dropped; the year partition
 * is derived from it.
 */
export function parseOutbreaks(payload: unknown, lookup?: CountryLookup): Table<OutbreakRecord> {
  const rows: OutbreakRecord[] = [];

  for (const record of recordList(payload)) {
    const publicationDate = parseDate(getField(record, OUTBREAK_FIELDS.publicationDate));
    if (!publicationDate) continue;

    const title = asString(getField(record, OUTBREAK_FIELDS.title));
    rows.push({
      outbreak_id: asString(getField(record, OUTBREAK_FIELDS.id)),
      title,
      summary: htmlToText(asString(getField(record, OUTBREAK_FIELDS.summary))),
      publication_date: publicationDate,
      year: publicationDate.getUTCFullYear(),
      source_url: sourceUrl(record),
      ...extractCountry(title, lookup),
      disease: extractDisease(title),
    });
  }

  return { columns: OUTBREAK_COLUMNS, rows };
}
