/**
 * Country and disease extraction from outbreak news titles, e.g.
 * "Cholera - Democratic Republic of the Congo" or
 * "Marburg virus disease situation in Rwanda".
 */
import { readFileSync } from 'node:fs';
import type { CountryIdentity } from '../schemas/records.js';

// ============================================================================
// Reference data
// ============================================================================

interface CountryEntry {
  name: string;
  alpha2: string;
  alpha3: string;
  official_name?: string;
  common_name?: string;
}

export interface CountryLookup {
  /** Lowercased name, official name, common name or alias to country */
  byName: Map<string, CountryEntry>;
}

const COUNTRIES_URL = new URL('../../data/reference/countries.json', import.meta.url);
const ALIASES_URL = new URL('../../data/reference/country-aliases.json', import.meta.url);

function readJson(url: URL): unknown {
  return JSON.parse(readFileSync(url, 'utf-8'));
}

function isCountryEntry(value: unknown): value is CountryEntry {
  return (
    typeof value === 'object' &&
    value !== null &&
    typeof Reflect.get(value, 'name') === 'string' &&
    typeof Reflect.get(value, 'alpha2') === 'string' &&
    typeof Reflect.get(value, 'alpha3') === 'string'
  );
}

export function buildCountryLookup(
  countries: CountryEntry[],
  aliases: Record<string, string>
): CountryLookup {
  const byName = new Map<string, CountryEntry>();
  const byCanonical = new Map<string, CountryEntry>();

  for (const country of countries) {
    byCanonical.set(country.name, country);
    for (const label of [country.name, country.official_name, country.common_name]) {
      if (label) byName.set(label.toLowerCase(), country);
    }
  }

  for (const [alias, canonical] of Object.entries(aliases)) {
    const country = byCanonical.get(canonical);
    if (country) byName.set(alias.toLowerCase(), country);
  }

  return { byName };
}

let defaultLookup: CountryLookup | null = null;

/** Lookup built from data/reference, loaded on first use. */
export function countryLookup(): CountryLookup {
  if (!defaultLookup) {
    const countries = readJson(COUNTRIES_URL);
    const aliases = readJson(ALIASES_URL);
    const entries = Array.isArray(countries) ? countries.filter(isCountryEntry) : [];
    const aliasMap: Record<string, string> = {};
    if (typeof aliases === 'object' && aliases !== null) {
      for (const [alias, canonical] of Object.entries(aliases)) {
        if (typeof canonical === 'string') aliasMap[alias] = canonical;
      }
    }
    defaultLookup = buildCountryLookup(entries, aliasMap);
  }
  return defaultLookup;
}

// ============================================================================
// Country extraction
// ============================================================================

const NO_COUNTRY: CountryIdentity = { country: null, country_iso2: null, country_iso3: null };

const MAX_CANDIDATE_LENGTH = 40;

// Unicode dashes always split; a hyphen-minus only when spaced, so
// "Guinea-Bissau" and "MERS-CoV" stay whole
const DASH_SPLIT = /\s+-\s*|\s*-\s+|\s*[‐‑‒–—―]\s*/;
const LEAD_IN = /^.*?\b(?:situation|cases|outbreak|reported)\s+in\s+/i;
const PREPOSITION_PHRASE = /\b(?:reported in|in|from)\s+([A-Z][\w'’.,()\- ]{1,39})/g;

type CountryStrategy = (title: string, lookup: CountryLookup) => CountryIdentity | null;

function resolveCandidate(candidate: string, lookup: CountryLookup): CountryIdentity | null {
  const cleaned = candidate.replace(LEAD_IN, '').trim().replace(/[.,;:]+$/, '').trim();
  if (!cleaned || cleaned.length > MAX_CANDIDATE_LENGTH) return null;

  const country = lookup.byName.get(cleaned.toLowerCase());
  if (!country) return null;
  return { country: country.name, country_iso2: country.alpha2, country_iso3: country.alpha3 };
}

/** "Disease - Country": try dash segments right to left. */
const fromDashSegments: CountryStrategy = (title, lookup) => {
  const segments = title.split(DASH_SPLIT);
  for (let i = segments.length - 1; i >= 0; i--) {
    const match = resolveCandidate(segments[i] ?? '', lookup);
    if (match) return match;
  }
  return null;
};

/** "... in Country ...": longest leading word run after the preposition wins. */
const fromPrepositionPhrase: CountryStrategy = (title, lookup) => {
  for (const match of title.matchAll(PREPOSITION_PHRASE)) {
    const words = (match[1] ?? '').trim().split(/\s+/);
    for (let n = words.length; n > 0; n--) {
      const hit = resolveCandidate(words.slice(0, n).join(' '), lookup);
      if (hit) return hit;
    }
  }
  return null;
};

const COUNTRY_STRATEGIES: CountryStrategy[] = [fromDashSegments, fromPrepositionPhrase];

export function extractCountry(
  title: string | null | undefined,
  lookup: CountryLookup = countryLookup()
): CountryIdentity {
  if (!title) return NO_COUNTRY;
  for (const strategy of COUNTRY_STRATEGIES) {
    const match = strategy(title, lookup);
    if (match) return match;
  }
  return NO_COUNTRY;
}

// ============================================================================
// Disease extraction
// ============================================================================

const DISEASE_TRAILER = /\s*\b(?:situation(?:\s+in)?|update|cases?)\b.*$/i;

/**
 * Disease name: the first dash segment with any "situation in"/"update"/"cases"
 * trailer removed.
 */
export function extractDisease(title: string | null | undefined): string | null {
  if (!title) return null;
  const first = title.split(DASH_SPLIT)[0] ?? '';
  const disease = first.replace(DISEASE_TRAILER, '').trim();
  return disease || null;
}
