/**
 * Source registry for public-health datasets.
 * Defines upstream endpoints and the parser each raw payload is routed to.
 */
import { parseGho } from '../sources/gho.js';
import { parseWorldBank } from '../sources/worldbank.js';
import { parseOutbreaks } from '../sources/who-outbreaks.js';
import type { Table } from '../schemas/records.js';

// ============================================================================
// Types
// ============================================================================

export type SourceFamily = 'gho' | 'worldbank' | 'outbreaks';

export interface SourceDefinition {
  /** Endpoint name; raw keys and clean datasets are named after it */
  name: string;
  family: SourceFamily;
  /** Upstream URL fetched by the ingest pipeline */
  url: string;
  /** Indicator code or series id, where the endpoint has one */
  indicator?: string;
  parse: (payload: unknown) => Table;
  attribution: string;
}

const GHO_API = 'https://ghoapi.azureedge.net/api';
const WORLDBANK_API = 'https://api.worldbank.org/v2/country/all/indicator';

function worldBankUrl(indicator: string): string {
  return `${WORLDBANK_API}/${indicator}?format=json&date=2000:2024&per_page=20000`;
}

// ============================================================================
// WHO Global Health Observatory
// ============================================================================

export const LIFE_EXPECTANCY: SourceDefinition = {
  name: 'life_expectancy',
  family: 'gho',
  url: `${GHO_API}/WHOSIS_000001?$filter=(TimeDim ge 2000)`,
  indicator: 'WHOSIS_000001',
  parse: parseGho,
  attribution: 'WHO Global Health Observatory',
};

export const MALARIA_INCIDENCE: SourceDefinition = {
  name: 'malaria_incidence',
  family: 'gho',
  url: `${GHO_API}/MALARIA_EST_INCIDENCE?$filter=(TimeDim ge 2020)`,
  indicator: 'MALARIA_EST_INCIDENCE',
  parse: parseGho,
  attribution: 'WHO Global Health Observatory',
};

export const CHOLERA: SourceDefinition = {
  name: 'cholera',
  family: 'gho',
  url: `${GHO_API}/CHOLERA_0000000001?$filter=(TimeDim ge 2000)`,
  indicator: 'CHOLERA_0000000001',
  parse: parseGho,
  attribution: 'WHO Global Health Observatory',
};

// ============================================================================
// WHO Disease Outbreak News
// ============================================================================

export const WHO_OUTBREAKS: SourceDefinition = {
  name: 'who_outbreaks',
  family: 'outbreaks',
  url: 'https://www.who.int/api/news/diseaseoutbreaknews',
  parse: parseOutbreaks,
  attribution: 'WHO Disease Outbreak News',
};

// ============================================================================
// World Bank
// ============================================================================

export const WB_HOSPITAL_BEDS: SourceDefinition = {
  name: 'wb_hospital_beds_per_1000',
  family: 'worldbank',
  url: worldBankUrl('SH.MED.BEDS.ZS'),
  indicator: 'SH.MED.BEDS.ZS',
  parse: parseWorldBank,
  attribution: 'World Bank World Development Indicators',
};

export const WB_PHYSICIANS: SourceDefinition = {
  name: 'wb_physicians_per_1000',
  family: 'worldbank',
  url: worldBankUrl('SH.MED.PHYS.ZS'),
  indicator: 'SH.MED.PHYS.ZS',
  parse: parseWorldBank,
  attribution: 'World Bank World Development Indicators',
};

// ============================================================================
// Registry
// ============================================================================

/** Routing order: the first name contained in a raw key wins. */
export const SOURCES: readonly SourceDefinition[] = [
  LIFE_EXPECTANCY,
  MALARIA_INCIDENCE,
  CHOLERA,
  WHO_OUTBREAKS,
  WB_HOSPITAL_BEDS,
  WB_PHYSICIANS,
];

export function getSource(name: string): SourceDefinition {
  const source = SOURCES.find((s) => s.name === name);
  if (!source) {
    throw new Error(`Unknown source: ${name}. Available: ${SOURCES.map((s) => s.name).join(', ')}`);
  }
  return source;
}

export function listSources(): SourceDefinition[] {
  return [...SOURCES];
}

export function listSourcesByFamily(family: SourceFamily): SourceDefinition[] {
  return SOURCES.filter((s) => s.family === family);
}

/**
 * Source for a raw object key, by substring match, or null.
 */
export function routeRawKey(rawKey: string): SourceDefinition | null {
  return SOURCES.find((s) => rawKey.includes(s.name)) ?? null;
}
