/**
 * Unit tests for country and disease extraction from outbreak titles.
 */
import { describe, it, expect } from 'vitest';
import {
  buildCountryLookup,
  countryLookup,
  extractCountry,
  extractDisease,
} from '../title-extractor.js';

describe('extractCountry', () => {
  it('matches the last dash segment', () => {
    expect(extractCountry('Cholera - Haiti')).toEqual({
      country: 'Haiti',
      country_iso2: 'HT',
      country_iso3: 'HTI',
    });
  });

  it('strips a lead-in phrase inside a segment', () => {
    expect(extractCountry('Cholera – situation in Nigeria').country_iso3).toBe('NGA');
  });

  it('splits on every Unicode dash', () => {
    expect(extractCountry('Mpox — Uganda').country_iso3).toBe('UGA');
    expect(extractCountry('Mpox ‒ Uganda').country_iso3).toBe('UGA');
  });

  it('keeps hyphenated country names whole', () => {
    expect(extractCountry('Marburg virus disease - Guinea-Bissau').country_iso3).toBe('GNB');
    expect(extractCountry('Dengue - Timor-Leste').country_iso3).toBe('TLS');
  });

  it('tries segments right to left', () => {
    expect(extractCountry('Yellow fever - Kenya - update').country_iso3).toBe('KEN');
  });

  it('resolves aliases to official names', () => {
    expect(extractCountry('Yellow fever - Bolivia')).toEqual({
      country: 'Bolivia, Plurinational State of',
      country_iso2: 'BO',
      country_iso3: 'BOL',
    });
    expect(extractCountry('Ebola virus disease - Democratic Republic of the Congo').country_iso3).toBe('COD');
    expect(extractCountry('Avian influenza - Viet Nam').country_iso3).toBe('VNM');
    expect(extractCountry('Avian influenza - Vietnam').country_iso3).toBe('VNM');
  });

  it('matches official and common names case-insensitively', () => {
    expect(extractCountry('Cholera - REPUBLIC OF THE SUDAN').country_iso3).toBe('SDN');
    expect(extractCountry('MERS-CoV - Kingdom of Saudi Arabia').country_iso3).toBe('SAU');
  });

  it('falls back to a preposition phrase', () => {
    expect(extractCountry('Marburg virus disease situation in Rwanda').country_iso3).toBe('RWA');
    expect(extractCountry('Meningitis cases reported in Niger, 2024').country_iso3).toBe('NER');
    expect(extractCountry('Imported polio from Pakistan detected').country_iso3).toBe('PAK');
  });

  it('prefers the longest phrase after a preposition', () => {
    expect(extractCountry('Cholera outbreak in South Sudan').country_iso3).toBe('SSD');
    expect(extractCountry('Outbreak in Papua New Guinea').country_iso3).toBe('PNG');
  });

  it('returns the all-null triple when nothing matches', () => {
    const none = { country: null, country_iso2: null, country_iso3: null };
    expect(extractCountry('Update on outbreak')).toEqual(none);
    expect(extractCountry('Multi-country outbreak of mpox')).toEqual(none);
    expect(extractCountry('')).toEqual(none);
    expect(extractCountry(null)).toEqual(none);
  });

  it('rejects candidates longer than 40 characters', () => {
    const lookup = buildCountryLookup(
      [{ name: 'A very long country name used only for testing', alpha2: 'ZZ', alpha3: 'ZZZ' }],
      {}
    );
    expect(extractCountry('Cholera - A very long country name used only for testing', lookup).country).toBeNull();
  });

  it('is deterministic', () => {
    const title = 'Cholera – Global situation - Democratic Republic of the Congo';
    expect(extractCountry(title)).toEqual(extractCountry(title));
  });
});

describe('countryLookup', () => {
  it('loads every ISO 3166-1 entry and the aliases', () => {
    const { byName } = countryLookup();
    expect(byName.get('nigeria')?.alpha3).toBe('NGA');
    expect(byName.get('united states of america')?.alpha2).toBe('US');
    expect(byName.get('türkiye')?.alpha3).toBe('TUR');
    expect(byName.get('turkey')?.alpha3).toBe('TUR');
  });
});

describe('extractDisease', () => {
  it('takes the first dash segment', () => {
    expect(extractDisease('Cholera - Haiti')).toBe('Cholera');
    expect(extractDisease('Avian Influenza A(H5N1) – Cambodia')).toBe('Avian Influenza A(H5N1)');
  });

  it('removes trailing boilerplate', () => {
    expect(extractDisease('Marburg virus disease situation in Rwanda')).toBe('Marburg virus disease');
    expect(extractDisease('Cholera update - Haiti')).toBe('Cholera');
    expect(extractDisease('Dengue cases - Bangladesh')).toBe('Dengue');
  });

  it('keeps hyphenated names', () => {
    expect(extractDisease('MERS-CoV - Saudi Arabia')).toBe('MERS-CoV');
  });

  it('returns null when nothing remains', () => {
    expect(extractDisease('Update - Chad')).toBeNull();
    expect(extractDisease(null)).toBeNull();
  });
});
