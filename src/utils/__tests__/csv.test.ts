/**
 * Unit tests for CSV serialization.
 */
import { describe, it, expect } from 'vitest';
import { csvColumns, toCsv } from '../csv.js';

describe('csvColumns', () => {
  it('collects keys in first-seen order', () => {
    expect(csvColumns([{ country: 'NGA', value: 1 }, { year: 2021, country: 'KEN' }])).toEqual([
      'country',
      'value',
      'year',
    ]);
  });
});

describe('toCsv', () => {
  it('writes a header and leaves missing cells empty', () => {
    expect(
      toCsv([
        { country: 'NGA', value: 1 },
        { country: 'KEN', year: 2021 },
      ])
    ).toBe('country,value,year\nNGA,1,\nKEN,,2021\n');
  });

  it('quotes cells with separators, quotes or newlines', () => {
    expect(toCsv([{ name: 'Bolivia, Plurinational State of', note: 'say "hi"', text: 'two\nlines' }])).toBe(
      'name,note,text\n"Bolivia, Plurinational State of","say ""hi""","two\nlines"\n'
    );
  });

  it('formats dates, big integers, booleans, objects and nulls', () => {
    expect(
      toCsv([
        {
          at: new Date('2024-05-01T00:00:00Z'),
          n: 7n,
          flag: false,
          meta: { a: 1 },
          missing: null,
        },
      ])
    ).toBe('at,n,flag,meta,missing\n2024-05-01T00:00:00.000Z,7,false,"{""a"":1}",\n');
  });

  it('returns an empty string for no rows', () => {
    expect(toCsv([])).toBe('');
  });
});
