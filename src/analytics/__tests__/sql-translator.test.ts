/**
 * Unit tests for Athena to DuckDB SQL rewriting.
 */
import { describe, it, expect } from 'vitest';
import { TRANSLATION_RULES, intervalUnit, translateAthenaToDuckDb } from '../sql-translator.js';

describe('intervalUnit', () => {
  it('pluralizes known and unknown units', () => {
    expect(intervalUnit('DAY')).toBe('days');
    expect(intervalUnit('year')).toBe('years');
    expect(intervalUnit('quarter')).toBe('quarters');
  });
});

describe('translateAthenaToDuckDb', () => {
  it('rewrites date_add with a negative amount as interval subtraction', () => {
    expect(translateAthenaToDuckDb("SELECT date_add('day', -30, CURRENT_DATE)")).toBe(
      "SELECT current_date - INTERVAL '30' days"
    );
  });

  it('rewrites date_add with a positive amount as interval addition', () => {
    expect(translateAthenaToDuckDb("WHERE d < DATE_ADD('month', 6, publication_date)")).toBe(
      "WHERE d < publication_date + INTERVAL '6' months"
    );
  });

  it('rewrites every date_add in a statement', () => {
    const sql =
      "WHERE publication_date >= date_add('year', -3, CURRENT_TIMESTAMP) " +
      "AND publication_date < date_add(\"day\", 1, CURRENT_TIMESTAMP)";
    expect(translateAthenaToDuckDb(sql)).toBe(
      "WHERE publication_date >= current_timestamp - INTERVAL '3' years " +
        "AND publication_date < current_timestamp + INTERVAL '1' days"
    );
  });

  it('rewrites array literals and sequences', () => {
    expect(translateAthenaToDuckDb('SELECT ARRAY[1, 2], sequence(1, 5)')).toBe(
      'SELECT [1, 2], generate_series(1, 5)'
    );
  });

  it('renames aggregate and scalar functions', () => {
    expect(
      translateAthenaToDuckDb(
        'SELECT arbitrary(country), cardinality(tags), from_unixtime(ts), APPROX_DISTINCT(country_iso3)'
      )
    ).toBe('SELECT any_value(country), len(tags), to_timestamp(ts), approx_count_distinct(country_iso3)');
  });

  it('matches whole function names only', () => {
    const sql = "SELECT my_arbitrary(x), sequence_id, my_date_add('day', 1, x) FROM t";
    expect(translateAthenaToDuckDb(sql)).toBe(sql);
  });

  it('leaves text the rules do not cover unchanged', () => {
    const sql = 'SELECT country_code, avg(value) FROM healthlake_db.cholera GROUP BY 1';
    expect(translateAthenaToDuckDb(sql)).toBe(sql);
  });

  it('applies only the rules it is given', () => {
    const onlyArbitrary = TRANSLATION_RULES.filter((rule) => rule.name === 'arbitrary');
    expect(translateAthenaToDuckDb('SELECT arbitrary(x), cardinality(y)', onlyArbitrary)).toBe(
      'SELECT any_value(x), cardinality(y)'
    );
  });

  it('keeps rule order stable', () => {
    expect(TRANSLATION_RULES.map((rule) => rule.name)).toEqual([
      'date_add',
      'current_timestamp',
      'current_date',
      'array_literal',
      'sequence',
      'arbitrary',
      'cardinality',
      'from_unixtime',
      'approx_distinct',
    ]);
  });
});
