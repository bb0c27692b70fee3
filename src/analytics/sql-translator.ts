/**
 * Athena (Trino) to DuckDB SQL rewriting.
 *
 * An ordered list of textual rules, each matching whole function-call tokens
 * case-insensitively. Not a parser: anything the rules do not cover reaches
 * DuckDB unchanged and fails there.
 */

type Replacer = (match: string, ...groups: string[]) => string;

export interface TranslationRule {
  name: string;
  pattern: RegExp;
  replacement: string | Replacer;
}

const INTERVAL_UNITS: Record<string, string> = {
  year: 'years',
  month: 'months',
  week: 'weeks',
  day: 'days',
  hour: 'hours',
  minute: 'minutes',
  second: 'seconds',
};

export function intervalUnit(unit: string): string {
  const lower = unit.toLowerCase();
  return INTERVAL_UNITS[lower] ?? `${lower}s`;
}

/** date_add('day', -30, x) → x - INTERVAL '30' days */
const dateAdd: Replacer = (_match, unit = '', amount = '', expr = '') => {
  const value = amount.trim();
  const operator = value.startsWith('-') ? '-' : '+';
  const magnitude = value.replace(/^[+-]/, '');
  return `${expr.trim()} ${operator} INTERVAL '${magnitude}' ${intervalUnit(unit)}`;
};

export const TRANSLATION_RULES: TranslationRule[] = [
  {
    name: 'date_add',
    pattern: /\bdate_add\s*\(\s*['"](\w+)['"]\s*,\s*([+-]?\d+)\s*,\s*([^)]+)\)/gi,
    replacement: dateAdd,
  },
  { name: 'current_timestamp', pattern: /\bCURRENT_TIMESTAMP\b/gi, replacement: 'current_timestamp' },
  { name: 'current_date', pattern: /\bCURRENT_DATE\b/gi, replacement: 'current_date' },
  { name: 'array_literal', pattern: /\barray\s*\[/gi, replacement: '[' },
  { name: 'sequence', pattern: /\bsequence\s*\(/gi, replacement: 'generate_series(' },
  { name: 'arbitrary', pattern: /\barbitrary\s*\(/gi, replacement: 'any_value(' },
  { name: 'cardinality', pattern: /\bcardinality\s*\(/gi, replacement: 'len(' },
  { name: 'from_unixtime', pattern: /\bfrom_unixtime\s*\(/gi, replacement: 'to_timestamp(' },
  { name: 'approx_distinct', pattern: /\bapprox_distinct\s*\(/gi, replacement: 'approx_count_distinct(' },
];

export function applyRule(sql: string, rule: TranslationRule): string {
  const { pattern, replacement } = rule;
  if (typeof replacement === 'string') {
    return sql.replace(pattern, replacement);
  }
  return sql.replace(pattern, replacement);
}

export function translateAthenaToDuckDb(
  sql: string,
  rules: readonly TranslationRule[] = TRANSLATION_RULES
): string {
  return rules.reduce(applyRule, sql);
}
