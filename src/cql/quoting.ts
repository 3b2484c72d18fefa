/**
 * cql-schema-generator - Quoting
 *
 * String escaping and quoting helpers shared by identifiers and options.
 */

/**
 * Doubles every single quote.
 */
export function escapeSingle(value: string): string {
  return value.replace(/'/g, "''");
}

/**
 * Doubles every double quote.
 */
export function escapeDouble(value: string): string {
  return value.replace(/"/g, '""');
}

export function singleQuote(value: string): string {
  return `'${value}'`;
}

export function doubleQuote(value: string): string {
  return `"${value}"`;
}

/**
 * Quotes a string literal (`it's` -> `'it''s'`).
 */
export function quoteString(value: string): string {
  return singleQuote(escapeSingle(value));
}
