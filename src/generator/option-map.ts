/**
 * cql-schema-generator - Option Rendering
 *
 * Renders `WITH` clauses and the nested `{ 'key' : value }` option maps used
 * by replication, compaction, compression and caching.
 */

import { quoteString } from '../cql/quoting.js';
import { isNestedOptionMap, type NestedOptionMap, type OptionMap } from '../keyspace/option.js';

/**
 * Renders a nested option map as `{ 'k1' : v1, 'k2' : v2 }`.
 *
 * Keys are always single-quoted. Values follow their key's escape/quote flags;
 * a `null` value renders empty (`'k' : `). An empty map renders as `''`.
 */
export function renderOptionMap(options: NestedOptionMap): string {
  if (options.size === 0) {
    return '';
  }

  const entries = [...options].map(([option, value]) => `${quoteString(option.name)} : ${option.renderValue(value)}`);
  return `{ ${entries.join(', ')} }`;
}

/**
 * Renders each top-level option as `name = value`, in map order. Options
 * without a value (e.g. `COMPACT STORAGE`) render as their bare name.
 */
export function renderOptionAssignments(options: OptionMap): string[] {
  return [...options].map(([option, value]) => {
    if (value === null) {
      return option.name;
    }
    if (isNestedOptionMap(value)) {
      option.checkValue(value);
      return `${option.name} = ${renderOptionMap(value)}`;
    }
    return `${option.name} = ${option.renderValue(value)}`;
  });
}

/**
 * Joins clauses into ` WITH a AND b`, or `''` when there are none.
 */
export function renderWithClause(clauses: readonly string[]): string {
  return clauses.length > 0 ? ` WITH ${clauses.join(' AND ')}` : '';
}

/**
 * Renders custom index options as `{'k': 'v', ...}`; keys and values are
 * always quoted strings.
 */
export function renderIndexOptions(options: ReadonlyMap<string, string>): string {
  const entries = [...options].map(([key, value]) => `${quoteString(key)}: ${quoteString(value)}`);
  return `{${entries.join(', ')}}`;
}
