/**
 * cql-schema-generator - Index Statements
 */

import { renderQualifiedName } from '../cql/identifier.js';
import { quoteString } from '../cql/quoting.js';
import type { CreateIndexSpecification, DropIndexSpecification } from '../types.js';
import { renderIndexOptions } from './option-map.js';

/**
 * Renders the indexed target: `column`, or `keys(column)` and friends for
 * collection columns.
 */
export function renderIndexTarget(specification: CreateIndexSpecification): string {
  const column = specification.column.render();
  return specification.columnFunction === 'none' ? column : `${specification.columnFunction}(${column})`;
}

/**
 * The index name is never keyspace-qualified; the table is.
 */
export function createIndexCql(specification: CreateIndexSpecification): string {
  const parts: string[] = [specification.using ? 'CREATE CUSTOM INDEX' : 'CREATE INDEX'];

  if (specification.ifNotExists) {
    parts.push('IF NOT EXISTS');
  }
  if (specification.name) {
    parts.push(specification.name.render());
  }
  parts.push('ON', renderQualifiedName(specification.keyspace, specification.table));
  parts.push(`(${renderIndexTarget(specification)})`);

  if (specification.using) {
    parts.push('USING', quoteString(specification.using));
  }
  if (specification.options.size > 0) {
    parts.push('WITH OPTIONS =', renderIndexOptions(specification.options));
  }

  return `${parts.join(' ')};`;
}

export function dropIndexCql(specification: DropIndexSpecification): string {
  const ifExists = specification.ifExists ? 'IF EXISTS ' : '';

  return `DROP INDEX ${ifExists}${renderQualifiedName(specification.keyspace, specification.name)};`;
}
