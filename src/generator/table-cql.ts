/**
 * cql-schema-generator - Table Statements
 */

import { renderDataType } from '../cql/data-types.js';
import { renderQualifiedName } from '../cql/identifier.js';
import { IllegalOptionError, SpecificationValidationError } from '../errors.js';
import { TableOption, hasOption } from '../keyspace/option.js';
import type {
  AlterTableSpecification,
  ColumnChange,
  ColumnSpecification,
  CreateTableSpecification,
  DropTableSpecification,
} from '../types.js';
import { renderOptionAssignments, renderWithClause } from './option-map.js';

/**
 * Renders `name type`.
 */
export function renderColumnDefinition(column: ColumnSpecification): string {
  return `${column.name.render()} ${renderDataType(column.type)}`;
}

function columnNames(columns: readonly ColumnSpecification[]): string {
  return columns.map(col => col.name.render()).join(', ');
}

/**
 * Renders the contents of `PRIMARY KEY (...)`. A composite partition key gets
 * its own parentheses: `(a, b), c`.
 */
export function renderPrimaryKey(columns: readonly ColumnSpecification[]): string {
  const partitionKeys = columns.filter(col => col.keyType === 'partitioned');
  const clusterKeys = columns.filter(col => col.keyType === 'clustered');

  const partition = partitionKeys.length > 1 ? `(${columnNames(partitionKeys)})` : columnNames(partitionKeys);

  return clusterKeys.length > 0 ? `${partition}, ${columnNames(clusterKeys)}` : partition;
}

/**
 * `CLUSTERING ORDER BY (...)` over clustered columns with an explicit order,
 * or undefined when none has one.
 */
export function renderClusteringOrder(columns: readonly ColumnSpecification[]): string | undefined {
  const ordered = columns
    .filter(col => col.keyType === 'clustered' && col.ordering !== undefined)
    .map(col => `${col.name.render()} ${col.ordering}`);

  return ordered.length > 0 ? `CLUSTERING ORDER BY (${ordered.join(', ')})` : undefined;
}

/**
 * @throws SpecificationValidationError without a partition key column
 */
export function createTableCql(specification: CreateTableSpecification): string {
  const ifNotExists = specification.ifNotExists ? 'IF NOT EXISTS ' : '';
  const table = renderQualifiedName(specification.keyspace, specification.name);
  if (!specification.columns.some(col => col.keyType === 'partitioned')) {
    throw new SpecificationValidationError(`Table ${table} must declare at least one partition key column`);
  }

  const definitions = specification.columns.map(renderColumnDefinition);
  definitions.push(`PRIMARY KEY (${renderPrimaryKey(specification.columns)})`);

  const clauses: string[] = [];
  const ordering = renderClusteringOrder(specification.columns);
  if (ordering) {
    clauses.push(ordering);
  }
  clauses.push(...renderOptionAssignments(specification.options));

  return `CREATE TABLE ${ifNotExists}${table} (${definitions.join(', ')})${renderWithClause(clauses)};`;
}

/**
 * Renders one ALTER TABLE change clause.
 */
export function renderColumnChange(change: ColumnChange): string {
  switch (change.kind) {
    case 'add':
      return `ADD ${change.name.render()} ${renderDataType(change.type)}`;
    case 'drop':
      return `DROP ${change.name.render()}`;
    case 'alter':
      return `ALTER ${change.name.render()} TYPE ${renderDataType(change.type)}`;
    case 'rename':
      return `RENAME ${change.name.render()} TO ${change.to.render()}`;
  }
}

/**
 * @throws IllegalOptionError if the specification carries `COMPACT STORAGE`,
 * which is only legal when the table is created
 * @throws SpecificationValidationError with neither changes nor options
 */
export function alterTableCql(specification: AlterTableSpecification): string {
  if (hasOption(specification.options, TableOption.COMPACT_STORAGE)) {
    throw new IllegalOptionError(TableOption.COMPACT_STORAGE.name, 'ALTER TABLE');
  }

  const table = renderQualifiedName(specification.keyspace, specification.name);
  if (specification.changes.length === 0 && specification.options.size === 0) {
    throw new SpecificationValidationError(`ALTER TABLE ${table} requires at least one change or option`);
  }

  const changes = specification.changes.map(change => ` ${renderColumnChange(change)}`).join('');
  const options = renderWithClause(renderOptionAssignments(specification.options));

  return `ALTER TABLE ${table}${changes}${options};`;
}

export function dropTableCql(specification: DropTableSpecification): string {
  const ifExists = specification.ifExists ? 'IF EXISTS ' : '';

  return `DROP TABLE ${ifExists}${renderQualifiedName(specification.keyspace, specification.name)};`;
}
