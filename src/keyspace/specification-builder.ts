/**
 * cql-schema-generator - Specification Builder
 *
 * One place to start any specification from.
 *
 * @example
 * ```typescript
 * import { SpecificationBuilder as Spec, DataTypes, toCql } from 'cql-schema-generator';
 *
 * toCql(Spec.createType('address').field('street', DataTypes.TEXT).build());
 * // CREATE TYPE address (street text);
 * ```
 */

import { addColumn, alterColumn, column, dropColumn, renameColumn } from './column.js';
import { createIndex, dropIndex } from './index-specification.js';
import { alterKeyspace, createKeyspace, dropKeyspace } from './keyspace.js';
import { alterTable, createTable, dropTable } from './table.js';
import { alterType, createType, dropType } from './user-type.js';

export const SpecificationBuilder = {
  // Keyspaces
  createKeyspace,
  alterKeyspace,
  dropKeyspace,

  // Tables
  createTable,
  alterTable,
  dropTable,

  // Columns and column changes
  column,
  addColumn,
  alterColumn,
  dropColumn,
  renameColumn,

  // Indexes
  createIndex,
  dropIndex,

  // User types
  createType,
  alterType,
  dropType,
} as const;
