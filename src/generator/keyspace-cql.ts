/**
 * cql-schema-generator - Keyspace Statements
 */

import { simpleReplication } from '../keyspace/keyspace.js';
import { KeyspaceOption, hasOption, type Option, type OptionMap, type OptionValue } from '../keyspace/option.js';
import type {
  AlterKeyspaceSpecification,
  CreateKeyspaceSpecification,
  DropKeyspaceSpecification,
} from '../types.js';
import { renderOptionAssignments, renderWithClause } from './option-map.js';

/**
 * Options a CREATE KEYSPACE is rendered with: SimpleStrategy replication with
 * factor 1 goes first when `replication` is missing, `durable_writes = true`
 * goes last when it is missing. The specification itself is left untouched.
 */
export function effectiveKeyspaceOptions(specification: CreateKeyspaceSpecification): OptionMap {
  const effective = new Map<Option, OptionValue>();

  if (!hasOption(specification.options, KeyspaceOption.REPLICATION)) {
    effective.set(KeyspaceOption.REPLICATION, simpleReplication(1));
  }
  for (const [option, value] of specification.options) {
    effective.set(option, value);
  }
  if (!hasOption(specification.options, KeyspaceOption.DURABLE_WRITES)) {
    effective.set(KeyspaceOption.DURABLE_WRITES, true);
  }

  return effective;
}

export function createKeyspaceCql(specification: CreateKeyspaceSpecification): string {
  const ifNotExists = specification.ifNotExists ? 'IF NOT EXISTS ' : '';
  const options = renderWithClause(renderOptionAssignments(effectiveKeyspaceOptions(specification)));

  return `CREATE KEYSPACE ${ifNotExists}${specification.name.render()}${options};`;
}

export function alterKeyspaceCql(specification: AlterKeyspaceSpecification): string {
  const options = renderWithClause(renderOptionAssignments(specification.options));

  return `ALTER KEYSPACE ${specification.name.render()}${options};`;
}

export function dropKeyspaceCql(specification: DropKeyspaceSpecification): string {
  const ifExists = specification.ifExists ? 'IF EXISTS ' : '';

  return `DROP KEYSPACE ${ifExists}${specification.name.render()};`;
}
