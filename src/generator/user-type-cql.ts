/**
 * cql-schema-generator - User Type Statements
 */

import { renderDataType } from '../cql/data-types.js';
import { renderQualifiedName } from '../cql/identifier.js';
import { SpecificationValidationError } from '../errors.js';
import type {
  AlterUserTypeSpecification,
  CreateUserTypeSpecification,
  DropUserTypeSpecification,
  FieldChange,
} from '../types.js';
import { renderColumnDefinition } from './table-cql.js';

/**
 * @throws SpecificationValidationError without fields
 */
export function createUserTypeCql(specification: CreateUserTypeSpecification): string {
  const ifNotExists = specification.ifNotExists ? 'IF NOT EXISTS ' : '';
  const type = renderQualifiedName(specification.keyspace, specification.name);
  if (specification.fields.length === 0) {
    throw new SpecificationValidationError(`User type ${type} must declare at least one field`);
  }
  const fields = specification.fields.map(renderColumnDefinition).join(', ');

  return `CREATE TYPE ${ifNotExists}${type} (${fields});`;
}

/**
 * Accumulator of the ALTER TYPE fold.
 */
export interface FieldChangeFold {
  readonly cql: string;
  readonly previous: FieldChange['kind'] | undefined;
}

/**
 * Appends one change. A rename that follows a rename continues the same
 * `RENAME` clause with `AND`.
 */
export function appendFieldChange(fold: FieldChangeFold, change: FieldChange): FieldChangeFold {
  let clause: string;
  switch (change.kind) {
    case 'add':
      clause = `ADD ${change.name.render()} ${renderDataType(change.type)}`;
      break;
    case 'alter':
      clause = `ALTER ${change.name.render()} TYPE ${renderDataType(change.type)}`;
      break;
    case 'rename':
      clause = `${fold.previous === 'rename' ? 'AND' : 'RENAME'} ${change.name.render()} TO ${change.to.render()}`;
      break;
  }

  return { cql: `${fold.cql} ${clause}`, previous: change.kind };
}

/**
 * @throws SpecificationValidationError without changes
 */
export function alterUserTypeCql(specification: AlterUserTypeSpecification): string {
  const type = renderQualifiedName(specification.keyspace, specification.name);
  if (specification.changes.length === 0) {
    throw new SpecificationValidationError(`ALTER TYPE ${type} requires at least one change`);
  }

  const { cql } = specification.changes.reduce<FieldChangeFold>(appendFieldChange, {
    cql: `ALTER TYPE ${type}`,
    previous: undefined,
  });

  return `${cql};`;
}

export function dropUserTypeCql(specification: DropUserTypeSpecification): string {
  const ifExists = specification.ifExists ? 'IF EXISTS ' : '';

  return `DROP TYPE ${ifExists}${renderQualifiedName(specification.keyspace, specification.name)};`;
}
