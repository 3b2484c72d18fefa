/**
 * cql-schema-generator - User Type Specifications
 *
 * Builders for CREATE / ALTER / DROP TYPE.
 */

import { SpecificationValidationError } from '../errors.js';
import type { DataType } from '../cql/data-types.js';
import { Identifier, renderQualifiedName, type IdentifierLike } from '../cql/identifier.js';
import type {
  AlterUserTypeSpecification,
  ColumnSpecification,
  CreateUserTypeSpecification,
  DropUserTypeSpecification,
  FieldChange,
  QualifiedName,
} from '../types.js';
import { addColumn, alterColumn, assertUniqueNames, columnSpecification, renameColumn } from './column.js';
import { freezeSpecification, qualifiedName } from './options-builder.js';

export class CreateUserTypeBuilder {
  private readonly keyspace: Identifier | undefined;
  private readonly name: Identifier;
  private readonly fields: ColumnSpecification[] = [];
  private ifNotExistsFlag = false;

  constructor({ keyspace, name }: QualifiedName) {
    this.keyspace = keyspace;
    this.name = name;
  }

  ifNotExists(ifNotExists = true): this {
    this.ifNotExistsFlag = ifNotExists;
    return this;
  }

  field(name: IdentifierLike, type: DataType): this {
    this.fields.push(columnSpecification(name, type));
    return this;
  }

  /**
   * @throws SpecificationValidationError without fields or with duplicate
   * field names
   */
  build(): CreateUserTypeSpecification {
    const type = renderQualifiedName(this.keyspace, this.name);

    if (this.fields.length === 0) {
      throw new SpecificationValidationError(`User type ${type} must declare at least one field`);
    }
    assertUniqueNames(this.fields, `User type ${type}`);

    return freezeSpecification<CreateUserTypeSpecification>({
      kind: 'createUserType',
      keyspace: this.keyspace,
      name: this.name,
      ifNotExists: this.ifNotExistsFlag,
      fields: Object.freeze([...this.fields]),
    });
  }
}

export class AlterUserTypeBuilder {
  private readonly keyspace: Identifier | undefined;
  private readonly name: Identifier;
  private readonly changes: FieldChange[] = [];

  constructor({ keyspace, name }: QualifiedName) {
    this.keyspace = keyspace;
    this.name = name;
  }

  add(name: IdentifierLike, type: DataType): this {
    return this.change(addColumn(name, type));
  }

  alter(name: IdentifierLike, type: DataType): this {
    return this.change(alterColumn(name, type));
  }

  rename(from: IdentifierLike, to: IdentifierLike): this {
    return this.change(renameColumn(from, to));
  }

  change(change: FieldChange): this {
    this.changes.push(change);
    return this;
  }

  build(): AlterUserTypeSpecification {
    if (this.changes.length === 0) {
      throw new SpecificationValidationError(
        `ALTER TYPE ${renderQualifiedName(this.keyspace, this.name)} requires at least one change`
      );
    }

    return freezeSpecification<AlterUserTypeSpecification>({
      kind: 'alterUserType',
      keyspace: this.keyspace,
      name: this.name,
      changes: Object.freeze([...this.changes]),
    });
  }
}

export class DropUserTypeBuilder {
  private readonly keyspace: Identifier | undefined;
  private readonly name: Identifier;
  private ifExistsFlag = false;

  constructor({ keyspace, name }: QualifiedName) {
    this.keyspace = keyspace;
    this.name = name;
  }

  ifExists(ifExists = true): this {
    this.ifExistsFlag = ifExists;
    return this;
  }

  build(): DropUserTypeSpecification {
    return freezeSpecification<DropUserTypeSpecification>({
      kind: 'dropUserType',
      keyspace: this.keyspace,
      name: this.name,
      ifExists: this.ifExistsFlag,
    });
  }
}

export function createType(name: IdentifierLike): CreateUserTypeBuilder;
export function createType(keyspace: IdentifierLike | undefined, name: IdentifierLike): CreateUserTypeBuilder;
export function createType(first: IdentifierLike | undefined, second?: IdentifierLike): CreateUserTypeBuilder {
  return new CreateUserTypeBuilder(qualifiedName(first, second));
}

export function alterType(name: IdentifierLike): AlterUserTypeBuilder;
export function alterType(keyspace: IdentifierLike | undefined, name: IdentifierLike): AlterUserTypeBuilder;
export function alterType(first: IdentifierLike | undefined, second?: IdentifierLike): AlterUserTypeBuilder {
  return new AlterUserTypeBuilder(qualifiedName(first, second));
}

export function dropType(name: IdentifierLike): DropUserTypeBuilder;
export function dropType(keyspace: IdentifierLike | undefined, name: IdentifierLike): DropUserTypeBuilder;
export function dropType(first: IdentifierLike | undefined, second?: IdentifierLike): DropUserTypeBuilder {
  return new DropUserTypeBuilder(qualifiedName(first, second));
}
