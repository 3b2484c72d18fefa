/**
 * cql-schema-generator - Table Specifications
 *
 * Builders for CREATE / ALTER / DROP TABLE.
 *
 * @example
 * ```typescript
 * const spec = createTable('shop', 'orders')
 *   .partitionKeyColumn('customer_id', DataTypes.UUID)
 *   .clusteredKeyColumn('placed_at', DataTypes.TIMESTAMP, 'DESC')
 *   .column('total', DataTypes.DECIMAL)
 *   .with(TableOption.COMMENT, 'Orders by customer')
 *   .build();
 * ```
 */

import { SpecificationValidationError } from '../errors.js';
import type { DataType } from '../cql/data-types.js';
import { Identifier, renderQualifiedName, type IdentifierLike } from '../cql/identifier.js';
import type {
  AlterTableSpecification,
  ColumnChange,
  ColumnSpecification,
  CreateTableSpecification,
  DropTableSpecification,
  Ordering,
  QualifiedName,
} from '../types.js';
import {
  ColumnBuilder,
  addColumn,
  alterColumn,
  assertUniqueNames,
  columnSpecification,
  dropColumn,
  renameColumn,
} from './column.js';
import { OptionsBuilder, freezeSpecification, qualifiedName } from './options-builder.js';

export class CreateTableBuilder extends OptionsBuilder {
  private readonly keyspace: Identifier | undefined;
  private readonly name: Identifier;
  private readonly columns: ColumnSpecification[] = [];
  private ifNotExistsFlag = false;

  constructor({ keyspace, name }: QualifiedName) {
    super();
    this.keyspace = keyspace;
    this.name = name;
  }

  ifNotExists(ifNotExists = true): this {
    this.ifNotExistsFlag = ifNotExists;
    return this;
  }

  column(name: IdentifierLike, type: DataType): this {
    return this.withColumn(columnSpecification(name, type));
  }

  partitionKeyColumn(name: IdentifierLike, type: DataType): this {
    return this.withColumn(columnSpecification(name, type, 'partitioned'));
  }

  clusteredKeyColumn(name: IdentifierLike, type: DataType, ordering?: Ordering): this {
    return this.withColumn(columnSpecification(name, type, 'clustered', ordering));
  }

  withColumn(column: ColumnSpecification | ColumnBuilder): this {
    this.columns.push(column instanceof ColumnBuilder ? column.build() : column);
    return this;
  }

  /**
   * @throws SpecificationValidationError without columns, without a partition
   * key column, or with duplicate column names
   */
  build(): CreateTableSpecification {
    const table = renderQualifiedName(this.keyspace, this.name);

    if (this.columns.length === 0) {
      throw new SpecificationValidationError(`Table ${table} must declare at least one column`);
    }
    if (!this.columns.some(col => col.keyType === 'partitioned')) {
      throw new SpecificationValidationError(`Table ${table} must declare at least one partition key column`);
    }
    assertUniqueNames(this.columns, `Table ${table}`);

    return freezeSpecification<CreateTableSpecification>({
      kind: 'createTable',
      keyspace: this.keyspace,
      name: this.name,
      ifNotExists: this.ifNotExistsFlag,
      columns: Object.freeze([...this.columns]),
      options: this.snapshotOptions(),
    });
  }
}

/**
 * Changes are kept in the order they are declared.
 */
export class AlterTableBuilder extends OptionsBuilder {
  private readonly keyspace: Identifier | undefined;
  private readonly name: Identifier;
  private readonly changes: ColumnChange[] = [];

  constructor({ keyspace, name }: QualifiedName) {
    super();
    this.keyspace = keyspace;
    this.name = name;
  }

  add(name: IdentifierLike, type: DataType): this {
    return this.change(addColumn(name, type));
  }

  drop(name: IdentifierLike): this {
    return this.change(dropColumn(name));
  }

  alter(name: IdentifierLike, type: DataType): this {
    return this.change(alterColumn(name, type));
  }

  rename(from: IdentifierLike, to: IdentifierLike): this {
    return this.change(renameColumn(from, to));
  }

  change(change: ColumnChange): this {
    this.changes.push(change);
    return this;
  }

  build(): AlterTableSpecification {
    if (this.changes.length === 0 && this.options.size === 0) {
      throw new SpecificationValidationError(
        `ALTER TABLE ${renderQualifiedName(this.keyspace, this.name)} requires at least one change or option`
      );
    }

    return freezeSpecification<AlterTableSpecification>({
      kind: 'alterTable',
      keyspace: this.keyspace,
      name: this.name,
      changes: Object.freeze([...this.changes]),
      options: this.snapshotOptions(),
    });
  }
}

export class DropTableBuilder {
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

  build(): DropTableSpecification {
    return freezeSpecification<DropTableSpecification>({
      kind: 'dropTable',
      keyspace: this.keyspace,
      name: this.name,
      ifExists: this.ifExistsFlag,
    });
  }
}

export function createTable(name: IdentifierLike): CreateTableBuilder;
export function createTable(keyspace: IdentifierLike | undefined, name: IdentifierLike): CreateTableBuilder;
export function createTable(first: IdentifierLike | undefined, second?: IdentifierLike): CreateTableBuilder {
  return new CreateTableBuilder(qualifiedName(first, second));
}

export function alterTable(name: IdentifierLike): AlterTableBuilder;
export function alterTable(keyspace: IdentifierLike | undefined, name: IdentifierLike): AlterTableBuilder;
export function alterTable(first: IdentifierLike | undefined, second?: IdentifierLike): AlterTableBuilder {
  return new AlterTableBuilder(qualifiedName(first, second));
}

export function dropTable(name: IdentifierLike): DropTableBuilder;
export function dropTable(keyspace: IdentifierLike | undefined, name: IdentifierLike): DropTableBuilder;
export function dropTable(first: IdentifierLike | undefined, second?: IdentifierLike): DropTableBuilder {
  return new DropTableBuilder(qualifiedName(first, second));
}
