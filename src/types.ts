/**
 * cql-schema-generator - Types
 *
 * Specification objects: immutable descriptions of one schema operation each.
 * Build them with the fluent builders in `./keyspace/`.
 */

import type { DataType } from './cql/data-types.js';
import type { Identifier } from './cql/identifier.js';
import type { OptionMap } from './keyspace/option.js';

/**
 * Role of a column in the primary key.
 */
export type PrimaryKeyType = 'none' | 'partitioned' | 'clustered';

/**
 * Clustering order of a clustered column.
 */
export type Ordering = 'ASC' | 'DESC';

/**
 * Name of a table, index or type, optionally qualified by its keyspace.
 */
export interface QualifiedName {
  readonly keyspace?: Identifier | undefined;
  readonly name: Identifier;
}

/**
 * Column of a table or field of a user-defined type.
 */
export interface ColumnSpecification {
  readonly name: Identifier;
  readonly type: DataType;
  /** Always 'none' for user type fields */
  readonly keyType: PrimaryKeyType;
  /** Only set on clustered columns with an explicit order */
  readonly ordering?: Ordering | undefined;
}

export interface AddColumnChange {
  readonly kind: 'add';
  readonly name: Identifier;
  readonly type: DataType;
}

export interface DropColumnChange {
  readonly kind: 'drop';
  readonly name: Identifier;
}

export interface AlterColumnChange {
  readonly kind: 'alter';
  readonly name: Identifier;
  readonly type: DataType;
}

export interface RenameColumnChange {
  readonly kind: 'rename';
  readonly name: Identifier;
  readonly to: Identifier;
}

/**
 * One change of an ALTER TABLE / ALTER TYPE statement.
 */
export type ColumnChange = AddColumnChange | DropColumnChange | AlterColumnChange | RenameColumnChange;

/**
 * User type fields cannot be dropped.
 */
export type FieldChange = AddColumnChange | AlterColumnChange | RenameColumnChange;

export interface CreateKeyspaceSpecification {
  readonly kind: 'createKeyspace';
  readonly name: Identifier;
  readonly ifNotExists: boolean;
  readonly options: OptionMap;
}

export interface AlterKeyspaceSpecification {
  readonly kind: 'alterKeyspace';
  readonly name: Identifier;
  readonly options: OptionMap;
}

export interface DropKeyspaceSpecification {
  readonly kind: 'dropKeyspace';
  readonly name: Identifier;
  readonly ifExists: boolean;
}

export interface CreateTableSpecification extends QualifiedName {
  readonly kind: 'createTable';
  readonly ifNotExists: boolean;
  readonly columns: readonly ColumnSpecification[];
  readonly options: OptionMap;
}

export interface AlterTableSpecification extends QualifiedName {
  readonly kind: 'alterTable';
  readonly changes: readonly ColumnChange[];
  readonly options: OptionMap;
}

export interface DropTableSpecification extends QualifiedName {
  readonly kind: 'dropTable';
  readonly ifExists: boolean;
}

/**
 * Function applied to an indexed collection column.
 */
export type ColumnFunction = 'none' | 'keys' | 'values' | 'entries' | 'full';

export interface CreateIndexSpecification {
  readonly kind: 'createIndex';
  readonly keyspace?: Identifier | undefined;
  /** Omitted to let the server name the index */
  readonly name?: Identifier | undefined;
  readonly table: Identifier;
  readonly column: Identifier;
  readonly columnFunction: ColumnFunction;
  readonly ifNotExists: boolean;
  /** Index implementation class; set for custom indexes */
  readonly using?: string | undefined;
  readonly options: ReadonlyMap<string, string>;
}

export interface DropIndexSpecification extends QualifiedName {
  readonly kind: 'dropIndex';
  readonly ifExists: boolean;
}

export interface CreateUserTypeSpecification extends QualifiedName {
  readonly kind: 'createUserType';
  readonly ifNotExists: boolean;
  readonly fields: readonly ColumnSpecification[];
}

export interface AlterUserTypeSpecification extends QualifiedName {
  readonly kind: 'alterUserType';
  readonly changes: readonly FieldChange[];
}

export interface DropUserTypeSpecification extends QualifiedName {
  readonly kind: 'dropUserType';
  readonly ifExists: boolean;
}

export type KeyspaceSpecification =
  | CreateKeyspaceSpecification
  | AlterKeyspaceSpecification
  | DropKeyspaceSpecification;

/**
 * Every schema operation the generator understands.
 */
export type Specification =
  | KeyspaceSpecification
  | CreateTableSpecification
  | AlterTableSpecification
  | DropTableSpecification
  | CreateIndexSpecification
  | DropIndexSpecification
  | CreateUserTypeSpecification
  | AlterUserTypeSpecification
  | DropUserTypeSpecification;

export type SpecificationKind = Specification['kind'];

/**
 * A versioned CQL script holding one statement.
 */
export interface CqlScript {
  /** Script version number */
  readonly version: number;
  /** Script name, e.g. `create_table_users` */
  readonly name: string;
  /** File name, e.g. `0001_create_table_users.cql` */
  readonly fileName: string;
  /** Script file content */
  readonly content: string;
  readonly kind: SpecificationKind;
  /** Rendered name of the keyspace, table, index or type the script touches */
  readonly target: string;
}

/**
 * Options for script generation.
 */
export interface ScriptGeneratorOptions {
  /**
   * Append the inverse DROP statement, commented out, to create scripts.
   * @default true
   */
  generateDown?: boolean;

  /**
   * First version number.
   * @default 1
   */
  startVersion?: number;

  /**
   * Digits the version is zero-padded to.
   * @default 4
   */
  versionPadding?: number;
}

/**
 * Script generator options with defaults applied.
 */
export interface ResolvedScriptGeneratorOptions {
  generateDown: boolean;
  startVersion: number;
  versionPadding: number;
}
