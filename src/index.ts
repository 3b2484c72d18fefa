/**
 * cql-schema-generator - CQL Schema Statement Generator
 *
 * Generates CREATE / ALTER / DROP statements for keyspaces, tables, indexes
 * and user-defined types from typed specifications.
 *
 * @example
 * ```typescript
 * import { DataTypes, SpecificationBuilder, toCql } from 'cql-schema-generator';
 *
 * const spec = SpecificationBuilder.createTable('shop', 'orders')
 *   .ifNotExists()
 *   .partitionKeyColumn('customer_id', DataTypes.UUID)
 *   .clusteredKeyColumn('placed_at', DataTypes.TIMESTAMP, 'DESC')
 *   .column('total', DataTypes.DECIMAL)
 *   .build();
 *
 * console.log(toCql(spec));
 * ```
 */

// Types
export type {
  PrimaryKeyType,
  Ordering,
  QualifiedName,
  ColumnSpecification,
  AddColumnChange,
  DropColumnChange,
  AlterColumnChange,
  RenameColumnChange,
  ColumnChange,
  FieldChange,
  ColumnFunction,
  CreateKeyspaceSpecification,
  AlterKeyspaceSpecification,
  DropKeyspaceSpecification,
  CreateTableSpecification,
  AlterTableSpecification,
  DropTableSpecification,
  CreateIndexSpecification,
  DropIndexSpecification,
  CreateUserTypeSpecification,
  AlterUserTypeSpecification,
  DropUserTypeSpecification,
  KeyspaceSpecification,
  Specification,
  SpecificationKind,
  CqlScript,
  ScriptGeneratorOptions,
  ResolvedScriptGeneratorOptions,
} from './types.js';

// Errors
export {
  ErrorCode,
  CqlSchemaError,
  InvalidIdentifierError,
  SpecificationValidationError,
  IllegalOptionError,
  UnsupportedSpecificationError,
} from './errors.js';

// Logging
export { createLogger, enableLogging, disableLogging, isLoggingEnabled } from './logger.js';

// Identifiers and data types
export {
  Identifier,
  isReservedKeyword,
  isUnquotedIdentifier,
  isQuotedIdentifier,
  toIdentifier,
  renderQualifiedName,
} from './cql/identifier.js';
export type { IdentifierLike } from './cql/identifier.js';
export { DataTypes, renderDataType } from './cql/data-types.js';
export type { DataType, NativeTypeName } from './cql/data-types.js';

// Options
export {
  Option,
  KeyspaceOption,
  ReplicationOption,
  ReplicationStrategy,
  dataCenterOption,
  TableOption,
  CachingOption,
  KeyCachingOption,
  CompactionOption,
  CompressionOption,
  findTableOption,
  isNestedOptionMap,
} from './keyspace/option.js';
export type {
  OptionValueType,
  ScalarOptionValue,
  NestedOptionMap,
  OptionValue,
  OptionMap,
  OptionFlags,
} from './keyspace/option.js';

// Specification builders
export {
  simpleReplication,
  networkReplication,
  createKeyspace,
  alterKeyspace,
  dropKeyspace,
  CreateKeyspaceBuilder,
  AlterKeyspaceBuilder,
  DropKeyspaceBuilder,
} from './keyspace/keyspace.js';
export type { DataCenterReplication } from './keyspace/keyspace.js';
export {
  column,
  columnSpecification,
  addColumn,
  dropColumn,
  alterColumn,
  renameColumn,
  ColumnBuilder,
} from './keyspace/column.js';
export {
  createTable,
  alterTable,
  dropTable,
  CreateTableBuilder,
  AlterTableBuilder,
  DropTableBuilder,
} from './keyspace/table.js';
export { createIndex, dropIndex, CreateIndexBuilder, DropIndexBuilder } from './keyspace/index-specification.js';
export {
  createType,
  alterType,
  dropType,
  CreateUserTypeBuilder,
  AlterUserTypeBuilder,
  DropUserTypeBuilder,
} from './keyspace/user-type.js';
export { SpecificationBuilder } from './keyspace/specification-builder.js';

// Statement generation
export { toCql } from './generator/cql-generator.js';
export { effectiveKeyspaceOptions } from './generator/keyspace-cql.js';
export { renderOptionMap, renderIndexOptions } from './generator/option-map.js';

// Execution
export { SchemaAdmin } from './admin/schema-admin.js';
export type { StatementExecutor, SchemaAdminOptions } from './admin/schema-admin.js';

// Keyspace actions
export {
  KeyspaceAction,
  KeyspaceActionsConfigSchema,
  parseKeyspaceActionsConfig,
  resolveKeyspaceActions,
} from './keyspace-actions.js';
export type {
  KeyspaceActionsConfig,
  ResolvedKeyspaceActionsConfig,
  KeyspaceActions,
} from './keyspace-actions.js';

// Scripts
export { generateScript, generateScripts, getScriptPath, inverseStatement, toSnakeCase } from './migration/generator.js';
