/**
 * cql-schema-generator - Index Specifications
 *
 * Builders for CREATE / DROP INDEX.
 */

import { SpecificationValidationError } from '../errors.js';
import { Identifier, toIdentifier, type IdentifierLike } from '../cql/identifier.js';
import type { ColumnFunction, CreateIndexSpecification, DropIndexSpecification, QualifiedName } from '../types.js';
import { freezeSpecification, qualifiedName } from './options-builder.js';

/**
 * @example
 * ```typescript
 * createIndex('idx_tags').tableName('posts').columnName('tags').values().build();
 * // CREATE INDEX idx_tags ON posts (values(tags));
 * ```
 */
export class CreateIndexBuilder {
  private readonly keyspace: Identifier | undefined;
  private readonly name: Identifier | undefined;
  private table: Identifier | undefined;
  private column: Identifier | undefined;
  private fn: ColumnFunction = 'none';
  private ifNotExistsFlag = false;
  private className: string | undefined;
  private readonly options = new Map<string, string>();

  constructor(keyspace?: Identifier, name?: Identifier) {
    this.keyspace = keyspace;
    this.name = name;
  }

  ifNotExists(ifNotExists = true): this {
    this.ifNotExistsFlag = ifNotExists;
    return this;
  }

  tableName(table: IdentifierLike): this {
    this.table = toIdentifier(table);
    return this;
  }

  columnName(column: IdentifierLike): this {
    this.column = toIdentifier(column);
    return this;
  }

  columnFunction(fn: ColumnFunction): this {
    this.fn = fn;
    return this;
  }

  keys(): this {
    return this.columnFunction('keys');
  }

  values(): this {
    return this.columnFunction('values');
  }

  entries(): this {
    return this.columnFunction('entries');
  }

  full(): this {
    return this.columnFunction('full');
  }

  /**
   * Makes the index custom. An empty class name makes it a regular index again.
   */
  using(className: string | undefined): this {
    this.className = className && className.trim() !== '' ? className : undefined;
    return this;
  }

  withOption(name: string, value: string): this {
    this.options.set(name, value);
    return this;
  }

  build(): CreateIndexSpecification {
    if (!this.table) {
      throw new SpecificationValidationError('CREATE INDEX requires a table name');
    }
    if (!this.column) {
      throw new SpecificationValidationError('CREATE INDEX requires a column name');
    }
    if (this.options.size > 0 && !this.className) {
      throw new SpecificationValidationError('Index options are only supported on custom indexes');
    }

    return freezeSpecification<CreateIndexSpecification>({
      kind: 'createIndex',
      keyspace: this.keyspace,
      name: this.name,
      table: this.table,
      column: this.column,
      columnFunction: this.fn,
      ifNotExists: this.ifNotExistsFlag,
      using: this.className,
      options: new Map(this.options),
    });
  }
}

export class DropIndexBuilder {
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

  build(): DropIndexSpecification {
    return freezeSpecification<DropIndexSpecification>({
      kind: 'dropIndex',
      keyspace: this.keyspace,
      name: this.name,
      ifExists: this.ifExistsFlag,
    });
  }
}

/**
 * Starts a CREATE INDEX; without a name the server picks one.
 */
export function createIndex(name?: IdentifierLike): CreateIndexBuilder;
export function createIndex(keyspace: IdentifierLike | undefined, name: IdentifierLike): CreateIndexBuilder;
export function createIndex(first?: IdentifierLike, second?: IdentifierLike): CreateIndexBuilder {
  if (first === undefined && second === undefined) {
    return new CreateIndexBuilder();
  }
  const { keyspace, name } = qualifiedName(first, second);
  return new CreateIndexBuilder(keyspace, name);
}

export function dropIndex(name: IdentifierLike): DropIndexBuilder;
export function dropIndex(keyspace: IdentifierLike | undefined, name: IdentifierLike): DropIndexBuilder;
export function dropIndex(first: IdentifierLike | undefined, second?: IdentifierLike): DropIndexBuilder {
  return new DropIndexBuilder(qualifiedName(first, second));
}
