/**
 * cql-schema-generator - Columns
 *
 * Column / field specifications and the changes applied by ALTER statements.
 */

import { SpecificationValidationError } from '../errors.js';
import type { DataType } from '../cql/data-types.js';
import { Identifier, toIdentifier, type IdentifierLike } from '../cql/identifier.js';
import type {
  AddColumnChange,
  AlterColumnChange,
  ColumnSpecification,
  DropColumnChange,
  Ordering,
  PrimaryKeyType,
  RenameColumnChange,
} from '../types.js';

/**
 * Fluent builder for a single column.
 *
 * @example
 * ```typescript
 * column('created_at').type(DataTypes.TIMESTAMP).clustered('DESC');
 * ```
 */
export class ColumnBuilder {
  private readonly name: Identifier;
  private dataType: DataType | undefined;
  private keyType: PrimaryKeyType = 'none';
  private ordering: Ordering | undefined;

  constructor(name: IdentifierLike) {
    this.name = toIdentifier(name);
  }

  type(type: DataType): this {
    this.dataType = type;
    return this;
  }

  partitioned(partitioned = true): this {
    this.keyType = partitioned ? 'partitioned' : 'none';
    this.ordering = undefined;
    return this;
  }

  /**
   * Marks the column as clustered. Without an ordering no
   * `CLUSTERING ORDER BY` entry is generated for it.
   */
  clustered(ordering?: Ordering): this {
    this.keyType = 'clustered';
    this.ordering = ordering;
    return this;
  }

  build(): ColumnSpecification {
    if (!this.dataType) {
      throw new SpecificationValidationError(`Column ${this.name.render()} has no data type`);
    }
    return columnSpecification(this.name, this.dataType, this.keyType, this.ordering);
  }
}

export function column(name: IdentifierLike): ColumnBuilder {
  return new ColumnBuilder(name);
}

/**
 * Creates a frozen column specification. An ordering is kept only on
 * clustered columns.
 */
export function columnSpecification(
  name: IdentifierLike,
  type: DataType,
  keyType: PrimaryKeyType = 'none',
  ordering?: Ordering
): ColumnSpecification {
  return Object.freeze({
    name: toIdentifier(name),
    type,
    keyType,
    ordering: keyType === 'clustered' ? ordering : undefined,
  });
}

export function addColumn(name: IdentifierLike, type: DataType): AddColumnChange {
  return Object.freeze({ kind: 'add' as const, name: toIdentifier(name), type });
}

export function dropColumn(name: IdentifierLike): DropColumnChange {
  return Object.freeze({ kind: 'drop' as const, name: toIdentifier(name) });
}

export function alterColumn(name: IdentifierLike, type: DataType): AlterColumnChange {
  return Object.freeze({ kind: 'alter' as const, name: toIdentifier(name), type });
}

export function renameColumn(from: IdentifierLike, to: IdentifierLike): RenameColumnChange {
  return Object.freeze({ kind: 'rename' as const, name: toIdentifier(from), to: toIdentifier(to) });
}

/**
 * Rejects a second column with the same name. Unquoted names are
 * case-insensitive in CQL.
 */
export function assertUniqueNames(columns: readonly { readonly name: Identifier }[], owner: string): void {
  const seen = new Set<string>();
  for (const { name } of columns) {
    const key = name.quoted ? name.name : name.name.toLowerCase();
    if (seen.has(key)) {
      throw new SpecificationValidationError(`${owner} declares ${name.render()} more than once`);
    }
    seen.add(key);
  }
}
