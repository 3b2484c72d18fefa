/**
 * cql-schema-generator - Data Types
 *
 * CQL column and field types.
 */

import { Identifier, toIdentifier, type IdentifierLike } from './identifier.js';

/**
 * Native (non-parameterized) CQL types.
 */
export type NativeTypeName =
  | 'ascii'
  | 'bigint'
  | 'blob'
  | 'boolean'
  | 'counter'
  | 'date'
  | 'decimal'
  | 'double'
  | 'duration'
  | 'float'
  | 'inet'
  | 'int'
  | 'smallint'
  | 'text'
  | 'time'
  | 'timestamp'
  | 'timeuuid'
  | 'tinyint'
  | 'uuid'
  | 'varchar'
  | 'varint';

export interface NativeType {
  readonly kind: 'native';
  readonly name: NativeTypeName;
}

export interface ListType {
  readonly kind: 'list';
  readonly element: DataType;
}

export interface SetType {
  readonly kind: 'set';
  readonly element: DataType;
}

export interface MapType {
  readonly kind: 'map';
  readonly key: DataType;
  readonly value: DataType;
}

export interface TupleType {
  readonly kind: 'tuple';
  readonly elements: readonly DataType[];
}

export interface FrozenType {
  readonly kind: 'frozen';
  readonly inner: DataType;
}

/**
 * Reference to a user-defined type, optionally qualified by keyspace.
 */
export interface UserDefinedType {
  readonly kind: 'udt';
  readonly keyspace?: Identifier | undefined;
  readonly name: Identifier;
}

export type DataType = NativeType | ListType | SetType | MapType | TupleType | FrozenType | UserDefinedType;

function frozenType<T extends DataType>(type: T): T {
  Object.freeze(type);
  return type;
}

function native(name: NativeTypeName): NativeType {
  return frozenType<NativeType>({ kind: 'native', name });
}

/**
 * Type constants and constructors.
 *
 * @example
 * ```typescript
 * DataTypes.mapOf(DataTypes.TEXT, DataTypes.listOf(DataTypes.INT));
 * // map<text, list<int>>
 * ```
 */
export const DataTypes = {
  ASCII: native('ascii'),
  BIGINT: native('bigint'),
  BLOB: native('blob'),
  BOOLEAN: native('boolean'),
  COUNTER: native('counter'),
  DATE: native('date'),
  DECIMAL: native('decimal'),
  DOUBLE: native('double'),
  DURATION: native('duration'),
  FLOAT: native('float'),
  INET: native('inet'),
  INT: native('int'),
  SMALLINT: native('smallint'),
  TEXT: native('text'),
  TIME: native('time'),
  TIMESTAMP: native('timestamp'),
  TIMEUUID: native('timeuuid'),
  TINYINT: native('tinyint'),
  UUID: native('uuid'),
  VARCHAR: native('varchar'),
  VARINT: native('varint'),

  listOf(element: DataType): ListType {
    return frozenType<ListType>({ kind: 'list', element });
  },

  setOf(element: DataType): SetType {
    return frozenType<SetType>({ kind: 'set', element });
  },

  mapOf(key: DataType, value: DataType): MapType {
    return frozenType<MapType>({ kind: 'map', key, value });
  },

  tupleOf(...elements: DataType[]): TupleType {
    return frozenType<TupleType>({ kind: 'tuple', elements: Object.freeze([...elements]) });
  },

  frozen(inner: DataType): FrozenType {
    return frozenType<FrozenType>({ kind: 'frozen', inner });
  },

  userType(name: IdentifierLike, keyspace?: IdentifierLike): UserDefinedType {
    return frozenType<UserDefinedType>({
      kind: 'udt',
      keyspace: keyspace === undefined ? undefined : toIdentifier(keyspace),
      name: toIdentifier(name),
    });
  },
} as const;

/**
 * Renders a type the way it appears in DDL, e.g. `map<text, int>`.
 */
export function renderDataType(type: DataType): string {
  switch (type.kind) {
    case 'native':
      return type.name;
    case 'list':
      return `list<${renderDataType(type.element)}>`;
    case 'set':
      return `set<${renderDataType(type.element)}>`;
    case 'map':
      return `map<${renderDataType(type.key)}, ${renderDataType(type.value)}>`;
    case 'tuple':
      return `tuple<${type.elements.map(renderDataType).join(', ')}>`;
    case 'frozen':
      return `frozen<${renderDataType(type.inner)}>`;
    case 'udt':
      return type.keyspace ? `${type.keyspace.render()}.${type.name.render()}` : type.name.render();
  }
}
