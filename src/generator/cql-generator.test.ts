/**
 * cql-schema-generator - CQL Generator Tests
 */

import { format } from 'node:util';
import { afterEach, describe, it, expect, vi } from 'vitest';
import { DataTypes } from '../cql/data-types.js';
import { Identifier } from '../cql/identifier.js';
import { SpecificationValidationError, UnsupportedSpecificationError } from '../errors.js';
import { columnSpecification } from '../keyspace/column.js';
import { createIndex, dropIndex } from '../keyspace/index-specification.js';
import { alterKeyspace, createKeyspace, dropKeyspace } from '../keyspace/keyspace.js';
import { alterTable, createTable, dropTable } from '../keyspace/table.js';
import { alterType, createType, dropType } from '../keyspace/user-type.js';
import { disableLogging, enableLogging } from '../logger.js';
import type {
  AlterTableSpecification,
  AlterUserTypeSpecification,
  CreateTableSpecification,
  CreateUserTypeSpecification,
  Specification,
} from '../types.js';
import { toCql } from './cql-generator.js';

describe('toCql', () => {
  afterEach(() => {
    disableLogging();
  });

  it('dispatches every specification kind', () => {
    const cases: [Specification, string][] = [
      [
        createKeyspace('shop').withSimpleReplication(2).build(),
        "CREATE KEYSPACE shop WITH replication = { 'class' : 'SimpleStrategy', 'replication_factor' : 2 } AND durable_writes = true;",
      ],
      [alterKeyspace('shop').withDurableWrites(false).build(), 'ALTER KEYSPACE shop WITH durable_writes = false;'],
      [dropKeyspace('shop').build(), 'DROP KEYSPACE shop;'],
      [
        createTable('shop', 'users').partitionKeyColumn('id', DataTypes.UUID).build(),
        'CREATE TABLE shop.users (id uuid, PRIMARY KEY (id));',
      ],
      [alterTable('shop', 'users').add('email', DataTypes.TEXT).build(), 'ALTER TABLE shop.users ADD email text;'],
      [dropTable('shop', 'users').build(), 'DROP TABLE shop.users;'],
      [
        createIndex('users_email').tableName('users').columnName('email').build(),
        'CREATE INDEX users_email ON users (email);',
      ],
      [dropIndex('users_email').build(), 'DROP INDEX users_email;'],
      [createType('address').field('street', DataTypes.TEXT).build(), 'CREATE TYPE address (street text);'],
      [alterType('address').add('zip', DataTypes.INT).build(), 'ALTER TYPE address ADD zip int;'],
      [dropType('address').build(), 'DROP TYPE address;'],
    ];

    for (const [spec, expected] of cases) {
      expect(toCql(spec)).toBe(expected);
    }
  });

  it('returns the same statement on repeated calls', () => {
    const spec = createKeyspace('shop').build();

    expect(toCql(spec)).toBe(toCql(spec));
  });

  it('rejects unknown specifications with their JSON text', () => {
    const unknown: Specification = JSON.parse('{"kind":"truncate","name":"users"}');

    expect(() => toCql(unknown)).toThrow(UnsupportedSpecificationError);
    expect(() => toCql(unknown)).toThrow('Unsupported specification: {"kind":"truncate","name":"users"}');
  });

  it('rejects hand-written specifications with an empty structure', () => {
    const noFields: CreateUserTypeSpecification = {
      kind: 'createUserType',
      name: Identifier.of('address'),
      ifNotExists: false,
      fields: [],
    };
    const noTypeChanges: AlterUserTypeSpecification = {
      kind: 'alterUserType',
      name: Identifier.of('address'),
      changes: [],
    };
    const noPartitionKey: CreateTableSpecification = {
      kind: 'createTable',
      name: Identifier.of('users'),
      ifNotExists: false,
      columns: [columnSpecification('name', DataTypes.TEXT)],
      options: new Map(),
    };
    const noTableChanges: AlterTableSpecification = {
      kind: 'alterTable',
      keyspace: Identifier.of('shop'),
      name: Identifier.of('users'),
      changes: [],
      options: new Map(),
    };

    expect(() => toCql(noFields)).toThrow(SpecificationValidationError);
    expect(() => toCql(noFields)).toThrow('User type address must declare at least one field');
    expect(() => toCql(noTypeChanges)).toThrow('ALTER TYPE address requires at least one change');
    expect(() => toCql(noPartitionKey)).toThrow('Table users must declare at least one partition key column');
    expect(() => toCql(noTableChanges)).toThrow('ALTER TABLE shop.users requires at least one change or option');
  });

  it('rejects null', () => {
    const nothing: Specification = JSON.parse('null');

    expect(() => toCql(nothing)).toThrow('Unsupported specification: null');
  });

  it('logs generated statements', () => {
    const logFn = vi.fn();
    enableLogging('cql-schema:generator', logFn);

    toCql(dropTable('users').build());

    expect(logFn).toHaveBeenCalledTimes(1);
    expect(format(...(logFn.mock.calls[0] ?? []))).toContain('generated dropTable: DROP TABLE users;');
  });
});
