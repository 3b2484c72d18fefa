/**
 * cql-schema-generator - Index Statement Tests
 */

import { describe, it, expect } from 'vitest';
import { createIndex, dropIndex } from '../keyspace/index-specification.js';
import { createIndexCql, dropIndexCql } from './index-cql.js';

describe('createIndexCql', () => {
  it('renders a named index on a collection function', () => {
    const spec = createIndex('idx_tags').tableName('posts').columnName('tags').values().build();

    expect(createIndexCql(spec)).toBe('CREATE INDEX idx_tags ON posts (values(tags));');
  });

  it('renders an anonymous index', () => {
    const spec = createIndex().tableName('users').columnName('email').build();

    expect(createIndexCql(spec)).toBe('CREATE INDEX ON users (email);');
  });

  it('renders each column function', () => {
    const target = (fn: 'keys' | 'entries' | 'full'): string =>
      createIndexCql(createIndex().tableName('t').columnName('c').columnFunction(fn).build());

    expect(target('keys')).toBe('CREATE INDEX ON t (keys(c));');
    expect(target('entries')).toBe('CREATE INDEX ON t (entries(c));');
    expect(target('full')).toBe('CREATE INDEX ON t (full(c));');
  });

  it('renders a custom index with options', () => {
    const spec = createIndex('shop', 'users_name_idx')
      .ifNotExists()
      .tableName('users')
      .columnName('name')
      .using('org.example.NameIndex')
      .withOption('mode', 'CONTAINS')
      .build();

    expect(createIndexCql(spec)).toBe(
      "CREATE CUSTOM INDEX IF NOT EXISTS users_name_idx ON shop.users (name) USING 'org.example.NameIndex' WITH OPTIONS = {'mode': 'CONTAINS'};"
    );
  });

  it('treats an empty class name as a regular index', () => {
    const spec = createIndex('idx').tableName('t').columnName('c').using('').build();

    expect(spec.using).toBeUndefined();
    expect(createIndexCql(spec)).toBe('CREATE INDEX idx ON t (c);');
  });
});

describe('index validation', () => {
  it('requires a table', () => {
    expect(() => createIndex('idx').columnName('c').build()).toThrow('CREATE INDEX requires a table name');
  });

  it('requires a column', () => {
    expect(() => createIndex('idx').tableName('t').build()).toThrow('CREATE INDEX requires a column name');
  });

  it('rejects options on a regular index', () => {
    expect(() => createIndex('idx').tableName('t').columnName('c').withOption('mode', 'PREFIX').build()).toThrow(
      'Index options are only supported on custom indexes'
    );
  });
});

describe('dropIndexCql', () => {
  it('renders DROP INDEX', () => {
    expect(dropIndexCql(dropIndex('idx_tags').build())).toBe('DROP INDEX idx_tags;');
  });

  it('renders IF EXISTS with a keyspace', () => {
    expect(dropIndexCql(dropIndex('shop', 'idx_tags').ifExists().build())).toBe('DROP INDEX IF EXISTS shop.idx_tags;');
  });
});
