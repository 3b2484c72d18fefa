/**
 * cql-schema-generator - Script Generator Tests
 */

import { describe, it, expect } from 'vitest';
import { DataTypes } from '../cql/data-types.js';
import { createIndex } from '../keyspace/index-specification.js';
import { createKeyspace } from '../keyspace/keyspace.js';
import { alterTable, createTable, dropTable } from '../keyspace/table.js';
import { createType } from '../keyspace/user-type.js';
import { generateScript, generateScripts, getScriptPath, inverseStatement, toSnakeCase } from './generator.js';

describe('Script Generator', () => {
  const users = createTable('users').partitionKeyColumn('id', DataTypes.UUID).column('email', DataTypes.TEXT).build();

  describe('generateScripts', () => {
    it('generates versioned file names', () => {
      const scripts = generateScripts([
        users,
        alterTable('users').add('name', DataTypes.TEXT).build(),
        dropTable('users').build(),
      ]);

      expect(scripts.map(script => script.fileName)).toEqual([
        '0001_create_table_users.cql',
        '0002_alter_table_users.cql',
        '0003_drop_table_users.cql',
      ]);
      expect(scripts.map(script => script.version)).toEqual([1, 2, 3]);
    });

    it('writes the statement with a commented down migration', () => {
      const [script] = generateScripts([users]);

      expect(script?.content).toBe(
        [
          '-- Migration: Create table users',
          '-- Generated by cql-schema-generator',
          '',
          'CREATE TABLE users (id uuid, email text, PRIMARY KEY (id));',
          '',
          '-- Down migration',
          '-- DROP TABLE IF EXISTS users;',
        ].join('\n')
      );
      expect(script?.kind).toBe('createTable');
      expect(script?.target).toBe('users');
    });

    it('omits the down migration when disabled', () => {
      const [script] = generateScripts([users], { generateDown: false });

      expect(script?.content).toBe(
        [
          '-- Migration: Create table users',
          '-- Generated by cql-schema-generator',
          '',
          'CREATE TABLE users (id uuid, email text, PRIMARY KEY (id));',
        ].join('\n')
      );
    });

    it('respects startVersion option', () => {
      const [script] = generateScripts([users], { startVersion: 10 });

      expect(script?.fileName).toBe('0010_create_table_users.cql');
      expect(script?.version).toBe(10);
    });

    it('respects versionPadding option', () => {
      const [script] = generateScripts([users], { versionPadding: 6 });

      expect(script?.fileName).toBe('000001_create_table_users.cql');
    });
  });

  describe('generateScript', () => {
    it('names qualified targets after keyspace and name', () => {
      const script = generateScript(createType('shop', 'address').field('street', DataTypes.TEXT).build());

      expect(script.name).toBe('create_user_type_shop_address');
      expect(script.target).toBe('shop.address');
      expect(script.content.split('\n')[0]).toBe('-- Migration: Create user type shop.address');
      expect(script.content.endsWith('-- DROP TYPE IF EXISTS shop.address;')).toBe(true);
    });

    it('names anonymous indexes after their table', () => {
      const script = generateScript(createIndex().tableName('users').columnName('email').build(), { version: 7 });

      expect(script.fileName).toBe('0007_create_index_users.cql');
      expect(script.content).toBe(
        [
          '-- Migration: Create index users',
          '-- Generated by cql-schema-generator',
          '',
          'CREATE INDEX ON users (email);',
        ].join('\n')
      );
    });

    it('makes quoted names safe for file names', () => {
      const script = generateScript(createTable('weird"name').partitionKeyColumn('id', DataTypes.INT).build());

      expect(script.fileName).toBe('0001_create_table_weird_name.cql');
      expect(script.target).toBe('"weird""name"');
    });
  });

  describe('inverseStatement', () => {
    it('drops what a create created', () => {
      expect(inverseStatement(createKeyspace('Shop').build())).toBe('DROP KEYSPACE IF EXISTS Shop;');
      expect(inverseStatement(createIndex('shop', 'users_email').tableName('users').columnName('email').build())).toBe(
        'DROP INDEX IF EXISTS shop.users_email;'
      );
    });

    it('has nothing to undo for other statements', () => {
      expect(inverseStatement(dropTable('users').build())).toBeUndefined();
    });
  });

  it('converts kinds to snake case', () => {
    expect(toSnakeCase('createUserType')).toBe('create_user_type');
  });

  it('builds script paths', () => {
    const [script] = generateScripts([users]);
    if (!script) {
      throw new Error('expected a script');
    }

    expect(getScriptPath(script)).toBe('migrations/0001_create_table_users.cql');
    expect(getScriptPath(script, 'db/cql')).toBe('db/cql/0001_create_table_users.cql');
  });
});
