/**
 * cql-schema-generator - Data Type Tests
 */

import { describe, it, expect } from 'vitest';
import { DataTypes, renderDataType } from './data-types.js';

describe('renderDataType', () => {
  it('renders native types', () => {
    expect(renderDataType(DataTypes.TEXT)).toBe('text');
    expect(renderDataType(DataTypes.TIMEUUID)).toBe('timeuuid');
  });

  it('renders collections', () => {
    expect(renderDataType(DataTypes.listOf(DataTypes.ASCII))).toBe('list<ascii>');
    expect(renderDataType(DataTypes.setOf(DataTypes.UUID))).toBe('set<uuid>');
    expect(renderDataType(DataTypes.mapOf(DataTypes.TEXT, DataTypes.INT))).toBe('map<text, int>');
  });

  it('renders nested types', () => {
    expect(renderDataType(DataTypes.mapOf(DataTypes.TEXT, DataTypes.listOf(DataTypes.INT)))).toBe(
      'map<text, list<int>>'
    );
    expect(renderDataType(DataTypes.tupleOf(DataTypes.INT, DataTypes.TEXT, DataTypes.FLOAT))).toBe(
      'tuple<int, text, float>'
    );
  });

  it('renders frozen user types', () => {
    expect(renderDataType(DataTypes.frozen(DataTypes.userType('address')))).toBe('frozen<address>');
  });

  it('qualifies user types with their keyspace', () => {
    expect(renderDataType(DataTypes.userType('address', 'shop'))).toBe('shop.address');
  });

  it('quotes user type names that need it', () => {
    expect(renderDataType(DataTypes.userType('Type', 'shop'))).toBe('shop.Type');
    expect(renderDataType(DataTypes.userType('set'))).toBe('"set"');
  });
});

describe('DataTypes', () => {
  it('returns frozen type objects', () => {
    const list = DataTypes.listOf(DataTypes.INT);

    expect(Object.isFrozen(list)).toBe(true);
    expect(Object.isFrozen(DataTypes.TEXT)).toBe(true);
  });
});
