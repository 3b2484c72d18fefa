/**
 * cql-schema-generator - Identifier Tests
 */

import { describe, it, expect } from 'vitest';
import { InvalidIdentifierError } from '../errors.js';
import {
  Identifier,
  isQuotedIdentifier,
  isReservedKeyword,
  isUnquotedIdentifier,
  renderQualifiedName,
  toIdentifier,
} from './identifier.js';

describe('Identifier', () => {
  describe('of', () => {
    it('renders legal unquoted names as-is', () => {
      const id = Identifier.of('user_profiles');

      expect(id.quoted).toBe(false);
      expect(id.render()).toBe('user_profiles');
    });

    it('keeps the case of mixed-case names', () => {
      expect(Identifier.of('UserProfiles').render()).toBe('UserProfiles');
    });

    it('quotes when forced', () => {
      const id = Identifier.of('users', true);

      expect(id.quoted).toBe(true);
      expect(id.render()).toBe('"users"');
    });

    it('quotes reserved keywords regardless of case', () => {
      expect(Identifier.of('table').render()).toBe('"table"');
      expect(Identifier.of('Order').render()).toBe('"Order"');
    });

    it('doubles embedded double quotes', () => {
      const id = Identifier.of('my"col');

      expect(id.name).toBe('my"col');
      expect(id.render()).toBe('"my""col"');
    });

    it('rejects names matching neither grammar', () => {
      expect(() => Identifier.of('1abc')).toThrow(InvalidIdentifierError);
      expect(() => Identifier.of('1abc')).toThrow('Given string [1abc] is not a valid quoted or unquoted identifier');
      expect(() => Identifier.of('')).toThrow(InvalidIdentifierError);
      expect(() => Identifier.of('has space')).toThrow(InvalidIdentifierError);
    });

    it('does not let forceQuote bypass the grammar', () => {
      expect(() => Identifier.of('has-dash', true)).toThrow(InvalidIdentifierError);
    });

    it('exposes the rejected name on the error', () => {
      try {
        Identifier.of('bad name');
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(InvalidIdentifierError);
        if (error instanceof InvalidIdentifierError) {
          expect(error.identifier).toBe('bad name');
        }
      }
    });
  });

  describe('fromCql', () => {
    it('parses unquoted text', () => {
      const id = Identifier.fromCql('users');

      expect(id.name).toBe('users');
      expect(id.quoted).toBe(false);
    });

    it('parses quoted text and undoubles quotes', () => {
      const id = Identifier.fromCql('"my""col"');

      expect(id.name).toBe('my"col');
      expect(id.quoted).toBe(true);
    });

    it('round-trips rendered identifiers', () => {
      for (const id of [Identifier.of('users'), Identifier.quoted('Users'), Identifier.of('my"col'), Identifier.of('to')]) {
        expect(Identifier.fromCql(id.render()).equals(id)).toBe(true);
      }
    });

    it('rejects quoted text with a lone inner quote', () => {
      expect(() => Identifier.fromCql('"a"b"')).toThrow(InvalidIdentifierError);
    });
  });

  it('compares name and quoting', () => {
    expect(Identifier.of('users').equals(Identifier.of('users'))).toBe(true);
    expect(Identifier.of('users').equals(Identifier.quoted('users'))).toBe(false);
    expect(Identifier.of('users').equals(Identifier.of('Users'))).toBe(false);
  });

  it('serializes to its rendered form', () => {
    expect(JSON.stringify({ table: Identifier.of('table') })).toBe('{"table":"\\"table\\""}');
    expect(String(Identifier.of('users'))).toBe('users');
  });
});

describe('grammar helpers', () => {
  it('detects reserved keywords', () => {
    expect(isReservedKeyword('keyspace')).toBe(true);
    expect(isReservedKeyword('users')).toBe(false);
  });

  it('checks unquoted identifiers', () => {
    expect(isUnquotedIdentifier('_private1')).toBe(true);
    expect(isUnquotedIdentifier('select')).toBe(false);
    expect(isUnquotedIdentifier('a-b')).toBe(false);
  });

  it('checks quoted identifiers', () => {
    expect(isQuotedIdentifier('say"hi')).toBe(true);
    expect(isQuotedIdentifier('9lives')).toBe(false);
  });
});

describe('toIdentifier', () => {
  it('passes identifiers through', () => {
    const id = Identifier.quoted('users');

    expect(toIdentifier(id)).toBe(id);
  });

  it('wraps strings', () => {
    expect(toIdentifier('users').render()).toBe('users');
  });
});

describe('renderQualifiedName', () => {
  it('qualifies with the keyspace', () => {
    expect(renderQualifiedName(Identifier.of('shop'), Identifier.of('orders'))).toBe('shop.orders');
  });

  it('renders the bare name without a keyspace', () => {
    expect(renderQualifiedName(undefined, Identifier.of('orders'))).toBe('orders');
  });

  it('quotes each part independently', () => {
    expect(renderQualifiedName(Identifier.of('shop'), Identifier.of('order'))).toBe('shop."order"');
  });
});
