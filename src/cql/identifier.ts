/**
 * cql-schema-generator - Identifier
 *
 * Schema object names together with their quoting requirement.
 */

import reservedKeywords from './reserved-keywords.json' with { type: 'json' };
import { InvalidIdentifierError } from '../errors.js';
import { doubleQuote, escapeDouble } from './quoting.js';

const UNQUOTED_IDENTIFIER = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

// Checked against the name with its double quotes already doubled.
const QUOTED_IDENTIFIER = /^[a-zA-Z_](?:[a-zA-Z0-9_]|"")*$/;

const RESERVED_KEYWORDS: ReadonlySet<string> = new Set(reservedKeywords.map(keyword => keyword.toUpperCase()));

/**
 * Whether the name is a reserved CQL keyword (case-insensitive).
 */
export function isReservedKeyword(name: string): boolean {
  return RESERVED_KEYWORDS.has(name.toUpperCase());
}

/**
 * Whether the name can be written without quotes.
 */
export function isUnquotedIdentifier(name: string): boolean {
  return UNQUOTED_IDENTIFIER.test(name) && !isReservedKeyword(name);
}

/**
 * Whether the name is legal once wrapped in double quotes.
 */
export function isQuotedIdentifier(name: string): boolean {
  return QUOTED_IDENTIFIER.test(escapeDouble(name));
}

/**
 * A schema object name (keyspace, table, column, index, type or field).
 *
 * Names that are legal unquoted CQL render as-is. Anything else that the quoted
 * grammar accepts (reserved keywords, names containing `"`) renders in double
 * quotes with internal quotes doubled.
 */
export class Identifier {
  private constructor(
    /** The logical name, never escaped */
    readonly name: string,
    /** Whether the rendered form is double-quoted */
    readonly quoted: boolean
  ) {}

  /**
   * Creates an identifier for a logical name.
   *
   * @param forceQuote - Quote even when the unquoted form would be legal
   * @throws InvalidIdentifierError if the name matches neither grammar
   */
  static of(name: string, forceQuote = false): Identifier {
    if (isUnquotedIdentifier(name)) {
      return new Identifier(name, forceQuote);
    }
    if (isQuotedIdentifier(name)) {
      return new Identifier(name, true);
    }
    throw new InvalidIdentifierError(name);
  }

  /**
   * Creates a force-quoted identifier.
   */
  static quoted(name: string): Identifier {
    return Identifier.of(name, true);
  }

  /**
   * Parses an identifier as it appears in CQL text, i.e. the output of
   * {@link Identifier.render}.
   */
  static fromCql(text: string): Identifier {
    if (text.length > 1 && text.startsWith('"') && text.endsWith('"')) {
      const inner = text.slice(1, -1);
      if (!QUOTED_IDENTIFIER.test(inner)) {
        throw new InvalidIdentifierError(text);
      }
      return Identifier.of(inner.replace(/""/g, '"'), true);
    }
    return Identifier.of(text);
  }

  render(): string {
    return this.quoted ? doubleQuote(escapeDouble(this.name)) : this.name;
  }

  toCql(): string {
    return this.render();
  }

  equals(other: Identifier): boolean {
    return this.name === other.name && this.quoted === other.quoted;
  }

  toString(): string {
    return this.render();
  }

  toJSON(): string {
    return this.render();
  }
}

/**
 * Accepted wherever a name is expected.
 */
export type IdentifierLike = string | Identifier;

/**
 * Normalizes a name argument to an {@link Identifier}.
 */
export function toIdentifier(value: IdentifierLike): Identifier {
  return value instanceof Identifier ? value : Identifier.of(value);
}

/**
 * Renders `keyspace.name`, or just `name` when unqualified.
 */
export function renderQualifiedName(keyspace: Identifier | undefined, name: Identifier): string {
  return keyspace ? `${keyspace.render()}.${name.render()}` : name.render();
}
