/**
 * cql-schema-generator - Quoting Tests
 */

import { describe, it, expect } from 'vitest';
import { doubleQuote, escapeDouble, escapeSingle, quoteString, singleQuote } from './quoting.js';

describe('quoting', () => {
  it('doubles quotes', () => {
    expect(escapeSingle("it's 'fine'")).toBe("it''s ''fine''");
    expect(escapeDouble('say "hi"')).toBe('say ""hi""');
  });

  it('wraps without escaping', () => {
    expect(singleQuote('a')).toBe("'a'");
    expect(doubleQuote('a')).toBe('"a"');
  });

  it('quotes string literals', () => {
    expect(quoteString("it's")).toBe("'it''s'");
  });
});
