/**
 * Error registry and error class tests
 */

import { describe, expect, it } from 'vitest';
import {
  BrewportError,
  CATEGORY_PREFIXES,
  ConfigError,
  EmissionError,
  ERROR_ID_PATTERN,
  ERROR_REGISTRY,
  ParseError,
  UnrecognizedMemberError,
  createError,
  excerpt,
  renderMessage,
} from 'brewport';

describe('ERROR_REGISTRY', () => {
  it('holds every error condition once', () => {
    expect(ERROR_REGISTRY.size).toBe(13);
  });

  it('uses IDs whose letter matches the category', () => {
    for (const [id, definition] of ERROR_REGISTRY.entries()) {
      expect(id).toMatch(ERROR_ID_PATTERN);
      expect(id.charAt(5)).toBe(CATEGORY_PREFIXES[definition.category]);
      expect(definition.errorId).toBe(id);
    }
  });

  it('keeps descriptions short', () => {
    for (const [, definition] of ERROR_REGISTRY.entries()) {
      expect(definition.description.length).toBeLessThanOrEqual(50);
    }
  });
});

describe('renderMessage', () => {
  it('fills placeholders from context', () => {
    expect(renderMessage('Cannot resolve type {name}', { name: 'Foo' })).toBe(
      'Cannot resolve type Foo'
    );
  });

  it('renders missing values as empty strings', () => {
    expect(renderMessage('a{x}b', {})).toBe('ab');
  });

  it('returns a template with an unclosed brace unchanged', () => {
    expect(renderMessage('a{x', { x: 1 })).toBe('a{x');
  });
});

describe('excerpt', () => {
  it('quotes short text on one line', () => {
    expect(excerpt('int\n  x')).toBe("'int x'");
  });

  it('truncates long text', () => {
    expect(excerpt('a'.repeat(50))).toBe(`'${'a'.repeat(37)}...'`);
  });
});

describe('error classes', () => {
  it('appends the location to the message and strips it in toData', () => {
    const error = new ParseError(
      { line: 2, column: 4, offset: 9 },
      ')',
      'parameter list',
      'parameter name'
    );
    expect(error.message).toBe(
      "Malformed parameter list: expected parameter name, found ')' at 2:4"
    );
    expect(error.category).toBe('parse');
    expect(error.toData()).toEqual({
      errorId: 'BREW-P002',
      kind: 'ParseError',
      message: "Malformed parameter list: expected parameter name, found ')'",
      location: { line: 2, column: 4, offset: 9 },
      offending: ')',
      context: {
        construct: 'parameter list',
        expected: 'parameter name',
        text: "')'",
      },
    });
  });

  it('formats through a host formatter', () => {
    const error = new UnrecognizedMemberError({ line: 1, column: 1, offset: 0 }, 'x', 'file');
    expect(error.format((data) => `${data.errorId}: ${data.message}`)).toBe(
      "BREW-P001: Unrecognized file member starting at 'x'"
    );
    expect(error.format()).toBe("Unrecognized file member starting at 'x' at 1:1");
  });

  it('rejects IDs of another category', () => {
    expect(() => new EmissionError('BREW-P001', {})).toThrow(
      'Expected emit error ID, got: BREW-P001'
    );
  });

  it('rejects unknown IDs', () => {
    expect(() => createError('BREW-X999', {})).toThrow('Unknown error ID: BREW-X999');
  });

  it('creates registry errors by ID', () => {
    const error = createError('BREW-E001', { name: 'Foo' }, { line: 3, column: 5, offset: 20 });
    expect(error).toBeInstanceOf(BrewportError);
    expect(error.message).toBe('Cannot resolve type Foo at 3:5');
  });

  it('renders config errors without a location', () => {
    const error = new ConfigError('emit.indent must be a non-negative integer');
    expect(error.message).toBe(
      'Invalid configuration: emit.indent must be a non-negative integer'
    );
    expect(error.location).toBeUndefined();
  });
});
