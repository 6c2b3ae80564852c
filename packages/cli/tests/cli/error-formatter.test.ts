/**
 * Error Formatter Tests
 * Human, JSON and compact rendering of enriched errors
 */

import { describe, it, expect } from 'vitest';
import { BrewportError, ERROR_REGISTRY, transpile } from 'brewport';
import { enrichError, type EnrichedError } from '../../src/cli-error-enrichment.js';
import {
  formatError,
  renderCaretUnderline,
  type FormatOptions,
} from '../../src/cli-error-formatter.js';
import { formatError as formatAnyError } from '../../src/cli-shared.js';

const SOURCE = 'class A {\n  Runable r;\n}';

function enriched(): EnrichedError {
  try {
    transpile(SOURCE, { knownTypes: ['Runnable'] });
  } catch (error) {
    if (error instanceof BrewportError) return enrichError(error, SOURCE);
    throw error;
  }
  throw new Error('expected transpile to fail');
}

const HUMAN: FormatOptions = { format: 'human', verbose: false, file: 'A.java' };

describe('formatError', () => {
  describe('human format', () => {
    it('renders header, location, snippet, caret and help', () => {
      expect(formatError(enriched(), HUMAN)).toBe(
        [
          'error[BREW-E001]: Cannot resolve type Runable',
          '  --> A.java:2:3',
          '   |',
          ' 1 | class A {',
          ' 2 |   Runable r;',
          '   |   ^^^^^^^',
          ' 3 | }',
          '   |',
          '   = help: Did you mean `Runnable`?',
        ].join('\n')
      );
    });

    it('adds registry cause and resolution when verbose', () => {
      const definition = ERROR_REGISTRY.get('BREW-E001');
      const lines = formatError(enriched(), { ...HUMAN, verbose: true }).split('\n');
      expect(lines.slice(-3)).toEqual([
        `   = note: ${definition?.cause ?? ''}`,
        `   = help: ${definition?.resolution ?? ''}`,
        '   = see: brewport --explain BREW-E001',
      ]);
    });

    it('omits the location line when there is no span or file', () => {
      const error: EnrichedError = { errorId: 'BREW-C001', message: 'Invalid configuration: x' };
      expect(formatError(error, { format: 'human', verbose: false })).toBe(
        'error[BREW-C001]: Invalid configuration: x'
      );
    });

    it('widens the gutter for multi-digit line numbers', () => {
      const error: EnrichedError = {
        errorId: 'BREW-G003',
        message: "Unclosed '{'",
        span: {
          start: { line: 10, column: 1, offset: 0 },
          end: { line: 10, column: 2, offset: 1 },
        },
        sourceSnippet: {
          lines: [
            { lineNumber: 9, content: 'int a;', isErrorLine: false },
            { lineNumber: 10, content: '{', isErrorLine: true },
          ],
          highlightSpan: {
            start: { line: 10, column: 1, offset: 0 },
            end: { line: 10, column: 2, offset: 1 },
          },
        },
      };
      expect(formatError(error, { format: 'human', verbose: false })).toBe(
        [
          "error[BREW-G003]: Unclosed '{'",
          '  --> 10:1',
          '    |',
          '  9 | int a;',
          ' 10 | {',
          '    | ^',
          '    |',
        ].join('\n')
      );
    });
  });

  describe('json format', () => {
    it('renders an LSP diagnostic with 0-based positions', () => {
      const output = formatError(enriched(), { format: 'json', verbose: false, file: 'A.java' });
      expect(JSON.parse(output)).toEqual({
        errorId: 'BREW-E001',
        severity: 1,
        message: 'Cannot resolve type Runable',
        file: 'A.java',
        range: {
          start: { line: 1, character: 2 },
          end: { line: 1, character: 9 },
        },
        source: 'brewport',
        code: 'BREW-E001',
        suggestions: ['Did you mean `Runnable`?'],
      });
    });
  });

  describe('compact format', () => {
    it('renders one line with the first hint', () => {
      expect(formatError(enriched(), { format: 'compact', verbose: false, file: 'A.java' })).toBe(
        'A.java:2:3: error[BREW-E001]: Cannot resolve type Runable (hint: Did you mean `Runnable`?)'
      );
    });

    it('renders without a location prefix when there is none', () => {
      const error: EnrichedError = { errorId: 'BREW-C001', message: 'Invalid configuration: x' };
      expect(formatError(error, { format: 'compact', verbose: false })).toBe(
        'error[BREW-C001]: Invalid configuration: x'
      );
    });
  });

  it('throws TypeError for an unknown format', () => {
    const options = { format: 'xml', verbose: false };
    expect(() => Reflect.apply(formatError, undefined, [enriched(), options])).toThrow(
      'Unknown format: xml'
    );
  });
});

describe('renderCaretUnderline', () => {
  const at = (line: number, column: number) => ({ line, column, offset: 0 });

  it('underlines a single character', () => {
    expect(renderCaretUnderline({ start: at(1, 1), end: at(1, 2) }, 'x')).toBe('^');
  });

  it('underlines the span width from its 1-based column', () => {
    expect(renderCaretUnderline({ start: at(1, 5), end: at(1, 8) }, 'int abc;')).toBe('    ^^^');
  });

  it('draws at least one caret for an empty span', () => {
    expect(renderCaretUnderline({ start: at(1, 3), end: at(1, 3) }, 'abc')).toBe('  ^');
  });

  it('runs to the end of the first line of a multi-line span', () => {
    expect(renderCaretUnderline({ start: at(1, 3), end: at(3, 1) }, 'a {b')).toBe('  ^^');
  });

  it('rejects a span that ends before it starts', () => {
    expect(() => renderCaretUnderline({ start: at(2, 1), end: at(1, 1) }, '')).toThrow(
      'Span start must precede end'
    );
  });
});

describe('cli-shared formatError', () => {
  it('routes transpiler errors through the formatter', () => {
    const error = new BrewportError({ errorId: 'BREW-C001', message: 'Invalid configuration: x' });
    expect(formatAnyError(error, undefined, { format: 'compact' })).toBe(
      'error[BREW-C001]: Invalid configuration: x'
    );
  });

  it('reports missing files by path', () => {
    const error = Object.assign(new Error('ENOENT: no such file'), {
      code: 'ENOENT',
      path: '/tmp/Missing.java',
    });
    expect(formatAnyError(error)).toBe('File not found: /tmp/Missing.java');
  });

  it('prints other errors as their message', () => {
    expect(formatAnyError(new Error('Unknown option: --watch'))).toBe('Unknown option: --watch');
  });
});
