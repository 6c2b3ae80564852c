/**
 * CLI Error Formatter
 * Format enriched errors for human-readable, JSON, or compact output
 */

import type { SourceSpan } from 'brewport';
import type { EnrichedError } from './cli-error-enrichment.js';

// ============================================================
// PUBLIC TYPES
// ============================================================

export type { EnrichedError };

export type OutputFormat = 'human' | 'json' | 'compact';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['human', 'json', 'compact'];

/**
 * Format options for error output.
 */
export interface FormatOptions {
  readonly format: OutputFormat;
  readonly verbose: boolean;
  /** Input path shown before the location */
  readonly file?: string | undefined;
}

// ============================================================
// ERROR FORMATTING
// ============================================================

/**
 * Format enriched error for output.
 *
 * - Human format: multi-line with snippet and caret underline
 * - JSON format: LSP Diagnostic compatible
 * - Compact format: single line for CI output
 *
 * @throws {TypeError} Unknown format
 */
export function formatError(error: EnrichedError, options: FormatOptions): string {
  switch (options.format) {
    case 'human':
      return formatErrorHuman(error, options);
    case 'json':
      return formatErrorJson(error, options);
    case 'compact':
      return formatErrorCompact(error, options);
    default:
      throw new TypeError(`Unknown format: ${String(options.format)}`);
  }
}

function locationLabel(error: EnrichedError, file: string | undefined): string | null {
  if (!error.span) return file ?? null;
  const position = `${error.span.start.line}:${error.span.start.column}`;
  return file !== undefined ? `${file}:${position}` : position;
}

/**
 * Format error in human-readable format.
 *
 * ```
 * error[BREW-E001]: Cannot resolve type Runable
 *   --> Main.java:3:3
 *    |
 *  1 | class A {
 *  2 |   int n;
 *  3 |   Runable r;
 *    |   ^^^^^^^
 *  4 | }
 *    |
 *    = help: Did you mean `Runnable`?
 * ```
 */
function formatErrorHuman(error: EnrichedError, options: FormatOptions): string {
  const lines: string[] = [];

  lines.push(`error[${error.errorId}]: ${error.message}`);

  const location = locationLabel(error, options.file);
  if (location !== null) {
    lines.push(`  --> ${location}`);
  }

  if (error.sourceSnippet && error.sourceSnippet.lines.length > 0) {
    const maxLineNumber = Math.max(
      ...error.sourceSnippet.lines.map((l) => l.lineNumber)
    );
    const lineNumberWidth = String(maxLineNumber).length;
    const gutter = ' '.repeat(lineNumberWidth);

    lines.push(` ${gutter} |`);
    for (const line of error.sourceSnippet.lines) {
      const lineNumStr = String(line.lineNumber).padStart(lineNumberWidth, ' ');
      lines.push(` ${lineNumStr} | ${line.content}`.trimEnd());

      // Carets go under the first error line only
      if (
        line.isErrorLine &&
        error.span &&
        line.lineNumber === error.span.start.line
      ) {
        lines.push(` ${gutter} | ${renderCaretUnderline(error.span, line.content)}`);
      }
    }
    lines.push(` ${gutter} |`);
  }

  for (const suggestion of error.suggestions ?? []) {
    lines.push(`   = help: ${suggestion}`);
  }

  if (options.verbose) {
    if (error.cause) lines.push(`   = note: ${error.cause}`);
    if (error.resolution) lines.push(`   = help: ${error.resolution}`);
    lines.push(`   = see: brewport --explain ${error.errorId}`);
  }

  return lines.join('\n');
}

interface Diagnostic {
  errorId: string;
  severity: number;
  message: string;
  file?: string;
  range?: {
    start: { line: number; character: number };
    end: { line: number; character: number };
  };
  source: string;
  code: string;
  suggestions?: string[];
  cause?: string;
  resolution?: string;
}

/**
 * Format error in JSON format (LSP Diagnostic compatible).
 * Lines and characters are 0-based.
 */
function formatErrorJson(error: EnrichedError, options: FormatOptions): string {
  const diagnostic: Diagnostic = {
    errorId: error.errorId,
    severity: 1, // LSP: 1 = Error
    message: error.message,
    source: 'brewport',
    code: error.errorId,
  };

  if (options.file !== undefined) {
    diagnostic.file = options.file;
  }

  if (error.span) {
    diagnostic.range = {
      start: {
        line: error.span.start.line - 1,
        character: error.span.start.column - 1,
      },
      end: {
        line: error.span.end.line - 1,
        character: error.span.end.column - 1,
      },
    };
  }

  if (error.suggestions && error.suggestions.length > 0) {
    diagnostic.suggestions = error.suggestions;
  }

  if (options.verbose) {
    if (error.cause) diagnostic.cause = error.cause;
    if (error.resolution) diagnostic.resolution = error.resolution;
  }

  return JSON.stringify(diagnostic, null, 2);
}

/**
 * Format error in compact format (single line for CI).
 *
 * `Main.java:3:3: error[BREW-E001]: Cannot resolve type Runable (hint: ...)`
 */
function formatErrorCompact(error: EnrichedError, options: FormatOptions): string {
  const location = locationLabel(error, options.file);
  const prefix = location !== null ? `${location}: ` : '';
  const hint =
    error.suggestions && error.suggestions.length > 0
      ? ` (hint: ${error.suggestions[0]})`
      : '';
  return `${prefix}error[${error.errorId}]: ${error.message}${hint}`;
}

// ============================================================
// CARET UNDERLINE
// ============================================================

/**
 * Render caret underline for error span. Columns are 1-based.
 *
 * - Single-char: single ^
 * - Multi-char same line: one ^ per character
 * - Multi-line: carets to the end of the first line
 *
 * @throws {RangeError} Invalid span (start after end)
 */
export function renderCaretUnderline(span: SourceSpan, lineContent: string): string {
  if (
    span.start.line > span.end.line ||
    (span.start.line === span.end.line && span.start.column > span.end.column)
  ) {
    throw new RangeError('Span start must precede end');
  }

  const startColumn = span.start.column;
  const endColumn =
    span.start.line === span.end.line ? span.end.column : lineContent.length + 1;

  const padding = ' '.repeat(Math.max(0, startColumn - 1));
  const carets = '^'.repeat(Math.max(1, endColumn - startColumn));

  return padding + carets;
}
