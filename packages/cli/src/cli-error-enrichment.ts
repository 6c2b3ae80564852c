/**
 * CLI Error Enrichment
 * Attach source snippets and name suggestions to transpiler errors
 */

import {
  ERROR_REGISTRY,
  type BrewportError,
  type SourceLocation,
  type SourceSpan,
} from 'brewport';

// ============================================================
// PUBLIC TYPES
// ============================================================

export interface SnippetLine {
  /** 1-based line number */
  readonly lineNumber: number;
  readonly content: string;
  readonly isErrorLine: boolean;
}

export interface SourceSnippet {
  readonly lines: SnippetLine[];
  readonly highlightSpan: SourceSpan;
}

/** Error data prepared for the CLI formatters */
export interface EnrichedError {
  readonly errorId: string;
  /** Message without the trailing location */
  readonly message: string;
  readonly span?: SourceSpan | undefined;
  readonly context?: Record<string, unknown> | undefined;
  readonly sourceSnippet?: SourceSnippet | undefined;
  readonly suggestions?: string[] | undefined;
  /** Registry cause, shown with --verbose */
  readonly cause?: string | undefined;
  /** Registry resolution, shown with --verbose */
  readonly resolution?: string | undefined;
}

// ============================================================
// SNIPPETS
// ============================================================

/**
 * Extract the lines around a span.
 *
 * @throws {RangeError} Span starts before line 1 or after the last line
 */
export function extractSnippet(
  source: string,
  span: SourceSpan,
  contextLines = 2
): SourceSnippet {
  if (source === '') {
    return { lines: [], highlightSpan: span };
  }

  const sourceLines = source.split(/\r?\n/);
  if (span.start.line < 1 || span.start.line > sourceLines.length) {
    throw new RangeError('Span exceeds source bounds');
  }

  const endLine = Math.min(span.end.line, sourceLines.length);
  const first = Math.max(1, span.start.line - contextLines);
  const last = Math.min(sourceLines.length, endLine + contextLines);

  const lines: SnippetLine[] = [];
  for (let lineNumber = first; lineNumber <= last; lineNumber++) {
    lines.push({
      lineNumber,
      content: sourceLines[lineNumber - 1] ?? '',
      isErrorLine: lineNumber >= span.start.line && lineNumber <= endLine,
    });
  }

  return { lines, highlightSpan: span };
}

/** Span covering `text` when it starts at `start` */
export function spanOfText(start: SourceLocation, text: string): SourceSpan {
  let { line, column } = start;
  for (const char of text) {
    if (char === '\n') {
      line++;
      column = 1;
    } else {
      column++;
    }
  }
  return { start, end: { line, column, offset: start.offset + text.length } };
}

// ============================================================
// SUGGESTIONS
// ============================================================

function editDistance(a: string, b: string): number {
  let previous = Array.from({ length: b.length + 1 }, (_, i) => i);
  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      current.push(
        Math.min(
          (previous[j] ?? 0) + 1,
          (current[j - 1] ?? 0) + 1,
          (previous[j - 1] ?? 0) + cost
        )
      );
    }
    previous = current;
  }
  return previous[b.length] ?? 0;
}

/**
 * Candidates within edit distance 2 of the target.
 * At most 3, sorted by distance then alphabetically.
 */
export function suggestSimilarNames(
  target: string,
  candidates: readonly string[]
): string[] {
  if (target === '' || candidates.length === 0) return [];

  return [...new Set(candidates)]
    .map((name) => ({ name, distance: editDistance(target, name) }))
    .filter(({ distance }) => distance <= 2)
    .sort((a, b) =>
      a.distance !== b.distance
        ? a.distance - b.distance
        : a.name.localeCompare(b.name)
    )
    .slice(0, 3)
    .map(({ name }) => name);
}

function candidatesOf(context: Record<string, unknown> | undefined): string[] {
  const candidates = context?.['candidates'];
  if (!Array.isArray(candidates)) return [];
  return candidates.filter((c): c is string => typeof c === 'string');
}

// ============================================================
// ENRICHMENT
// ============================================================

/**
 * Combine an error with its source text and registry documentation.
 *
 * @throws {TypeError} Source is not a string
 */
export function enrichError(error: BrewportError, source: string): EnrichedError {
  if (typeof source !== 'string') {
    throw new TypeError('Source must be valid UTF-8');
  }

  const data = error.toData();
  const definition = ERROR_REGISTRY.get(data.errorId);

  const span =
    data.location !== undefined
      ? spanOfText(data.location, data.offending ?? '')
      : undefined;

  let sourceSnippet: SourceSnippet | undefined;
  if (span !== undefined && source !== '') {
    sourceSnippet = extractSnippet(source, span);
  }

  const name = data.context?.['name'];
  const suggestions =
    typeof name === 'string'
      ? suggestSimilarNames(name, candidatesOf(data.context)).map(
          (candidate) => `Did you mean \`${candidate}\`?`
        )
      : [];

  return {
    errorId: data.errorId,
    message: data.message,
    span,
    context: data.context,
    sourceSnippet,
    suggestions: suggestions.length > 0 ? suggestions : undefined,
    cause: definition?.cause,
    resolution: definition?.resolution,
  };
}
