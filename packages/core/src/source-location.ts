// ============================================================
// SOURCE LOCATION
// ============================================================

export interface SourceLocation {
  readonly line: number;
  readonly column: number;
  readonly offset: number;
}

export interface SourceSpan {
  readonly start: SourceLocation;
  readonly end: SourceLocation;
}

/** Span from the start of `first` to the end of `last` */
export function joinSpans(first: SourceSpan, last: SourceSpan): SourceSpan {
  return { start: first.start, end: last.end };
}

/** Raw source text covered by a span */
export function sliceSpan(source: string, span: SourceSpan): string {
  return source.slice(span.start.offset, span.end.offset);
}
