/**
 * Parser Helpers
 *
 * Element tests and skip predicates shared by matcher recognizers and
 * parsers. Skip predicates advance the stream they are given and report
 * whether the expected shape was present; matchers run them on peek
 * streams only.
 */

import type { Token, TokenElement, TokenGroup } from '../token-types.js';
import { GROUP_KINDS, isGroup, isToken, TOKEN_KINDS } from '../token-types.js';
import { sliceSpan, type SourceSpan } from '../source-location.js';
import { MatcherConsumptionMismatchError } from '../error-classes.js';
import { MODIFIER_KEYWORDS, PRIMITIVE_TYPES } from '../lexer/keywords.js';
import type { TokenInputStream } from '../stream/token-stream.js';
import type { ParseContext } from './context.js';

// ============================================================
// ELEMENT TESTS
// ============================================================

export function isKeyword(
  element: TokenElement | undefined,
  text?: string
): element is Token & { readonly kind: typeof TOKEN_KINDS.KEYWORD } {
  return isToken(element, TOKEN_KINDS.KEYWORD, text);
}

export function isPunct(
  element: TokenElement | undefined,
  text: string
): element is Token {
  return isToken(element, TOKEN_KINDS.PUNCTUATION, text);
}

export function isOperator(
  element: TokenElement | undefined,
  text: string
): element is Token {
  return isToken(element, TOKEN_KINDS.OPERATOR, text);
}

export function isIdentifier(
  element: TokenElement | undefined
): element is Token {
  return isToken(element, TOKEN_KINDS.IDENTIFIER);
}

export function isModifier(element: TokenElement | undefined): element is Token {
  return isKeyword(element) && MODIFIER_KEYWORDS.has(element.text);
}

export function isPrimitive(
  element: TokenElement | undefined
): element is Token {
  return isKeyword(element) && PRIMITIVE_TYPES.has(element.text);
}

export function isRound(element: TokenElement | undefined): element is TokenGroup {
  return isGroup(element, GROUP_KINDS.ROUND);
}

export function isCurly(element: TokenElement | undefined): element is TokenGroup {
  return isGroup(element, GROUP_KINDS.CURLY);
}

export function isAngle(element: TokenElement | undefined): element is TokenGroup {
  return isGroup(element, GROUP_KINDS.ANGLE);
}

/** `@` followed by a name; `@interface` is not an annotation */
export function isAnnotationStart(stream: TokenInputStream): boolean {
  return isPunct(stream.current(), '@') && isIdentifier(stream.peek(1));
}

/** `[]` with nothing inside */
export function isEmptySquare(
  element: TokenElement | undefined
): element is TokenGroup {
  return isGroup(element, GROUP_KINDS.SQUARE) && element.children.length === 0;
}

/** Literal source text of an element */
export function elementText(ctx: ParseContext, element: TokenElement): string {
  return sliceSpan(ctx.source, element.span);
}

/** Source text between a group's brackets */
export function groupInteriorText(ctx: ParseContext, group: TokenGroup): string {
  return ctx.source.slice(group.open.span.end.offset, group.close.span.start.offset);
}

/** Span from the first element to the last consumed one */
export function spanFrom(
  first: TokenElement,
  stream: TokenInputStream
): SourceSpan {
  const last = stream.previous() ?? first;
  return { start: first.span.start, end: last.span.end };
}

// ============================================================
// SKIP PREDICATES
// ============================================================

/** Skip annotations and modifier keywords; always succeeds */
export function skipModifiers(stream: TokenInputStream): boolean {
  for (;;) {
    if (isModifier(stream.current())) {
      stream.advance();
    } else if (isAnnotationStart(stream)) {
      stream.advance();
      skipQualifiedName(stream);
      if (isRound(stream.current())) stream.advance();
    } else {
      return true;
    }
  }
}

/** identifier (. identifier)* */
export function skipQualifiedName(stream: TokenInputStream): boolean {
  if (!isIdentifier(stream.current())) return false;
  stream.advance();
  while (isPunct(stream.current(), '.') && isIdentifier(stream.peek(1))) {
    stream.advance();
    stream.advance();
  }
  return true;
}

/** Trailing `[]` pairs; returns how many were skipped */
export function skipDimensions(stream: TokenInputStream): number {
  let count = 0;
  while (isEmptySquare(stream.current())) {
    stream.advance();
    count++;
  }
  return count;
}

/** Class type: qualified name with optional type arguments on any segment */
export function skipClassType(stream: TokenInputStream): boolean {
  if (!isIdentifier(stream.current())) return false;
  stream.advance();
  for (;;) {
    if (isAngle(stream.current())) stream.advance();
    if (isPunct(stream.current(), '.') && isIdentifier(stream.peek(1))) {
      stream.advance();
      stream.advance();
      continue;
    }
    return true;
  }
}

/** Primitive or class type, then array dimensions */
export function skipType(stream: TokenInputStream): boolean {
  if (isPrimitive(stream.current())) {
    stream.advance();
  } else if (!skipClassType(stream)) {
    return false;
  }
  skipDimensions(stream);
  return true;
}

/** Type (, Type)* */
export function skipTypeList(stream: TokenInputStream): boolean {
  if (!skipType(stream)) return false;
  while (isPunct(stream.current(), ',')) {
    stream.advance();
    if (!skipType(stream)) return false;
  }
  return true;
}

/** Optional `throws Type (, Type)*` */
export function skipThrows(stream: TokenInputStream): boolean {
  if (!isKeyword(stream.current(), 'throws')) return true;
  stream.advance();
  return skipTypeList(stream);
}

// ============================================================
// PARSE EXPECTATIONS
// ============================================================

/**
 * Consume an element the recognizer already validated.
 * @throws MatcherConsumptionMismatchError when the parser and recognizer disagree
 */
export function expectElement<T extends TokenElement>(
  stream: TokenInputStream,
  matcher: string,
  test: (element: TokenElement | undefined) => element is T,
  description: string
): T {
  const element = stream.current();
  if (!test(element)) {
    throw new MatcherConsumptionMismatchError(
      matcher,
      `expected ${description} at element ${stream.position}`,
      element?.span.start,
      element !== undefined && element.kind !== 'group' ? element.text : undefined
    );
  }
  stream.advance();
  return element;
}

/** Text of the last comment before the cursor, when comments are kept */
export function docCommentAt(
  stream: TokenInputStream,
  ctx: ParseContext
): string | null {
  if (!ctx.preserveComments) return null;
  const comments = stream.leadingComments();
  return comments[comments.length - 1]?.text ?? null;
}

/**
 * Element at the cursor when a parser starts.
 * @throws MatcherConsumptionMismatchError on an exhausted stream
 */
export function startOf(stream: TokenInputStream, matcher: string): TokenElement {
  const element = stream.current();
  if (element === undefined) {
    throw new MatcherConsumptionMismatchError(matcher, 'started at end of input');
  }
  return element;
}

export function isSemicolon(element: TokenElement | undefined): element is Token {
  return isPunct(element, ';');
}
