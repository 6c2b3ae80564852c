/**
 * Body Dispatcher
 *
 * Drives an ordered matcher list over the direct children of a scope.
 * Each step offers a fresh peek stream to the matchers in order; the first
 * that recognizes the construct parses it from the real stream, which must
 * then stand exactly where the recognizer stopped.
 */

import {
  MatcherConsumptionMismatchError,
  UnrecognizedMemberError,
} from '../error-classes.js';
import { sliceSpan } from '../source-location.js';
import type { TokenElement } from '../token-types.js';
import type { TokenInputStream } from '../stream/token-stream.js';
import type { ParseContext } from './context.js';
import { isPunct } from './helpers.js';
import type { ConstructMatcher } from './matchers/types.js';

function skipStraySemicolons(stream: TokenInputStream): void {
  while (isPunct(stream.current(), ';')) {
    stream.advance();
  }
}

function dispatchOne<T>(
  stream: TokenInputStream,
  matchers: readonly ConstructMatcher<T>[],
  start: TokenElement,
  ctx: ParseContext
): T {
  for (const matcher of matchers) {
    const peek = stream.peekStream();
    if (!matcher.isMatch(peek, ctx)) continue;

    const node = matcher.parse(stream, ctx);
    if (stream.position !== peek.position) {
      throw new MatcherConsumptionMismatchError(
        matcher.name,
        `stopped at element ${stream.position}, recognizer ended at ${peek.position}`,
        start.span.start,
        sliceSpan(ctx.source, start.span)
      );
    }

    ctx.observability.onMemberMatched?.({
      matcher: matcher.name,
      className: ctx.className,
      location: start.span.start,
    });
    return node;
  }

  throw new UnrecognizedMemberError(
    start.span.start,
    sliceSpan(ctx.source, start.span),
    ctx.scope
  );
}

/**
 * Recognize and parse every construct in the stream.
 *
 * @throws UnrecognizedMemberError when no matcher accepts the element at
 * the cursor
 * @throws MatcherConsumptionMismatchError when a parser and its recognizer
 * disagree on the construct's extent
 */
export function dispatchMembers<T>(
  stream: TokenInputStream,
  matchers: readonly ConstructMatcher<T>[],
  ctx: ParseContext
): T[] {
  const nodes: T[] = [];

  for (;;) {
    skipStraySemicolons(stream);
    const start = stream.current();
    if (start === undefined) return nodes;
    nodes.push(dispatchOne(stream, matchers, start, ctx));
  }
}
