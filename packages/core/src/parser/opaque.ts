/**
 * Opaque Spans
 *
 * Bodies and initializers are carried as source text. The only structure
 * recovered from them is anonymous class expressions, found depth-first in
 * source order and parsed into nodes whose members go back through the
 * dispatcher.
 */

import type {
  AnonymousClassExprNode,
  OpaqueBodyNode,
  OpaqueSegment,
  TextSegmentNode,
} from '../ast-nodes.js';
import type { SourceLocation } from '../source-location.js';
import type { TokenElement, TokenGroup } from '../token-types.js';
import { TokenInputStream } from '../stream/token-stream.js';
import type { ParseContext } from './context.js';
import { enterScope } from './context.js';
import { dispatchMembers } from './dispatcher.js';
import { expectElement, isCurly, isKeyword, isRound, skipClassType } from './helpers.js';
import { parseTypeRef } from './type-parsing.js';

const ANONYMOUS_CLASS = 'anonymous class';

/** `new` Type `(…)` `{…}` at the cursor */
function atAnonymousClass(stream: TokenInputStream): boolean {
  if (!isKeyword(stream.current(), 'new')) return false;
  const peek = stream.peekStream();
  peek.advance();
  if (!skipClassType(peek) || !isRound(peek.current())) return false;
  peek.advance();
  return isCurly(peek.current());
}

function parseAnonymousClass(
  stream: TokenInputStream,
  ctx: ParseContext
): AnonymousClassExprNode {
  const newToken = expectElement(
    stream,
    ANONYMOUS_CLASS,
    (e): e is TokenElement => isKeyword(e, 'new'),
    "'new'"
  );
  const baseType = parseTypeRef(stream, ctx, ANONYMOUS_CLASS);
  const args = expectElement(stream, ANONYMOUS_CLASS, isRound, 'argument list');
  const body = expectElement(stream, ANONYMOUS_CLASS, isCurly, 'class body');

  const members = dispatchMembers(
    TokenInputStream.over(body),
    ctx.memberMatchers,
    enterScope(ctx, null, 'anonymous class')
  );

  return {
    type: 'AnonymousClassExpr',
    baseType,
    arguments: opaqueFromGroup(args, ctx),
    members,
    span: { start: newToken.span.start, end: body.span.end },
  };
}

function collectAnonymousClasses(
  elements: readonly TokenElement[],
  ctx: ParseContext,
  out: AnonymousClassExprNode[]
): AnonymousClassExprNode[] {
  const stream = new TokenInputStream(elements);
  while (stream.hasNext()) {
    if (atAnonymousClass(stream)) {
      out.push(parseAnonymousClass(stream, ctx));
      continue;
    }
    const element = stream.advance();
    if (element !== undefined && element.kind === 'group') {
      collectAnonymousClasses(element.children, ctx, out);
    }
  }
  return out;
}

function textSegment(
  ctx: ParseContext,
  start: SourceLocation,
  end: SourceLocation
): TextSegmentNode {
  return {
    type: 'TextSegment',
    text: ctx.source.slice(start.offset, end.offset),
    span: { start, end },
  };
}

function buildOpaque(
  elements: readonly TokenElement[],
  from: SourceLocation,
  to: SourceLocation,
  span: OpaqueBodyNode['span'],
  ctx: ParseContext
): OpaqueBodyNode {
  const segments: OpaqueSegment[] = [];
  let cursor = from;

  for (const anonymous of collectAnonymousClasses(elements, ctx, [])) {
    if (anonymous.span.start.offset > cursor.offset) {
      segments.push(textSegment(ctx, cursor, anonymous.span.start));
    }
    segments.push(anonymous);
    cursor = anonymous.span.end;
  }
  if (to.offset > cursor.offset) {
    segments.push(textSegment(ctx, cursor, to));
  }

  return { type: 'OpaqueBody', segments, span };
}

/** Interior of a bracket group; the node span includes the brackets */
export function opaqueFromGroup(
  group: TokenGroup,
  ctx: ParseContext
): OpaqueBodyNode {
  return buildOpaque(
    group.children,
    group.open.span.end,
    group.close.span.start,
    group.span,
    ctx
  );
}

/**
 * Field initializer elements. An initializer that is exactly one anonymous
 * class expression is returned as that node.
 */
export function opaqueInitializer(
  elements: readonly TokenElement[],
  ctx: ParseContext
): AnonymousClassExprNode | OpaqueBodyNode | null {
  const first = elements[0];
  const last = elements[elements.length - 1];
  if (first === undefined || last === undefined) return null;

  const body = buildOpaque(
    elements,
    first.span.start,
    last.span.end,
    { start: first.span.start, end: last.span.end },
    ctx
  );
  const only = body.segments[0];
  if (body.segments.length === 1 && only?.type === 'AnonymousClassExpr') {
    return only;
  }
  return body;
}
