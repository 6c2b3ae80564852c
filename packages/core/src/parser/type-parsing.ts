/**
 * Type Parsing
 * Type references, type argument and type parameter lists, modifiers and
 * annotations
 */

import type {
  AnnotationNode,
  TypeArgumentNode,
  TypeParameterNode,
  TypeRefNode,
  WildcardNode,
} from '../ast-nodes.js';
import { ParseError } from '../error-classes.js';
import type { TokenGroup } from '../token-types.js';
import { TokenInputStream } from '../stream/token-stream.js';
import type { ParseContext } from './context.js';
import {
  elementText,
  groupInteriorText,
  isAnnotationStart,
  isAngle,
  isIdentifier,
  isKeyword,
  isModifier,
  isOperator,
  isPrimitive,
  isPunct,
  isRound,
  skipDimensions,
  spanFrom,
} from './helpers.js';

// ============================================================
// ERRORS
// ============================================================

/**
 * ParseError at the cursor. When the list is exhausted the error points at
 * the closing bracket of `enclosing`.
 */
export function malformed(
  stream: TokenInputStream,
  ctx: ParseContext,
  construct: string,
  expected: string,
  enclosing?: TokenGroup
): ParseError {
  const element = stream.current();
  if (element !== undefined) {
    return new ParseError(
      element.span.start,
      elementText(ctx, element),
      construct,
      expected
    );
  }
  if (enclosing !== undefined) {
    return new ParseError(
      enclosing.close.span.start,
      enclosing.close.text,
      construct,
      expected
    );
  }
  const last = stream.previous();
  const location = last?.span.end ?? { line: 1, column: 1, offset: 0 };
  return new ParseError(location, '', construct, expected);
}

// ============================================================
// TYPE REFERENCES
// ============================================================

/**
 * Primitive or qualified class type with type arguments and dimensions.
 * Type arguments written on an outer segment (`Outer<T>.Inner`) are not
 * kept; those of the last segment are.
 */
export function parseTypeRef(
  stream: TokenInputStream,
  ctx: ParseContext,
  construct: string,
  enclosing?: TokenGroup
): TypeRefNode {
  const first = stream.current();
  if (first === undefined || !(isPrimitive(first) || isIdentifier(first))) {
    throw malformed(stream, ctx, construct, 'type', enclosing);
  }
  stream.advance();

  let name = first.text;
  let typeArguments: TypeArgumentNode[] = [];

  if (isIdentifier(first)) {
    for (;;) {
      const next = stream.current();
      if (isAngle(next)) {
        typeArguments = parseTypeArguments(next, ctx);
        stream.advance();
      }
      const segment = stream.peek(1);
      if (isPunct(stream.current(), '.') && isIdentifier(segment)) {
        stream.advance();
        stream.advance();
        name += `.${segment.text}`;
        typeArguments = [];
        continue;
      }
      break;
    }
  }

  const dimensions = skipDimensions(stream);

  return {
    type: 'TypeRef',
    name,
    typeArguments,
    dimensions,
    span: spanFrom(first, stream),
  };
}

/** Type (, Type)* after extends, implements or throws */
export function parseTypeList(
  stream: TokenInputStream,
  ctx: ParseContext,
  construct: string
): TypeRefNode[] {
  const types = [parseTypeRef(stream, ctx, construct)];
  while (isPunct(stream.current(), ',')) {
    stream.advance();
    types.push(parseTypeRef(stream, ctx, construct));
  }
  return types;
}

/** Optional throws clause */
export function parseThrows(
  stream: TokenInputStream,
  ctx: ParseContext
): TypeRefNode[] {
  if (!isKeyword(stream.current(), 'throws')) return [];
  stream.advance();
  return parseTypeList(stream, ctx, 'throws clause');
}

function skipTypeAnnotations(stream: TokenInputStream, ctx: ParseContext): void {
  while (isAnnotationStart(stream)) {
    parseAnnotation(stream, ctx);
  }
}

function parseTypeArgument(
  stream: TokenInputStream,
  ctx: ParseContext,
  group: TokenGroup
): TypeArgumentNode {
  skipTypeAnnotations(stream, ctx);

  const first = stream.current();
  if (first === undefined || !isOperator(first, '?')) {
    return parseTypeRef(stream, ctx, 'type argument list', group);
  }

  stream.advance();
  let bound: WildcardNode['bound'] = null;
  const keyword = stream.current();
  if (isKeyword(keyword, 'extends') || isKeyword(keyword, 'super')) {
    stream.advance();
    bound = {
      kind: keyword.text === 'extends' ? 'extends' : 'super',
      type: parseTypeRef(stream, ctx, 'type argument list', group),
    };
  }

  return { type: 'Wildcard', bound, span: spanFrom(first, stream) };
}

/**
 * Contents of an angle group used as type arguments.
 * An empty group (diamond) yields no arguments.
 *
 * @throws ParseError on malformed contents
 */
export function parseTypeArguments(
  group: TokenGroup,
  ctx: ParseContext
): TypeArgumentNode[] {
  const stream = TokenInputStream.over(group);
  const args: TypeArgumentNode[] = [];
  if (!stream.hasNext()) return args;

  for (;;) {
    args.push(parseTypeArgument(stream, ctx, group));
    if (!stream.hasNext()) return args;
    if (!isPunct(stream.current(), ',')) {
      throw malformed(stream, ctx, 'type argument list', "',' or '>'", group);
    }
    stream.advance();
  }
}

/**
 * Contents of an angle group declaring type parameters: `T`, `T extends A`,
 * `T extends A & B`.
 *
 * @throws ParseError on malformed contents
 */
export function parseTypeParameters(
  group: TokenGroup,
  ctx: ParseContext
): TypeParameterNode[] {
  const stream = TokenInputStream.over(group);
  const params: TypeParameterNode[] = [];
  const construct = 'type parameter list';

  for (;;) {
    skipTypeAnnotations(stream, ctx);
    const nameToken = stream.current();
    if (!isIdentifier(nameToken)) {
      throw malformed(stream, ctx, construct, 'type parameter name', group);
    }
    stream.advance();

    const bounds: TypeRefNode[] = [];
    if (isKeyword(stream.current(), 'extends')) {
      stream.advance();
      bounds.push(parseTypeRef(stream, ctx, construct, group));
      while (isOperator(stream.current(), '&')) {
        stream.advance();
        bounds.push(parseTypeRef(stream, ctx, construct, group));
      }
    }

    params.push({
      type: 'TypeParameter',
      name: nameToken.text,
      bounds,
      span: spanFrom(nameToken, stream),
    });

    if (!stream.hasNext()) return params;
    if (!isPunct(stream.current(), ',')) {
      throw malformed(stream, ctx, construct, "',' or '>'", group);
    }
    stream.advance();
  }
}

/** Type parameters at the cursor, if an angle group is there */
export function parseOptionalTypeParameters(
  stream: TokenInputStream,
  ctx: ParseContext
): TypeParameterNode[] {
  const group = stream.current();
  if (!isAngle(group)) return [];
  stream.advance();
  return parseTypeParameters(group, ctx);
}

// ============================================================
// MODIFIERS AND ANNOTATIONS
// ============================================================

/** @Name or @Name(args); cursor on `@` */
export function parseAnnotation(
  stream: TokenInputStream,
  ctx: ParseContext
): AnnotationNode {
  const at = stream.current();
  if (at === undefined || !isAnnotationStart(stream)) {
    throw malformed(stream, ctx, 'annotation', 'annotation name');
  }
  stream.advance();

  const parts: string[] = [];
  for (;;) {
    const part = stream.current();
    if (!isIdentifier(part)) break;
    parts.push(part.text);
    stream.advance();
    if (!(isPunct(stream.current(), '.') && isIdentifier(stream.peek(1)))) break;
    stream.advance();
  }

  let args: string | null = null;
  const group = stream.current();
  if (isRound(group)) {
    args = groupInteriorText(ctx, group);
    stream.advance();
  }

  return {
    type: 'Annotation',
    name: parts.join('.'),
    arguments: args,
    span: spanFrom(at, stream),
  };
}

export interface Modifiers {
  readonly modifiers: string[];
  readonly annotations: AnnotationNode[];
}

/** Annotations and modifier keywords in any order */
export function parseModifiers(
  stream: TokenInputStream,
  ctx: ParseContext
): Modifiers {
  const modifiers: string[] = [];
  const annotations: AnnotationNode[] = [];

  for (;;) {
    const element = stream.current();
    if (isModifier(element)) {
      modifiers.push(element.text);
      stream.advance();
    } else if (isAnnotationStart(stream)) {
      annotations.push(parseAnnotation(stream, ctx));
    } else {
      return { modifiers, annotations };
    }
  }
}
