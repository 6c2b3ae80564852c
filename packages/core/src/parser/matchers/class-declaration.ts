/**
 * Class and Interface Declarations
 * Shared by the nested class matcher and the file-level type matcher.
 *
 * mods (class | interface) name <…>? (extends Type (, Type)*)?
 *   (implements Type (, Type)*)? {…}
 */

import type { ClassKind, ClassShape, TypeRefNode } from '../../ast-nodes.js';
import type { Token, TokenElement } from '../../token-types.js';
import { TokenInputStream } from '../../stream/token-stream.js';
import type { ParseContext } from '../context.js';
import { enterScope } from '../context.js';
import { dispatchMembers } from '../dispatcher.js';
import {
  docCommentAt,
  expectElement,
  isAngle,
  isCurly,
  isIdentifier,
  isKeyword,
  isPunct,
  skipModifiers,
  skipTypeList,
  spanFrom,
  startOf,
} from '../helpers.js';
import { malformed, parseModifiers, parseOptionalTypeParameters, parseTypeList, parseTypeRef } from '../type-parsing.js';

function isClassKeyword(element: TokenElement | undefined): element is Token {
  return isKeyword(element, 'class') || isKeyword(element, 'interface');
}

export function skipClassDeclaration(peek: TokenInputStream): boolean {
  skipModifiers(peek);
  if (!isClassKeyword(peek.current())) return false;
  peek.advance();
  if (!isIdentifier(peek.current())) return false;
  peek.advance();
  if (isAngle(peek.current())) peek.advance();
  if (isKeyword(peek.current(), 'extends')) {
    peek.advance();
    if (!skipTypeList(peek)) return false;
  }
  if (isKeyword(peek.current(), 'implements')) {
    peek.advance();
    if (!skipTypeList(peek)) return false;
  }
  if (!isCurly(peek.current())) return false;
  peek.advance();
  return true;
}

/**
 * Parse a class or interface declaration, members included.
 *
 * @throws ParseError when a class names more than one superclass
 */
export function parseClassShape(
  stream: TokenInputStream,
  ctx: ParseContext,
  matcher: string
): ClassShape {
  const first = startOf(stream, matcher);
  const docComment = docCommentAt(stream, ctx);
  const { modifiers, annotations } = parseModifiers(stream, ctx);

  const keyword = expectElement(stream, matcher, isClassKeyword, "'class' or 'interface'");
  const kind: ClassKind = keyword.text === 'interface' ? 'interface' : 'class';
  const nameToken = expectElement(stream, matcher, isIdentifier, 'type name');
  const typeParameters = parseOptionalTypeParameters(stream, ctx);

  let superclass: TypeRefNode | null = null;
  let interfaces: TypeRefNode[] = [];

  if (isKeyword(stream.current(), 'extends')) {
    stream.advance();
    if (kind === 'interface') {
      interfaces = parseTypeList(stream, ctx, 'interface declaration');
    } else {
      superclass = parseTypeRef(stream, ctx, 'class declaration');
      if (isPunct(stream.current(), ',')) {
        throw malformed(stream, ctx, 'class declaration', "'implements' or '{'");
      }
    }
  }
  if (isKeyword(stream.current(), 'implements')) {
    stream.advance();
    interfaces = [
      ...interfaces,
      ...parseTypeList(stream, ctx, 'class declaration'),
    ];
  }

  const body = expectElement(stream, matcher, isCurly, 'class body');
  const members = dispatchMembers(
    TokenInputStream.over(body),
    ctx.memberMatchers,
    enterScope(ctx, nameToken.text, kind)
  );

  return {
    name: nameToken.text,
    kind,
    modifiers,
    annotations,
    typeParameters,
    superclass,
    interfaces,
    members,
    docComment,
    span: spanFrom(first, stream),
  };
}
