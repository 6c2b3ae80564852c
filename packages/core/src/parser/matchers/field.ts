/**
 * Field Matcher
 * mods Type name [][]* (= init)? (, name [][]* (= init)?)* ;
 */

import type { FieldDeclNode, VariableDeclaratorNode } from '../../ast-nodes.js';
import type { TokenElement } from '../../token-types.js';
import type { TokenInputStream } from '../../stream/token-stream.js';
import type { ParseContext } from '../context.js';
import {
  docCommentAt,
  expectElement,
  isIdentifier,
  isOperator,
  isPunct,
  isSemicolon,
  skipDimensions,
  skipModifiers,
  skipType,
  spanFrom,
  startOf,
} from '../helpers.js';
import { opaqueInitializer } from '../opaque.js';
import { parseModifiers, parseTypeRef } from '../type-parsing.js';
import type { ConstructMatcher } from './types.js';

const NAME = 'field';

function atDeclaratorEnd(element: TokenElement | undefined): boolean {
  return isPunct(element, ',') || isSemicolon(element);
}

/** Initializer elements up to the next `,` or `;` at this level */
function skipInitializer(stream: TokenInputStream): boolean {
  if (atDeclaratorEnd(stream.current())) return false;
  while (stream.hasNext()) {
    if (atDeclaratorEnd(stream.current())) return true;
    stream.advance();
  }
  return false;
}

function skipDeclarator(stream: TokenInputStream): boolean {
  if (!isIdentifier(stream.current())) return false;
  stream.advance();
  skipDimensions(stream);
  if (!isOperator(stream.current(), '=')) return true;
  stream.advance();
  return skipInitializer(stream);
}

function parseDeclarator(
  stream: TokenInputStream,
  ctx: ParseContext
): VariableDeclaratorNode {
  const nameToken = expectElement(stream, NAME, isIdentifier, 'field name');
  const dimensions = skipDimensions(stream);

  let initializer: VariableDeclaratorNode['initializer'] = null;
  if (isOperator(stream.current(), '=')) {
    stream.advance();
    const elements: TokenElement[] = [];
    for (;;) {
      const element = stream.current();
      if (element === undefined || atDeclaratorEnd(element)) break;
      elements.push(element);
      stream.advance();
    }
    initializer = opaqueInitializer(elements, ctx);
  }

  return {
    type: 'VariableDeclarator',
    name: nameToken.text,
    dimensions,
    initializer,
    span: spanFrom(nameToken, stream),
  };
}

export const fieldMatcher: ConstructMatcher<FieldDeclNode> = {
  name: NAME,

  isMatch(peek) {
    skipModifiers(peek);
    if (!skipType(peek) || !skipDeclarator(peek)) return false;
    while (isPunct(peek.current(), ',')) {
      peek.advance();
      if (!skipDeclarator(peek)) return false;
    }
    if (!isSemicolon(peek.current())) return false;
    peek.advance();
    return true;
  },

  parse(stream, ctx) {
    const first = startOf(stream, NAME);
    const docComment = docCommentAt(stream, ctx);
    const { modifiers, annotations } = parseModifiers(stream, ctx);
    const fieldType = parseTypeRef(stream, ctx, 'field declaration');

    const declarators = [parseDeclarator(stream, ctx)];
    while (isPunct(stream.current(), ',')) {
      stream.advance();
      declarators.push(parseDeclarator(stream, ctx));
    }
    expectElement(stream, NAME, isSemicolon, "';'");

    return {
      type: 'FieldDecl',
      modifiers,
      annotations,
      fieldType,
      declarators,
      docComment,
      span: spanFrom(first, stream),
    };
  },
};
