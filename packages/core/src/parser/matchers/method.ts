/**
 * Method Matcher
 * mods <…>? (void | Type) name (…) [][]* throws? ({…} | ;)
 */

import type {
  MethodDeclNode,
  OpaqueBodyNode,
  TypeRefNode,
} from '../../ast-nodes.js';
import {
  docCommentAt,
  expectElement,
  isAngle,
  isCurly,
  isIdentifier,
  isKeyword,
  isRound,
  isSemicolon,
  skipDimensions,
  skipModifiers,
  skipThrows,
  skipType,
  spanFrom,
  startOf,
} from '../helpers.js';
import { opaqueFromGroup } from '../opaque.js';
import { parseParameters } from '../parameters.js';
import {
  parseModifiers,
  parseOptionalTypeParameters,
  parseThrows,
  parseTypeRef,
} from '../type-parsing.js';
import type { ConstructMatcher } from './types.js';

const NAME = 'method';

export const methodMatcher: ConstructMatcher<MethodDeclNode> = {
  name: NAME,

  isMatch(peek) {
    skipModifiers(peek);
    if (isAngle(peek.current())) peek.advance();
    if (isKeyword(peek.current(), 'void')) {
      peek.advance();
    } else if (!skipType(peek)) {
      return false;
    }
    if (!isIdentifier(peek.current())) return false;
    peek.advance();
    if (!isRound(peek.current())) return false;
    peek.advance();
    skipDimensions(peek);
    if (!skipThrows(peek)) return false;
    const end = peek.current();
    if (!isCurly(end) && !isSemicolon(end)) return false;
    peek.advance();
    return true;
  },

  parse(stream, ctx) {
    const first = startOf(stream, NAME);
    const docComment = docCommentAt(stream, ctx);
    const { modifiers, annotations } = parseModifiers(stream, ctx);
    const typeParameters = parseOptionalTypeParameters(stream, ctx);

    let returnType: TypeRefNode | null = null;
    if (isKeyword(stream.current(), 'void')) {
      stream.advance();
    } else {
      returnType = parseTypeRef(stream, ctx, 'method declaration');
    }

    const nameToken = expectElement(stream, NAME, isIdentifier, 'method name');
    const params = expectElement(stream, NAME, isRound, 'parameter list');
    const parameters = parseParameters(params, ctx);

    // Legacy array syntax: int m()[]
    const extra = skipDimensions(stream);
    if (returnType !== null && extra > 0) {
      returnType = { ...returnType, dimensions: returnType.dimensions + extra };
    }

    const throws = parseThrows(stream, ctx);

    let body: OpaqueBodyNode | null = null;
    const end = stream.current();
    if (isCurly(end)) {
      stream.advance();
      body = opaqueFromGroup(end, ctx);
    } else {
      expectElement(stream, NAME, isSemicolon, "'{' or ';'");
    }

    return {
      type: 'MethodDecl',
      name: nameToken.text,
      modifiers,
      annotations,
      typeParameters,
      returnType,
      parameters,
      throws,
      body,
      docComment,
      span: spanFrom(first, stream),
    };
  },
};
