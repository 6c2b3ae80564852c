/**
 * Constructor Matcher
 * mods <…>? Name (…) throws? {…}, where Name is the enclosing class
 */

import type { ConstructorDeclNode } from '../../ast-nodes.js';
import {
  docCommentAt,
  expectElement,
  isAngle,
  isCurly,
  isIdentifier,
  isRound,
  skipModifiers,
  skipThrows,
  spanFrom,
  startOf,
} from '../helpers.js';
import { opaqueFromGroup } from '../opaque.js';
import { parseParameters } from '../parameters.js';
import {
  parseModifiers,
  parseOptionalTypeParameters,
  parseThrows,
} from '../type-parsing.js';
import type { ConstructMatcher } from './types.js';

const NAME = 'constructor';

export const constructorMatcher: ConstructMatcher<ConstructorDeclNode> = {
  name: NAME,

  isMatch(peek, ctx) {
    // Anonymous classes and file scope have no constructor name
    if (ctx.className === null) return false;
    skipModifiers(peek);
    if (isAngle(peek.current())) peek.advance();
    const nameToken = peek.current();
    if (!isIdentifier(nameToken) || nameToken.text !== ctx.className) {
      return false;
    }
    peek.advance();
    if (!isRound(peek.current())) return false;
    peek.advance();
    if (!skipThrows(peek)) return false;
    if (!isCurly(peek.current())) return false;
    peek.advance();
    return true;
  },

  parse(stream, ctx) {
    const first = startOf(stream, NAME);
    const docComment = docCommentAt(stream, ctx);
    const { modifiers, annotations } = parseModifiers(stream, ctx);
    const typeParameters = parseOptionalTypeParameters(stream, ctx);
    const nameToken = expectElement(stream, NAME, isIdentifier, 'constructor name');
    const params = expectElement(stream, NAME, isRound, 'parameter list');
    const parameters = parseParameters(params, ctx);
    const throws = parseThrows(stream, ctx);
    const body = expectElement(stream, NAME, isCurly, 'constructor body');

    return {
      type: 'ConstructorDecl',
      name: nameToken.text,
      modifiers,
      annotations,
      typeParameters,
      parameters,
      throws,
      body: opaqueFromGroup(body, ctx),
      docComment,
      span: spanFrom(first, stream),
    };
  },
};
