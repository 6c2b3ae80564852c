/**
 * Initializer Matchers
 * static {…} and bare {…} at member level
 */

import type {
  InstanceInitializerNode,
  StaticInitializerNode,
} from '../../ast-nodes.js';
import type { Token, TokenElement } from '../../token-types.js';
import { expectElement, isCurly, isKeyword } from '../helpers.js';
import { opaqueFromGroup } from '../opaque.js';
import type { ConstructMatcher } from './types.js';

const STATIC_NAME = 'staticInitializer';
const INSTANCE_NAME = 'instanceInitializer';

function isStaticKeyword(element: TokenElement | undefined): element is Token {
  return isKeyword(element, 'static');
}

export const staticInitializerMatcher: ConstructMatcher<StaticInitializerNode> = {
  name: STATIC_NAME,

  isMatch(peek) {
    if (!isStaticKeyword(peek.current())) return false;
    peek.advance();
    if (!isCurly(peek.current())) return false;
    peek.advance();
    return true;
  },

  parse(stream, ctx) {
    const keyword = expectElement(stream, STATIC_NAME, isStaticKeyword, "'static'");
    const body = expectElement(stream, STATIC_NAME, isCurly, 'block');
    return {
      type: 'StaticInitializer',
      body: opaqueFromGroup(body, ctx),
      span: { start: keyword.span.start, end: body.span.end },
    };
  },
};

export const instanceInitializerMatcher: ConstructMatcher<InstanceInitializerNode> = {
  name: INSTANCE_NAME,

  isMatch(peek) {
    if (!isCurly(peek.current())) return false;
    peek.advance();
    return true;
  },

  parse(stream, ctx) {
    const body = expectElement(stream, INSTANCE_NAME, isCurly, 'block');
    return {
      type: 'InstanceInitializer',
      body: opaqueFromGroup(body, ctx),
      span: body.span,
    };
  },
};
