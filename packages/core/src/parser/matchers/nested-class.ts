import type { NestedClassDeclNode } from '../../ast-nodes.js';
import { parseClassShape, skipClassDeclaration } from './class-declaration.js';
import type { ConstructMatcher } from './types.js';

const NAME = 'nestedClass';

export const nestedClassMatcher: ConstructMatcher<NestedClassDeclNode> = {
  name: NAME,
  isMatch: (peek) => skipClassDeclaration(peek),
  parse: (stream, ctx) => ({
    type: 'NestedClassDecl',
    ...parseClassShape(stream, ctx, NAME),
  }),
};
