/**
 * Construct Matchers
 * Fixed priority order; the matchers are mutually exclusive and the order
 * only breaks ties.
 */

import type {
  ClassDeclNode,
  ImportDeclNode,
  MemberNode,
  PackageDeclNode,
} from '../../ast-nodes.js';
import { constructorMatcher } from './constructor.js';
import { fieldMatcher } from './field.js';
import {
  importMatcher,
  packageMatcher,
  typeDeclarationMatcher,
} from './file-level.js';
import {
  instanceInitializerMatcher,
  staticInitializerMatcher,
} from './initializers.js';
import { methodMatcher } from './method.js';
import { nestedClassMatcher } from './nested-class.js';
import type { ConstructMatcher } from './types.js';

export type { ConstructMatcher } from './types.js';
export {
  constructorMatcher,
  fieldMatcher,
  importMatcher,
  instanceInitializerMatcher,
  methodMatcher,
  nestedClassMatcher,
  packageMatcher,
  staticInitializerMatcher,
  typeDeclarationMatcher,
};

/** Class interior matchers in priority order */
export const MEMBER_MATCHERS: readonly ConstructMatcher<MemberNode>[] = [
  fieldMatcher,
  methodMatcher,
  nestedClassMatcher,
  staticInitializerMatcher,
  instanceInitializerMatcher,
  constructorMatcher,
];

export type FileLevelNode = PackageDeclNode | ImportDeclNode | ClassDeclNode;

/** File scope matchers in priority order */
export const FILE_MATCHERS: readonly ConstructMatcher<FileLevelNode>[] = [
  packageMatcher,
  importMatcher,
  typeDeclarationMatcher,
];
