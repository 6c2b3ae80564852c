/**
 * File-Level Matchers
 * package declaration, import declaration, top-level type declaration
 */

import type {
  ClassDeclNode,
  ImportDeclNode,
  PackageDeclNode,
} from '../../ast-nodes.js';
import type { Token, TokenElement } from '../../token-types.js';
import type { TokenInputStream } from '../../stream/token-stream.js';
import {
  expectElement,
  isIdentifier,
  isKeyword,
  isOperator,
  isPunct,
  isSemicolon,
  skipQualifiedName,
} from '../helpers.js';
import { parseClassShape, skipClassDeclaration } from './class-declaration.js';
import type { ConstructMatcher } from './types.js';

/** Dotted name; the recognizer has already checked its shape */
function readQualifiedName(stream: TokenInputStream, matcher: string): string {
  const parts = [expectElement(stream, matcher, isIdentifier, 'name').text];
  while (isPunct(stream.current(), '.') && isIdentifier(stream.peek(1))) {
    stream.advance();
    parts.push(expectElement(stream, matcher, isIdentifier, 'name').text);
  }
  return parts.join('.');
}

function keywordTest(text: string) {
  return (element: TokenElement | undefined): element is Token =>
    isKeyword(element, text);
}

const isPackageKeyword = keywordTest('package');
const isImportKeyword = keywordTest('import');

export const packageMatcher: ConstructMatcher<PackageDeclNode> = {
  name: 'package',

  isMatch(peek) {
    if (!isPackageKeyword(peek.current())) return false;
    peek.advance();
    if (!skipQualifiedName(peek) || !isSemicolon(peek.current())) return false;
    peek.advance();
    return true;
  },

  parse(stream) {
    const keyword = expectElement(stream, 'package', isPackageKeyword, "'package'");
    const name = readQualifiedName(stream, 'package');
    const end = expectElement(stream, 'package', isSemicolon, "';'");
    return {
      type: 'PackageDecl',
      name,
      span: { start: keyword.span.start, end: end.span.end },
    };
  },
};

function isWildcardSuffix(stream: TokenInputStream): boolean {
  return isPunct(stream.current(), '.') && isOperator(stream.peek(1), '*');
}

export const importMatcher: ConstructMatcher<ImportDeclNode> = {
  name: 'import',

  isMatch(peek) {
    if (!isImportKeyword(peek.current())) return false;
    peek.advance();
    if (isKeyword(peek.current(), 'static')) peek.advance();
    if (!skipQualifiedName(peek)) return false;
    if (isWildcardSuffix(peek)) {
      peek.advance();
      peek.advance();
    }
    if (!isSemicolon(peek.current())) return false;
    peek.advance();
    return true;
  },

  parse(stream) {
    const keyword = expectElement(stream, 'import', isImportKeyword, "'import'");
    const isStatic = isKeyword(stream.current(), 'static');
    if (isStatic) stream.advance();
    const name = readQualifiedName(stream, 'import');
    const isWildcard = isWildcardSuffix(stream);
    if (isWildcard) {
      stream.advance();
      stream.advance();
    }
    const end = expectElement(stream, 'import', isSemicolon, "';'");
    return {
      type: 'ImportDecl',
      name,
      isStatic,
      isWildcard,
      span: { start: keyword.span.start, end: end.span.end },
    };
  },
};

export const typeDeclarationMatcher: ConstructMatcher<ClassDeclNode> = {
  name: 'typeDeclaration',
  isMatch: (peek) => skipClassDeclaration(peek),
  parse: (stream, ctx) => ({
    type: 'ClassDecl',
    ...parseClassShape(stream, ctx, 'typeDeclaration'),
  }),
};
