/**
 * Parser Module
 * Builds the AST from grouped token elements
 */

import type { FileNode, ImportDeclNode, ClassDeclNode, PackageDeclNode } from '../ast-nodes.js';
import type { ObservabilityCallbacks } from '../observability.js';
import type { TokenElement } from '../token-types.js';
import { TokenInputStream } from '../stream/token-stream.js';
import type { ParseContext } from './context.js';
import { dispatchMembers } from './dispatcher.js';
import { FILE_MATCHERS, MEMBER_MATCHERS } from './matchers/index.js';

export interface ParseElementsOptions {
  /** Attach the comment before each declaration as its docComment */
  preserveComments?: boolean | undefined;
  observability?: ObservabilityCallbacks | undefined;
}

export function createParseContext(
  source: string,
  options: ParseElementsOptions = {}
): ParseContext {
  return {
    source,
    className: null,
    scope: 'file',
    preserveComments: options.preserveComments ?? false,
    memberMatchers: MEMBER_MATCHERS,
    observability: options.observability ?? {},
  };
}

/**
 * Parse the top-level elements of one file.
 * The first package declaration wins; order is not validated.
 */
export function parseElements(
  elements: readonly TokenElement[],
  source: string,
  options: ParseElementsOptions = {}
): FileNode {
  const ctx = createParseContext(source, options);
  const nodes = dispatchMembers(new TokenInputStream(elements), FILE_MATCHERS, ctx);

  let pkg: PackageDeclNode | null = null;
  const imports: ImportDeclNode[] = [];
  const types: ClassDeclNode[] = [];
  for (const node of nodes) {
    switch (node.type) {
      case 'PackageDecl':
        pkg ??= node;
        break;
      case 'ImportDecl':
        imports.push(node);
        break;
      case 'ClassDecl':
        types.push(node);
        break;
    }
  }

  const first = elements[0];
  const last = elements[elements.length - 1];
  const origin = { line: 1, column: 1, offset: 0 };

  return {
    type: 'File',
    package: pkg,
    imports,
    types,
    span: {
      start: first?.span.start ?? origin,
      end: last?.span.end ?? origin,
    },
  };
}

export { dispatchMembers } from './dispatcher.js';
export { enterScope, type ParseContext } from './context.js';
export * from './matchers/index.js';
