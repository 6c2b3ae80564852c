/**
 * Test helpers shared by the core suites
 */

import {
  createParseContext,
  groupTokens,
  tokenize,
  TokenInputStream,
  type ParseContext,
  type TokenElement,
} from 'brewport';

/** Tokenize and group a snippet */
export function elementsOf(source: string, includeComments = false): TokenElement[] {
  return groupTokens(tokenize(source, { includeComments }));
}

export function streamOf(source: string, includeComments = false): TokenInputStream {
  return new TokenInputStream(elementsOf(source, includeComments));
}

/** Parse context for a class body named `className` */
export function memberContext(source: string, className: string | null = 'A'): ParseContext {
  return {
    ...createParseContext(source),
    className,
    scope: className === null ? 'anonymous class' : 'class',
  };
}

/** Token texts of a flat token list */
export function texts(elements: readonly TokenElement[]): string[] {
  return elements.map((e) => (e.kind === 'group' ? `${e.open.text}${e.close.text}` : e.text));
}
