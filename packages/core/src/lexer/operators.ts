/**
 * Operator Lookup Tables
 *
 * `>` never combines with a following character: `>>`, `>=` and `>>>=`
 * arrive as runs of single-character tokens so that nested type argument
 * lists close one level at a time.
 */

import type { TokenKind } from '../token-types.js';
import { TOKEN_KINDS } from '../token-types.js';

/** Longest operators first; matched by prefix */
export const MULTI_CHAR_OPERATORS: readonly string[] = [
  '<<=',
  '...',
  '->',
  '::',
  '++',
  '--',
  '&&',
  '||',
  '==',
  '!=',
  '<=',
  '<<',
  '+=',
  '-=',
  '*=',
  '/=',
  '%=',
  '&=',
  '|=',
  '^=',
];

/** Single-character operator and punctuation lookup table */
export const SINGLE_CHAR_OPERATORS: Record<string, TokenKind> = {
  '(': TOKEN_KINDS.PUNCTUATION,
  ')': TOKEN_KINDS.PUNCTUATION,
  '{': TOKEN_KINDS.PUNCTUATION,
  '}': TOKEN_KINDS.PUNCTUATION,
  '[': TOKEN_KINDS.PUNCTUATION,
  ']': TOKEN_KINDS.PUNCTUATION,
  ';': TOKEN_KINDS.PUNCTUATION,
  ',': TOKEN_KINDS.PUNCTUATION,
  '.': TOKEN_KINDS.PUNCTUATION,
  '@': TOKEN_KINDS.PUNCTUATION,
  '=': TOKEN_KINDS.OPERATOR,
  '<': TOKEN_KINDS.OPERATOR,
  '>': TOKEN_KINDS.OPERATOR,
  '!': TOKEN_KINDS.OPERATOR,
  '~': TOKEN_KINDS.OPERATOR,
  '?': TOKEN_KINDS.OPERATOR,
  ':': TOKEN_KINDS.OPERATOR,
  '+': TOKEN_KINDS.OPERATOR,
  '-': TOKEN_KINDS.OPERATOR,
  '*': TOKEN_KINDS.OPERATOR,
  '/': TOKEN_KINDS.OPERATOR,
  '%': TOKEN_KINDS.OPERATOR,
  '&': TOKEN_KINDS.OPERATOR,
  '|': TOKEN_KINDS.OPERATOR,
  '^': TOKEN_KINDS.OPERATOR,
};

/** `...` is punctuation (varargs); every other multi-char entry is an operator */
export function multiCharKind(text: string): TokenKind {
  return text === '...' ? TOKEN_KINDS.PUNCTUATION : TOKEN_KINDS.OPERATOR;
}
