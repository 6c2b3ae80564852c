/**
 * Lexer Helper Functions
 * Character classification and token construction
 */

import type { SourceLocation } from '../source-location.js';
import type { Token, TokenKind } from '../token-types.js';
import { advance, currentLocation, type LexerState } from './state.js';

const UNICODE_LETTER = /\p{L}/u;

export function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

function isLetter(ch: string): boolean {
  if ((ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z')) return true;
  return ch > '\u007f' && UNICODE_LETTER.test(ch);
}

export function isIdentifierStart(ch: string): boolean {
  return isLetter(ch) || ch === '_' || ch === '$';
}

export function isIdentifierChar(ch: string): boolean {
  return isIdentifierStart(ch) || isDigit(ch);
}

export function isWhitespace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\r' || ch === '\n' || ch === '\f';
}

export function makeToken(
  kind: TokenKind,
  text: string,
  start: SourceLocation,
  end: SourceLocation
): Token {
  return { kind, text, span: { start, end } };
}

/** Advance n times and return a token */
export function advanceAndMakeToken(
  state: LexerState,
  n: number,
  kind: TokenKind,
  text: string,
  start: SourceLocation
): Token {
  for (let i = 0; i < n; i++) advance(state);
  return makeToken(kind, text, start, currentLocation(state));
}
