/**
 * Token Readers
 * Multi-character token scanners: identifiers, numbers, strings, comments
 */

import type { Token } from '../token-types.js';
import { TOKEN_KINDS } from '../token-types.js';
import { LexerError } from './errors.js';
import {
  isDigit,
  isIdentifierChar,
  isIdentifierStart,
  makeToken,
} from './helpers.js';
import { isKeywordText, LITERAL_WORDS } from './keywords.js';
import {
  advance,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
  peekString,
} from './state.js';

function readWhile(state: LexerState, test: (ch: string) => boolean): string {
  let value = '';
  while (!isAtEnd(state) && test(peek(state))) {
    value += advance(state);
  }
  return value;
}

export function readIdentifier(state: LexerState): Token {
  const start = currentLocation(state);
  const value = readWhile(state, isIdentifierChar);

  const kind = LITERAL_WORDS.has(value)
    ? TOKEN_KINDS.LITERAL
    : isKeywordText(value)
      ? TOKEN_KINDS.KEYWORD
      : TOKEN_KINDS.IDENTIFIER;

  return makeToken(kind, value, start, currentLocation(state));
}

function isHexDigit(ch: string): boolean {
  return isDigit(ch) || (ch >= 'a' && ch <= 'f') || (ch >= 'A' && ch <= 'F');
}

function isDecimalPart(ch: string): boolean {
  return isDigit(ch) || ch === '_';
}

/**
 * Numeric literal: decimal, hex (0x), binary (0b) or octal integers with
 * `_` separators, decimal floats with exponent, optional type suffix.
 */
export function readNumber(state: LexerState): Token {
  const start = currentLocation(state);
  let value = '';

  const prefix = peekString(state, 2).toLowerCase();
  if (prefix === '0x') {
    value += advance(state) + advance(state);
    value += readWhile(state, (ch) => isHexDigit(ch) || ch === '_');
  } else if (prefix === '0b') {
    value += advance(state) + advance(state);
    value += readWhile(state, (ch) => ch === '0' || ch === '1' || ch === '_');
  } else {
    value += readWhile(state, isDecimalPart);
    if (peek(state) === '.' && isDigit(peek(state, 1))) {
      value += advance(state);
      value += readWhile(state, isDecimalPart);
    } else if (peek(state) === '.' && !isIdentifierStart(peek(state, 1))) {
      // Trailing dot float: `1.`
      value += advance(state);
    }
    const exp = peek(state);
    if (exp === 'e' || exp === 'E') {
      const sign = peek(state, 1);
      const signed = sign === '+' || sign === '-';
      if (isDigit(peek(state, signed ? 2 : 1))) {
        value += advance(state);
        if (signed) value += advance(state);
        value += readWhile(state, isDecimalPart);
      }
    }
  }

  const suffix = peek(state);
  if ('lLfFdD'.includes(suffix) && suffix !== '') {
    value += advance(state);
  }

  return makeToken(TOKEN_KINDS.LITERAL, value, start, currentLocation(state));
}

export function readString(state: LexerState): Token {
  const start = currentLocation(state);
  let value = advance(state); // opening "

  while (!isAtEnd(state) && peek(state) !== '"') {
    if (peek(state) === '\n') {
      throw new LexerError('BREW-L001', start, value);
    }
    if (peek(state) === '\\') {
      value += advance(state);
      if (isAtEnd(state)) break;
    }
    value += advance(state);
  }

  if (isAtEnd(state)) {
    throw new LexerError('BREW-L001', start, value);
  }

  value += advance(state); // closing "
  return makeToken(TOKEN_KINDS.LITERAL, value, start, currentLocation(state));
}

/** Text block: """ ... """, may span lines */
export function readTextBlock(state: LexerState): Token {
  const start = currentLocation(state);
  let value = advance(state) + advance(state) + advance(state);

  while (!isAtEnd(state) && peekString(state, 3) !== '"""') {
    if (peek(state) === '\\') {
      value += advance(state);
      if (isAtEnd(state)) break;
    }
    value += advance(state);
  }

  if (isAtEnd(state)) {
    throw new LexerError('BREW-L001', start, '"""');
  }

  value += advance(state) + advance(state) + advance(state);
  return makeToken(TOKEN_KINDS.LITERAL, value, start, currentLocation(state));
}

export function readCharLiteral(state: LexerState): Token {
  const start = currentLocation(state);
  let value = advance(state); // opening '

  while (!isAtEnd(state) && peek(state) !== "'") {
    if (peek(state) === '\n') {
      throw new LexerError('BREW-L004', start, value);
    }
    if (peek(state) === '\\') {
      value += advance(state);
      if (isAtEnd(state)) break;
    }
    value += advance(state);
  }

  if (isAtEnd(state)) {
    throw new LexerError('BREW-L004', start, value);
  }

  value += advance(state);
  return makeToken(TOKEN_KINDS.LITERAL, value, start, currentLocation(state));
}

export function readLineComment(state: LexerState): Token {
  const start = currentLocation(state);
  const value = readWhile(state, (ch) => ch !== '\n');
  return makeToken(TOKEN_KINDS.COMMENT, value, start, currentLocation(state));
}

export function readBlockComment(state: LexerState): Token {
  const start = currentLocation(state);
  let value = advance(state) + advance(state);

  while (!isAtEnd(state) && peekString(state, 2) !== '*/') {
    value += advance(state);
  }

  if (isAtEnd(state)) {
    throw new LexerError('BREW-L003', start, '/*');
  }

  value += advance(state) + advance(state);
  return makeToken(TOKEN_KINDS.COMMENT, value, start, currentLocation(state));
}
