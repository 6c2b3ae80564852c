/**
 * Tokenizer
 * Main tokenization logic
 */

import type { SourceLocation } from '../source-location.js';
import type { Token } from '../token-types.js';
import { TOKEN_KINDS } from '../token-types.js';
import { LexerError } from './errors.js';
import {
  advanceAndMakeToken,
  isDigit,
  isIdentifierStart,
  isWhitespace,
} from './helpers.js';
import {
  MULTI_CHAR_OPERATORS,
  multiCharKind,
  SINGLE_CHAR_OPERATORS,
} from './operators.js';
import {
  readBlockComment,
  readCharLiteral,
  readIdentifier,
  readLineComment,
  readNumber,
  readString,
  readTextBlock,
} from './readers.js';
import {
  advance,
  createLexerState,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
  peekString,
} from './state.js';

function skipWhitespace(state: LexerState): void {
  while (!isAtEnd(state) && isWhitespace(peek(state))) {
    advance(state);
  }
}

/** Read the next token, or null at end of input */
export function nextToken(state: LexerState): Token | null {
  skipWhitespace(state);

  if (isAtEnd(state)) {
    return null;
  }

  const start = currentLocation(state);
  const ch = peek(state);

  // Comments
  const twoChar = peekString(state, 2);
  if (twoChar === '//') {
    return readLineComment(state);
  }
  if (twoChar === '/*') {
    return readBlockComment(state);
  }

  // String (text block checked before plain string)
  if (ch === '"') {
    if (peekString(state, 3) === '"""') {
      return readTextBlock(state);
    }
    return readString(state);
  }

  if (ch === "'") {
    return readCharLiteral(state);
  }

  // Number (`.5` included; unary minus is an operator)
  if (isDigit(ch) || (ch === '.' && isDigit(peek(state, 1)))) {
    return readNumber(state);
  }

  // Identifier, keyword or literal word
  if (isIdentifierStart(ch)) {
    return readIdentifier(state);
  }

  // Multi-character operators (longest first)
  for (const op of MULTI_CHAR_OPERATORS) {
    if (peekString(state, op.length) === op) {
      return advanceAndMakeToken(state, op.length, multiCharKind(op), op, start);
    }
  }

  // Single-character operators (lookup table)
  const singleCharKind = SINGLE_CHAR_OPERATORS[ch];
  if (singleCharKind) {
    return advanceAndMakeToken(state, 1, singleCharKind, ch, start);
  }

  throw new LexerError('BREW-L002', start, ch, { char: `'${ch}'` });
}

export interface TokenizeOptions {
  /** Keep comment tokens in the output (default false) */
  includeComments?: boolean | undefined;
  /** Location of the first character, for sub-ranges of a larger file */
  baseLocation?: SourceLocation | undefined;
}

export function tokenize(source: string, options?: TokenizeOptions): Token[] {
  const state = createLexerState(source, options?.baseLocation);
  const tokens: Token[] = [];

  let token = nextToken(state);
  while (token !== null) {
    tokens.push(token);
    token = nextToken(state);
  }

  // Filter out comment tokens unless includeComments is true
  if (options?.includeComments !== true) {
    return tokens.filter((t) => t.kind !== TOKEN_KINDS.COMMENT);
  }

  return tokens;
}
