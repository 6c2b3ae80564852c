/**
 * Angle Bracket Heuristic
 *
 * `<` is ambiguous between a comparison and the start of a type argument
 * or type parameter list. A run is treated as a type list only when the
 * token before `<` can precede one and every token up to the matching `>`
 * can appear inside one. Anything else leaves `<` as an operator.
 */

import type { Token } from '../token-types.js';
import { TOKEN_KINDS } from '../token-types.js';
import { MODIFIER_KEYWORDS, PRIMITIVE_TYPES } from '../lexer/keywords.js';

const TYPE_LIST_PUNCTUATION: ReadonlySet<string> = new Set(['.', ',', '@']);
const TYPE_LIST_OPERATORS: ReadonlySet<string> = new Set(['?', '&']);
const OPENING_CONTEXT: ReadonlySet<string> = new Set(['.', '{', '}', ';']);

export function isAngleOpen(token: Token): boolean {
  return token.kind === TOKEN_KINDS.OPERATOR && token.text === '<';
}

export function isAngleClose(token: Token | undefined): boolean {
  return (
    token !== undefined &&
    token.kind === TOKEN_KINDS.OPERATOR &&
    token.text === '>'
  );
}

/** Last non-comment token before `index`, undefined at start of input */
function previousSignificant(
  tokens: readonly Token[],
  index: number
): Token | undefined {
  for (let i = index - 1; i >= 0; i--) {
    const token = tokens[i];
    if (token !== undefined && token.kind !== TOKEN_KINDS.COMMENT) {
      return token;
    }
  }
  return undefined;
}

function canPrecedeTypeList(token: Token | undefined): boolean {
  if (token === undefined) return true;
  switch (token.kind) {
    case TOKEN_KINDS.IDENTIFIER:
      return true;
    case TOKEN_KINDS.KEYWORD:
      return MODIFIER_KEYWORDS.has(token.text);
    case TOKEN_KINDS.PUNCTUATION:
      return OPENING_CONTEXT.has(token.text);
    default:
      return false;
  }
}

function canAppearInTypeList(token: Token): boolean {
  switch (token.kind) {
    case TOKEN_KINDS.IDENTIFIER:
    case TOKEN_KINDS.COMMENT:
      return true;
    case TOKEN_KINDS.KEYWORD:
      return (
        PRIMITIVE_TYPES.has(token.text) ||
        token.text === 'extends' ||
        token.text === 'super'
      );
    case TOKEN_KINDS.PUNCTUATION:
      return TYPE_LIST_PUNCTUATION.has(token.text);
    case TOKEN_KINDS.OPERATOR:
      return TYPE_LIST_OPERATORS.has(token.text);
    default:
      return false;
  }
}

/**
 * Index of the `>` closing the type list opened at `openIndex`, or -1 when
 * the `<` there is not a type list opener.
 */
export function findAngleClose(
  tokens: readonly Token[],
  openIndex: number
): number {
  if (!canPrecedeTypeList(previousSignificant(tokens, openIndex))) {
    return -1;
  }

  let depth = 0;
  for (let i = openIndex; i < tokens.length; i++) {
    const token = tokens[i];
    if (token === undefined) break;

    if (isAngleOpen(token)) {
      depth++;
      continue;
    }
    if (isAngleClose(token)) {
      depth--;
      if (depth === 0) return i;
      continue;
    }
    // Array dimensions: `[` immediately followed by `]`
    if (token.kind === TOKEN_KINDS.PUNCTUATION && token.text === '[') {
      const next = tokens[i + 1];
      if (next?.text !== ']') return -1;
      i++;
      continue;
    }
    if (!canAppearInTypeList(token)) return -1;
  }

  return -1;
}
