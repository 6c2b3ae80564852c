import type { SourceSpan } from './source-location.js';

// ============================================================
// TOKEN KINDS
// ============================================================

export const TOKEN_KINDS = {
  KEYWORD: 'keyword',
  IDENTIFIER: 'identifier',
  LITERAL: 'literal',
  OPERATOR: 'operator',
  PUNCTUATION: 'punctuation',
  COMMENT: 'comment',
} as const;

export type TokenKind = (typeof TOKEN_KINDS)[keyof typeof TOKEN_KINDS];

export interface Token {
  readonly kind: TokenKind;
  /** Raw source text of the token */
  readonly text: string;
  readonly span: SourceSpan;
}

// ============================================================
// TOKEN GROUPS
// ============================================================

export const GROUP_KINDS = {
  CURLY: 'curly',
  ROUND: 'round',
  SQUARE: 'square',
  ANGLE: 'angle',
} as const;

export type GroupKind = (typeof GROUP_KINDS)[keyof typeof GROUP_KINDS];

/**
 * A bracket pair collapsed into one element.
 * `open` and `close` are the bracket tokens themselves; `children` holds
 * everything between them.
 */
export interface TokenGroup {
  readonly kind: 'group';
  readonly groupKind: GroupKind;
  readonly open: Token;
  readonly close: Token;
  readonly children: readonly TokenElement[];
  readonly span: SourceSpan;
}

export type TokenElement = Token | TokenGroup;

export function isGroup(
  element: TokenElement | undefined,
  groupKind?: GroupKind
): element is TokenGroup {
  if (element === undefined || element.kind !== 'group') return false;
  return groupKind === undefined || element.groupKind === groupKind;
}

export function isToken(
  element: TokenElement | undefined,
  kind?: TokenKind,
  text?: string
): element is Token {
  if (element === undefined || element.kind === 'group') return false;
  if (kind !== undefined && element.kind !== kind) return false;
  return text === undefined || element.text === text;
}
