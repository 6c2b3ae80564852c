/**
 * Token Grouper
 * Collapses matched bracket pairs of a flat token sequence into a tree
 */

import { joinSpans } from '../source-location.js';
import { UnbalancedBracketError } from '../error-classes.js';
import type {
  GroupKind,
  Token,
  TokenElement,
  TokenGroup,
} from '../token-types.js';
import { GROUP_KINDS, TOKEN_KINDS } from '../token-types.js';
import { findAngleClose, isAngleClose, isAngleOpen } from './angle.js';

const OPENERS: Readonly<Record<string, GroupKind>> = {
  '{': GROUP_KINDS.CURLY,
  '(': GROUP_KINDS.ROUND,
  '[': GROUP_KINDS.SQUARE,
};

const CLOSERS: Readonly<Record<string, GroupKind>> = {
  '}': GROUP_KINDS.CURLY,
  ')': GROUP_KINDS.ROUND,
  ']': GROUP_KINDS.SQUARE,
};

interface PendingGroup {
  readonly open: Token;
  readonly groupKind: GroupKind;
  readonly children: TokenElement[];
}

function makeGroup(
  groupKind: GroupKind,
  open: Token,
  close: Token,
  children: TokenElement[]
): TokenGroup {
  return {
    kind: 'group',
    groupKind,
    open,
    close,
    children,
    span: joinSpans(open.span, close.span),
  };
}

function bracketKind(
  table: Readonly<Record<string, GroupKind>>,
  token: Token
): GroupKind | undefined {
  return token.kind === TOKEN_KINDS.PUNCTUATION ? table[token.text] : undefined;
}

/**
 * Build the angle group spanning tokens[openIndex..closeIndex].
 * The range was validated by findAngleClose, so it holds only type list
 * tokens, empty `[]` pairs and balanced nested angle runs.
 */
function buildAngleGroup(
  tokens: readonly Token[],
  openIndex: number,
  closeIndex: number
): TokenGroup {
  const children: TokenElement[] = [];
  let i = openIndex + 1;

  while (i < closeIndex) {
    const token = tokens[i];
    if (token === undefined) break;

    if (isAngleOpen(token)) {
      const nestedClose = findNestedClose(tokens, i);
      children.push(buildAngleGroup(tokens, i, nestedClose));
      i = nestedClose + 1;
      continue;
    }

    const next = tokens[i + 1];
    if (bracketKind(OPENERS, token) === GROUP_KINDS.SQUARE && next) {
      children.push(makeGroup(GROUP_KINDS.SQUARE, token, next, []));
      i += 2;
      continue;
    }

    children.push(token);
    i++;
  }

  return makeGroup(
    GROUP_KINDS.ANGLE,
    tokenAt(tokens, openIndex),
    tokenAt(tokens, closeIndex),
    children
  );
}

/** Matching `>` by depth count, inside an already validated range */
function findNestedClose(tokens: readonly Token[], openIndex: number): number {
  let depth = 0;
  for (let i = openIndex; i < tokens.length; i++) {
    const token = tokens[i];
    if (token === undefined) break;
    if (isAngleOpen(token)) depth++;
    else if (isAngleClose(token) && --depth === 0) return i;
  }
  return tokens.length - 1;
}

function tokenAt(tokens: readonly Token[], index: number): Token {
  const token = tokens[index];
  if (token === undefined) {
    throw new RangeError(`Token index ${index} out of range`);
  }
  return token;
}

/**
 * Group a flat token sequence by bracket nesting.
 *
 * `{}`, `()` and `[]` always group. `<>` groups only where the angle
 * heuristic accepts it as a type list.
 *
 * @throws UnbalancedBracketError on an unmatched close (BREW-G001), a close
 * that does not match the innermost open bracket (BREW-G002), or input
 * ending with brackets still open (BREW-G003, at the innermost opener).
 */
export function groupTokens(tokens: readonly Token[]): TokenElement[] {
  const root: TokenElement[] = [];
  const stack: PendingGroup[] = [];
  const currentChildren = (): TokenElement[] =>
    stack[stack.length - 1]?.children ?? root;

  for (let i = 0; i < tokens.length; i++) {
    const token = tokenAt(tokens, i);

    const openKind = bracketKind(OPENERS, token);
    if (openKind !== undefined) {
      stack.push({ open: token, groupKind: openKind, children: [] });
      continue;
    }

    const closeKind = bracketKind(CLOSERS, token);
    if (closeKind !== undefined) {
      const pending = stack.pop();
      if (pending === undefined) {
        throw new UnbalancedBracketError(
          'BREW-G001',
          token.span.start,
          token.text
        );
      }
      if (pending.groupKind !== closeKind) {
        throw new UnbalancedBracketError('BREW-G002', token.span.start, token.text, {
          opener: pending.open.text,
          openLine: pending.open.span.start.line,
          openColumn: pending.open.span.start.column,
        });
      }
      currentChildren().push(
        makeGroup(pending.groupKind, pending.open, token, pending.children)
      );
      continue;
    }

    if (isAngleOpen(token)) {
      const closeIndex = findAngleClose(tokens, i);
      if (closeIndex >= 0) {
        currentChildren().push(buildAngleGroup(tokens, i, closeIndex));
        i = closeIndex;
        continue;
      }
    }

    currentChildren().push(token);
  }

  const innermost = stack[stack.length - 1];
  if (innermost !== undefined) {
    throw new UnbalancedBracketError(
      'BREW-G003',
      innermost.open.span.start,
      innermost.open.text
    );
  }

  return root;
}

/** Depth-first token sequence: open token, children, close token */
export function flattenElements(
  elements: readonly TokenElement[]
): Token[] {
  const out: Token[] = [];
  const visit = (element: TokenElement): void => {
    if (element.kind === 'group') {
      out.push(element.open);
      element.children.forEach(visit);
      out.push(element.close);
    } else {
      out.push(element);
    }
  };
  elements.forEach(visit);
  return out;
}
