/**
 * Token Input Stream
 *
 * Index-based cursor over a shared, read-only element sequence. Comment
 * tokens are trivia: the cursor never rests on one.
 */

import type { Token, TokenElement, TokenGroup } from '../token-types.js';
import { TOKEN_KINDS } from '../token-types.js';

function isTrivia(element: TokenElement | undefined): boolean {
  return element !== undefined && element.kind === TOKEN_KINDS.COMMENT;
}

export class TokenInputStream {
  private readonly elements: readonly TokenElement[];
  private readonly start: number;
  private readonly end: number;
  private cursor: number;

  constructor(
    elements: readonly TokenElement[],
    start = 0,
    end = elements.length,
    cursor = start
  ) {
    this.elements = elements;
    this.start = start;
    this.end = end;
    this.cursor = cursor;
    this.skipTrivia();
  }

  /** Index of the cursor in the backing sequence */
  get position(): number {
    return this.cursor;
  }

  hasNext(): boolean {
    return this.cursor < this.end;
  }

  current(): TokenElement | undefined {
    return this.hasNext() ? this.elements[this.cursor] : undefined;
  }

  /** Return the current element and move past it */
  advance(): TokenElement | undefined {
    const element = this.current();
    if (element !== undefined) {
      this.cursor++;
      this.skipTrivia();
    }
    return element;
  }

  /** Element `offset` significant positions ahead of the cursor */
  peek(offset = 0): TokenElement | undefined {
    let index = this.cursor;
    let remaining = offset;
    while (index < this.end) {
      if (!isTrivia(this.elements[index])) {
        if (remaining === 0) return this.elements[index];
        remaining--;
      }
      index++;
    }
    return undefined;
  }

  /** Last significant element before the cursor, within this view */
  previous(): TokenElement | undefined {
    for (let i = this.cursor - 1; i >= this.start; i--) {
      const element = this.elements[i];
      if (!isTrivia(element)) return element;
    }
    return undefined;
  }

  /**
   * Comment tokens between the previous significant element and the
   * cursor, in source order.
   */
  leadingComments(): Token[] {
    const comments: Token[] = [];
    for (let i = this.cursor - 1; i >= this.start; i--) {
      const element = this.elements[i];
      if (element === undefined || element.kind !== TOKEN_KINDS.COMMENT) break;
      comments.unshift(element);
    }
    return comments;
  }

  /**
   * View over the interior of the group at the cursor. Shares the group's
   * children; the parent cursor does not move.
   *
   * @throws TypeError when the cursor is not on a group
   */
  subStreamForCurrentGroup(): TokenInputStream {
    const element = this.current();
    if (element === undefined || element.kind !== 'group') {
      throw new TypeError('subStreamForCurrentGroup requires a group at the cursor');
    }
    return TokenInputStream.over(element);
  }

  /** Independent cursor over the same backing sequence at the same position */
  peekStream(): TokenInputStream {
    return new TokenInputStream(this.elements, this.start, this.end, this.cursor);
  }

  static over(group: TokenGroup): TokenInputStream {
    return new TokenInputStream(group.children);
  }

  private skipTrivia(): void {
    while (this.cursor < this.end && isTrivia(this.elements[this.cursor])) {
      this.cursor++;
    }
  }
}
