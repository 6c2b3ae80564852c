/**
 * Construct Matcher Protocol
 */

import type { TokenInputStream } from '../../stream/token-stream.js';
import type { ParseContext } from '../context.js';

/**
 * Recognizer/parser pair for one construct.
 *
 * `isMatch` scans its own peek stream and bails on the first failed
 * expectation; on success the peek stream ends just past the construct.
 * `parse` consumes exactly that construct from the real stream.
 */
export interface ConstructMatcher<T> {
  readonly name: string;
  isMatch(peek: TokenInputStream, ctx: ParseContext): boolean;
  parse(stream: TokenInputStream, ctx: ParseContext): T;
}
