/**
 * Lexer Module
 * Converts source text into tokens
 */

export { LexerError } from './errors.js';
export { createLexerState, type LexerState } from './state.js';
export { nextToken, tokenize, type TokenizeOptions } from './tokenizer.js';
export {
  DECLARATION_KEYWORDS,
  MODIFIER_KEYWORDS,
  PRIMITIVE_TYPES,
} from './keywords.js';
