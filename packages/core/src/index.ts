/**
 * brewport Module
 * Exports the pipeline stages, the transpile entry points and AST types
 */

export { LexerError, tokenize, type TokenizeOptions } from './lexer/index.js';
export { findAngleClose, flattenElements, groupTokens } from './grouper/index.js';
export { TokenInputStream } from './stream/index.js';
export {
  createParseContext,
  dispatchMembers,
  FILE_MATCHERS,
  MEMBER_MATCHERS,
  parseElements,
  type ConstructMatcher,
  type FileLevelNode,
  type ParseContext,
  type ParseElementsOptions,
} from './parser/index.js';
export {
  emit,
  reindentBlock,
  resolveEmitOptions,
  type EmitOptions,
  type ResolvedEmitOptions,
} from './emitter/index.js';
export {
  parse,
  transpile,
  tryTranspile,
  type ParseOptions,
  type TranspileOptions,
  type TranspileResult,
} from './transpile.js';
export { VERSION } from './version.js';

// ============================================================
// ERROR TAXONOMY
// ============================================================
export {
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorExample,
  ERROR_REGISTRY,
  renderMessage,
  createError,
} from './types.js';

export * from './types.js';
