/**
 * Shared Types
 * Source locations, tokens, AST nodes, errors and observability events
 */

export * from './source-location.js';
export * from './token-types.js';
export * from './ast-nodes.js';
export * from './observability.js';
export * from './error-registry.js';
export * from './error-classes.js';
