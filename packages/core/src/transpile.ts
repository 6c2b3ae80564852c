/**
 * Transpile Pipeline
 * tokenize -> group -> parse -> emit, with per-stage timings reported
 * through observability callbacks
 */

import type { FileNode } from './ast-nodes.js';
import { BrewportError, type BrewportErrorData } from './error-classes.js';
import { emit, type EmitOptions } from './emitter/index.js';
import { groupTokens } from './grouper/index.js';
import { tokenize } from './lexer/index.js';
import type { ObservabilityCallbacks, PipelineStage } from './observability.js';
import { parseElements } from './parser/index.js';

export interface ParseOptions {
  /** Keep the comment before each declaration as its docComment */
  preserveComments?: boolean | undefined;
  observability?: ObservabilityCallbacks | undefined;
}

export type TranspileOptions = ParseOptions & EmitOptions;

export type TranspileResult =
  | { readonly ok: true; readonly output: string; readonly ast: FileNode }
  | { readonly ok: false; readonly error: BrewportErrorData };

function timed<T>(
  stage: PipelineStage,
  observability: ObservabilityCallbacks | undefined,
  run: () => T
): T {
  const startTime = Date.now();
  const result = run();
  observability?.onStageComplete?.({ stage, durationMs: Date.now() - startTime });
  return result;
}

/**
 * Parse one file into its AST.
 *
 * @throws LexerError, UnbalancedBracketError, UnrecognizedMemberError,
 * ParseError or MatcherConsumptionMismatchError
 */
export function parse(source: string, options: ParseOptions = {}): FileNode {
  const { observability } = options;
  const preserveComments = options.preserveComments ?? false;

  const tokens = timed('tokenize', observability, () =>
    tokenize(source, { includeComments: preserveComments })
  );
  const elements = timed('group', observability, () => groupTokens(tokens));
  return timed('parse', observability, () =>
    parseElements(elements, source, { preserveComments, observability })
  );
}

/**
 * Transpile one file to TypeScript.
 *
 * @throws BrewportError subclasses from any stage
 */
export function transpile(source: string, options: TranspileOptions = {}): string {
  return transpileWithAst(source, options).output;
}

function transpileWithAst(
  source: string,
  options: TranspileOptions
): { output: string; ast: FileNode } {
  const ast = parse(source, options);
  const output = timed('emit', options.observability, () => emit(ast, options));
  return { output, ast };
}

/**
 * Transpile without throwing for input errors.
 * Errors that are not BrewportErrors still propagate.
 */
export function tryTranspile(
  source: string,
  options: TranspileOptions = {}
): TranspileResult {
  try {
    const { output, ast } = transpileWithAst(source, options);
    return { ok: true, output, ast };
  } catch (error) {
    if (error instanceof BrewportError) {
      return { ok: false, error: error.toData() };
    }
    throw error;
  }
}
