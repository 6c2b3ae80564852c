/**
 * Keyword Tables
 * Reserved words of the source language, grouped by the role the
 * construct matchers give them.
 */

/** Modifiers that may prefix a member or type declaration */
export const MODIFIER_KEYWORDS: ReadonlySet<string> = new Set([
  'public',
  'protected',
  'private',
  'static',
  'final',
  'abstract',
  'native',
  'synchronized',
  'transient',
  'volatile',
  'strictfp',
  'default',
]);

/** Primitive type names (void is handled separately) */
export const PRIMITIVE_TYPES: ReadonlySet<string> = new Set([
  'boolean',
  'byte',
  'char',
  'short',
  'int',
  'long',
  'float',
  'double',
]);

/** Keywords that introduce or shape declarations */
export const DECLARATION_KEYWORDS: ReadonlySet<string> = new Set([
  'class',
  'interface',
  'enum',
  'extends',
  'implements',
  'throws',
  'package',
  'import',
  'void',
  'new',
  'this',
  'super',
]);

/** Statement and expression keywords; only seen inside opaque bodies */
export const STATEMENT_KEYWORDS: ReadonlySet<string> = new Set([
  'assert',
  'break',
  'case',
  'catch',
  'const',
  'continue',
  'do',
  'else',
  'finally',
  'for',
  'goto',
  'if',
  'instanceof',
  'return',
  'switch',
  'throw',
  'try',
  'while',
]);

/** Words lexed as literals rather than keywords */
export const LITERAL_WORDS: ReadonlySet<string> = new Set([
  'true',
  'false',
  'null',
]);

export function isKeywordText(text: string): boolean {
  return (
    MODIFIER_KEYWORDS.has(text) ||
    PRIMITIVE_TYPES.has(text) ||
    DECLARATION_KEYWORDS.has(text) ||
    STATEMENT_KEYWORDS.has(text)
  );
}
