/**
 * Emit Options
 */

import type { ObservabilityCallbacks } from '../observability.js';

export interface EmitOptions {
  /** Spaces per indentation level (default 2) */
  indent?: number | undefined;
  /** Joins enclosing and nested names in lowered declarations (default "$") */
  nameSeparator?: string | undefined;
  /** Emit `export namespace A { export type B = A$B; ... }` (default true) */
  nestedAliases?: boolean | undefined;
  /** With a wildcard import, treat any unresolved simple name as external (default true) */
  trustWildcardImports?: boolean | undefined;
  /** Extra type names resolved as external */
  knownTypes?: readonly string[] | undefined;
  /** Extra external interfaces that anonymous classes implement */
  knownInterfaces?: readonly string[] | undefined;
  /** Text rendered as leading `//` lines */
  header?: string | null | undefined;
  /** Re-emit doc comments stored on declarations */
  preserveComments?: boolean | undefined;
  observability?: ObservabilityCallbacks | undefined;
}

export interface ResolvedEmitOptions {
  readonly indentUnit: string;
  readonly nameSeparator: string;
  readonly nestedAliases: boolean;
  readonly trustWildcardImports: boolean;
  readonly knownTypes: ReadonlySet<string>;
  readonly knownInterfaces: ReadonlySet<string>;
  readonly header: string | null;
  readonly preserveComments: boolean;
  readonly observability: ObservabilityCallbacks;
}

export const DEFAULT_INDENT = 2;
export const DEFAULT_NAME_SEPARATOR = '$';

export function resolveEmitOptions(options: EmitOptions = {}): ResolvedEmitOptions {
  const indent = options.indent ?? DEFAULT_INDENT;
  if (!Number.isInteger(indent) || indent < 0) {
    throw new RangeError(`indent must be a non-negative integer, got ${indent}`);
  }
  return {
    indentUnit: ' '.repeat(indent),
    nameSeparator: options.nameSeparator ?? DEFAULT_NAME_SEPARATOR,
    nestedAliases: options.nestedAliases ?? true,
    trustWildcardImports: options.trustWildcardImports ?? true,
    knownTypes: new Set(options.knownTypes ?? []),
    knownInterfaces: new Set(options.knownInterfaces ?? []),
    header: options.header ?? null,
    preserveComments: options.preserveComments ?? false,
    observability: options.observability ?? {},
  };
}
