/**
 * brewport Error Classes and Factory
 * Structured error types with registry-based error codes
 */

import type { SourceLocation } from './source-location.js';
import {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
} from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface BrewportErrorData {
  readonly errorId: string;
  /** Error class name, e.g. "UnrecognizedMemberError" */
  readonly kind: string;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  /** Literal source text of the token or group responsible */
  readonly offending?: string | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

interface ErrorInit {
  readonly errorId: string;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  readonly offending?: string | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

/**
 * Look up a definition and check it belongs to the expected category.
 * @throws TypeError for unknown IDs or IDs of another category
 */
function definitionFor(
  errorId: string,
  category: ErrorCategory
): ErrorDefinition {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  if (definition.category !== category) {
    throw new TypeError(`Expected ${category} error ID, got: ${errorId}`);
  }
  return definition;
}

/** Render the registry template for an ID of the given category */
export function renderErrorMessage(
  errorId: string,
  category: ErrorCategory,
  context: Record<string, unknown>
): string {
  return renderMessage(definitionFor(errorId, category).messageTemplate, context);
}

/** Shorten offending text for use inside one-line messages */
export function excerpt(text: string, max = 40): string {
  const oneLine = text.replace(/\s+/g, ' ').trim();
  return oneLine.length > max ? `'${oneLine.slice(0, max - 3)}...'` : `'${oneLine}'`;
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all brewport errors.
 * Every error is terminal for the file being transpiled.
 */
export class BrewportError extends Error {
  readonly errorId: string;
  readonly location?: SourceLocation | undefined;
  readonly offending?: string | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: ErrorInit) {
    if (!data.errorId) {
      throw new TypeError('errorId is required');
    }
    if (!ERROR_REGISTRY.has(data.errorId)) {
      throw new TypeError(`Unknown error ID: ${data.errorId}`);
    }

    const locationStr = data.location
      ? ` at ${data.location.line}:${data.location.column}`
      : '';
    super(`${data.message}${locationStr}`);
    this.name = 'BrewportError';
    this.errorId = data.errorId;
    this.location = data.location;
    this.offending = data.offending;
    this.context = data.context;
  }

  get category(): ErrorCategory | undefined {
    return ERROR_REGISTRY.get(this.errorId)?.category;
  }

  /** Get structured error data for custom formatting */
  toData(): BrewportErrorData {
    return {
      errorId: this.errorId,
      kind: this.name,
      message: this.message.replace(/ at \d+:\d+$/, ''),
      location: this.location,
      offending: this.offending,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: BrewportErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

// ============================================================
// ERROR FACTORY
// ============================================================

/**
 * Create an error from the registry, rendering its message template.
 *
 * @throws TypeError if errorId is not found in registry
 *
 * @example
 * createError("BREW-E001", { name: "Foo" }, location)
 * // BrewportError: "Cannot resolve type Foo at 3:5"
 */
export function createError(
  errorId: string,
  context: Record<string, unknown>,
  location?: SourceLocation | undefined
): BrewportError {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }

  return new BrewportError({
    errorId,
    message: renderMessage(definition.messageTemplate, context),
    location,
    context,
  });
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

/** Bracket nesting failure detected by the grouper */
export class UnbalancedBracketError extends BrewportError {
  override readonly location: SourceLocation;
  override readonly offending: string;

  constructor(
    errorId: string,
    location: SourceLocation,
    bracket: string,
    context: Record<string, unknown> = {}
  ) {
    const fullContext = { ...context, bracket };
    super({
      errorId,
      message: renderErrorMessage(errorId, 'grouping', fullContext),
      location,
      offending: bracket,
      context: fullContext,
    });
    this.name = 'UnbalancedBracketError';
    this.location = location;
    this.offending = bracket;
  }
}

/** Where an unrecognized member was found */
export type MemberScope = 'class' | 'interface' | 'anonymous class' | 'file';

/** No matcher accepted the element at the dispatcher cursor */
export class UnrecognizedMemberError extends BrewportError {
  override readonly location: SourceLocation;
  override readonly offending: string;
  readonly scope: MemberScope;

  constructor(location: SourceLocation, offending: string, scope: MemberScope) {
    const context = { scope, text: excerpt(offending) };
    super({
      errorId: 'BREW-P001',
      message: renderErrorMessage('BREW-P001', 'parse', context),
      location,
      offending,
      context,
    });
    this.name = 'UnrecognizedMemberError';
    this.location = location;
    this.offending = offending;
    this.scope = scope;
  }
}

/** Malformed structure inside a recognized declaration */
export class ParseError extends BrewportError {
  override readonly location: SourceLocation;

  constructor(
    location: SourceLocation,
    offending: string,
    construct: string,
    expected: string
  ) {
    const context = { construct, expected, text: excerpt(offending) };
    super({
      errorId: 'BREW-P002',
      message: renderErrorMessage('BREW-P002', 'parse', context),
      location,
      offending,
      context,
    });
    this.name = 'ParseError';
    this.location = location;
  }
}

/**
 * A matcher's parser disagreed with its recognizer about the construct's
 * extent. Signals a defect, never bad input.
 */
export class MatcherConsumptionMismatchError extends BrewportError {
  readonly matcher: string;

  constructor(
    matcher: string,
    detail: string,
    location?: SourceLocation | undefined,
    offending?: string | undefined
  ) {
    const context = { matcher, detail };
    super({
      errorId: 'BREW-I001',
      message: renderErrorMessage('BREW-I001', 'internal', context),
      location,
      offending,
      context,
    });
    this.name = 'MatcherConsumptionMismatchError';
    this.matcher = matcher;
  }
}

/** Unresolvable reference found while generating code */
export class EmissionError extends BrewportError {
  constructor(
    errorId: string,
    context: Record<string, unknown>,
    location?: SourceLocation | undefined,
    offending?: string | undefined
  ) {
    super({
      errorId,
      message: renderErrorMessage(errorId, 'emit', context),
      location,
      offending,
      context,
    });
    this.name = 'EmissionError';
  }
}

/** Invalid configuration file or option values */
export class ConfigError extends BrewportError {
  constructor(detail: string, context: Record<string, unknown> = {}) {
    const fullContext = { ...context, detail };
    super({
      errorId: 'BREW-C001',
      message: renderErrorMessage('BREW-C001', 'config', fullContext),
      context: fullContext,
    });
    this.name = 'ConfigError';
  }
}
