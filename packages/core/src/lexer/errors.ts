/**
 * Lexer Errors
 */

import type { SourceLocation } from '../source-location.js';
import { BrewportError, renderErrorMessage } from '../error-classes.js';

export class LexerError extends BrewportError {
  // Lexer errors always have a location
  override readonly location: SourceLocation;

  constructor(
    errorId: string,
    location: SourceLocation,
    offending: string,
    context: Record<string, unknown> = {}
  ) {
    super({
      errorId,
      message: renderErrorMessage(errorId, 'lexer', context),
      location,
      offending,
      context,
    });

    this.name = 'LexerError';
    this.location = location;
  }
}
