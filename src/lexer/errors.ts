/**
 * Lexer Errors
 */

import { IdlError, lookupDefinition, messageFor } from '../error-classes.js';
import type { SourceLocation } from '../source-location.js';

export class LexerError extends IdlError {
  // Lexer errors always have a location
  override readonly location: SourceLocation;

  constructor(
    errorId: string,
    message: string,
    location: SourceLocation,
    context?: Record<string, unknown>
  ) {
    lookupDefinition(errorId, 'lexer');
    super({ errorId, message, location, context });
    this.name = 'LexerError';
    this.location = location;
  }

  /** Create from the registry template for `errorId` */
  static create(
    errorId: string,
    context: Record<string, unknown>,
    location: SourceLocation
  ): LexerError {
    return new LexerError(
      errorId,
      messageFor(errorId, context),
      location,
      context
    );
  }
}
