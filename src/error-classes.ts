/**
 * Error Classes and Factory
 * Structured error types with registry-based error codes
 */

import type { SourceLocation } from './source-location.js';
import { formatLocation } from './source-location.js';
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
export interface IdlErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

/**
 * Look up a definition, rejecting unknown IDs and IDs outside the
 * expected category.
 * @internal
 */
export function lookupDefinition(
  errorId: string,
  category?: ErrorCategory
): ErrorDefinition {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  if (category !== undefined && definition.category !== category) {
    throw new TypeError(`Expected ${category} error ID, got: ${errorId}`);
  }
  return definition;
}

/**
 * Render the registry message for an error ID.
 * @internal
 */
export function messageFor(
  errorId: string,
  context: Record<string, unknown>
): string {
  return renderMessage(lookupDefinition(errorId).messageTemplate, context);
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all IDL errors.
 * Provides structured data for host applications to format as needed.
 */
export class IdlError extends Error {
  readonly errorId: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: IdlErrorData) {
    if (!data.errorId) {
      throw new TypeError('errorId is required');
    }
    lookupDefinition(data.errorId);

    const locationStr = data.location
      ? ` at ${formatLocation(data.location)}`
      : '';
    super(`${data.message}${locationStr}`);
    this.name = 'IdlError';
    this.errorId = data.errorId;
    this.location = data.location;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): IdlErrorData {
    return {
      errorId: this.errorId,
      message: this.message.replace(/ at \d+:\d+$/, ''),
      location: this.location,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: IdlErrorData) => string): string {
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
 * @example
 * createError('IDL-P003', { container: 'trait', key: 'a' }, location)
 * // IdlError: "Duplicate member of trait: 'a' at 1:12"
 */
export function createError(
  errorId: string,
  context: Record<string, unknown>,
  location?: SourceLocation | undefined
): IdlError {
  return new IdlError({
    errorId,
    message: messageFor(errorId, context),
    location,
    context,
  });
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

/** Grammar violations: unexpected tokens, missing delimiters, duplicate keys */
export class ParseError extends IdlError {
  // Parse errors always point at a token
  override readonly location: SourceLocation;

  constructor(
    errorId: string,
    message: string,
    location: SourceLocation,
    context?: Record<string, unknown>
  ) {
    lookupDefinition(errorId, 'parse');
    super({ errorId, message, location, context });
    this.name = 'ParseError';
    this.location = location;
  }

  /** Create from the registry template for `errorId` */
  static create(
    errorId: string,
    context: Record<string, unknown>,
    location: SourceLocation
  ): ParseError {
    return new ParseError(
      errorId,
      messageFor(errorId, context),
      location,
      context
    );
  }
}

/** Nesting depth exceeded the configured maximum */
export class ResourceLimitError extends IdlError {
  override readonly location: SourceLocation;
  readonly maxDepth: number;

  constructor(maxDepth: number, location: SourceLocation) {
    super({
      errorId: 'IDL-R001',
      message: messageFor('IDL-R001', { max: maxDepth }),
      location,
      context: { max: maxDepth },
    });
    this.name = 'ResourceLimitError';
    this.location = location;
    this.maxDepth = maxDepth;
  }
}
