/**
 * Parser Extension: Shape Identifiers
 * namespace ('.' identifier)* ['#' identifier] ['$' identifier]
 */

import { ParseError } from '../error-classes.js';
import type { Token, TokenType } from '../token-types.js';
import { TOKEN_TYPES } from '../token-types.js';
import { Parser } from './parser.js';
import {
  advance,
  current,
  expectOneOf,
  internString,
  isAdjacent,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseShapeId(): string;
  }
}

// ============================================================
// SHAPE ID PARSING
// ============================================================

/**
 * Parse a possibly relative shape ID. Every part must touch the previous
 * one: `ns.foo#Bar` is one shape ID, `ns. foo` is an error.
 */
Parser.prototype.parseShapeId = function (this: Parser): string {
  let last: Token = expectOneOf(this.state, TOKEN_TYPES.IDENTIFIER);
  advance(this.state);
  let text = last.value;

  const atSeparator = (separator: TokenType): boolean => {
    const next = current(this.state);
    return next.type === separator && isAdjacent(last, next);
  };

  const takeSegment = (): void => {
    const separator = advance(this.state);
    const segment = current(this.state);
    if (
      segment.type !== TOKEN_TYPES.IDENTIFIER ||
      !isAdjacent(separator, segment)
    ) {
      throw ParseError.create(
        'IDL-P004',
        { reason: `expected identifier after '${separator.value}'` },
        segment.span.start
      );
    }
    advance(this.state);
    text += separator.value + segment.value;
    last = segment;
  };

  while (atSeparator(TOKEN_TYPES.DOT)) takeSegment();
  if (atSeparator(TOKEN_TYPES.POUND)) takeSegment();
  if (atSeparator(TOKEN_TYPES.DOLLAR)) takeSegment();

  return internString(this.state, text);
};
