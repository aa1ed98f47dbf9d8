/**
 * Parser Extension: Apply Statements
 * apply <shape_id> @trait
 * apply <shape_id> { @trait* }
 */

import { ParseError } from '../error-classes.js';
import { TOKEN_TYPES } from '../token-types.js';
import type { ApplyStatement, TraitApplication } from '../trait-types.js';
import { Parser } from './parser.js';
import {
  advance,
  check,
  clearPendingDocs,
  describeToken,
  expect,
  expectOneOf,
  skipInsignificant,
  skipInsignificantAndDocs,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseApply(): ApplyStatement;
  }
}

Parser.prototype.parseApply = function (this: Parser): ApplyStatement {
  skipInsignificant(this.state);
  const keyword = expectOneOf(this.state, TOKEN_TYPES.IDENTIFIER);
  if (keyword.value !== 'apply') {
    throw ParseError.create(
      'IDL-P001',
      { expected: "'apply'", actual: describeToken(keyword) },
      keyword.span.start
    );
  }
  advance(this.state);
  skipInsignificant(this.state);

  const target = this.parseShapeId();
  skipInsignificant(this.state);

  let traits: TraitApplication[];
  if (check(this.state, TOKEN_TYPES.LBRACE)) {
    advance(this.state);
    skipInsignificantAndDocs(this.state);
    traits = this.parseTraitList();
    expect(this.state, TOKEN_TYPES.RBRACE, "Expected '}' to close apply block");
  } else {
    expectOneOf(this.state, TOKEN_TYPES.AT, TOKEN_TYPES.LBRACE);
    traits = [this.parseTrait()];
  }

  // Doc comments inside an apply statement document nothing
  clearPendingDocs(this.state);

  return { target, location: keyword.span.start, traits };
};
