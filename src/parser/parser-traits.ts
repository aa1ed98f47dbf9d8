/**
 * Parser Extension: Trait Applications
 * Doc comments, trait lists, single traits and the key:value shorthand
 */

import { ParseError } from '../error-classes.js';
import type { ObjectNode, ValueNode } from '../node-types.js';
import {
  nullNode,
  numberNode,
  objectNode,
  stringNode,
} from '../node-types.js';
import type { SourceLocation } from '../source-location.js';
import { TOKEN_TYPES } from '../token-types.js';
import type { TraitApplication } from '../trait-types.js';
import { NODE_START_TOKENS } from './parser-nodes.js';
import { Parser } from './parser.js';
import {
  advance,
  check,
  clearPendingDocs,
  current,
  expect,
  expectOneOf,
  failExpected,
  internString,
  isAdjacent,
  previous,
  skipInsignificant,
  skipInsignificantAndDocs,
  takePendingDocText,
  tokenNumber,
  withNesting,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseLeadingTraits(): TraitApplication[];
    parseDocComment(location: SourceLocation): TraitApplication | null;
    parseTraitList(): TraitApplication[];
    parseTrait(): TraitApplication;
    parseTraitBody(location: SourceLocation): ValueNode;
    parseStructuredTrait(
      firstKey: string,
      firstKeyLocation: SourceLocation
    ): ObjectNode;
  }
}

// ============================================================
// TRAIT LISTS
// ============================================================

/**
 * Parse the doc comment and traits in front of a declaration.
 * The doc-comment record, when present, is always the last element.
 */
Parser.prototype.parseLeadingTraits = function (
  this: Parser
): TraitApplication[] {
  skipInsignificant(this.state);

  let docComment: TraitApplication | null = null;
  if (check(this.state, TOKEN_TYPES.DOC_COMMENT)) {
    const location = current(this.state).span.start;
    // Only the doc block starting here belongs to this declaration
    clearPendingDocs(this.state);
    skipInsignificantAndDocs(this.state);
    docComment = this.parseDocComment(location);
  } else {
    skipInsignificantAndDocs(this.state);
  }

  const traits = this.parseTraitList();
  if (docComment) {
    traits.push(docComment);
  }
  return traits;
};

Parser.prototype.parseDocComment = function (
  this: Parser,
  location: SourceLocation
): TraitApplication | null {
  const text = takePendingDocText(this.state);
  if (text === null) return null;
  return {
    name: this.documentationTrait,
    value: stringNode(text, location),
    kind: 'doc-comment',
    location,
  };
};

/** Parse consecutive `@` traits, as before a declaration or in an apply block */
Parser.prototype.parseTraitList = function (this: Parser): TraitApplication[] {
  const traits: TraitApplication[] = [];
  while (check(this.state, TOKEN_TYPES.AT)) {
    traits.push(this.parseTrait());
    skipInsignificantAndDocs(this.state);
  }
  return traits;
};

// ============================================================
// SINGLE TRAIT
// ============================================================

/** "@" shape_id [ "(" [ trait_body ] ")" ] */
Parser.prototype.parseTrait = function (this: Parser): TraitApplication {
  const at = expect(this.state, TOKEN_TYPES.AT, "Expected '@'");
  const location = at.span.start;

  const nameToken = current(this.state);
  if (!isAdjacent(at, nameToken)) {
    throw ParseError.create(
      'IDL-P004',
      { reason: "trait name must directly follow '@'" },
      nameToken.span.start
    );
  }
  const name = this.parseShapeId();

  const annotation: TraitApplication = {
    name,
    value: nullNode(location),
    kind: 'annotation',
    location,
  };

  // `@foo (1)` is an annotation followed by stray tokens
  if (
    !check(this.state, TOKEN_TYPES.LPAREN) ||
    !isAdjacent(previous(this.state), current(this.state))
  ) {
    return annotation;
  }

  advance(this.state); // consume (
  skipInsignificantAndDocs(this.state);

  if (check(this.state, TOKEN_TYPES.RPAREN)) {
    advance(this.state);
    return annotation;
  }

  const value = this.parseTraitBody(location);
  skipInsignificantAndDocs(this.state);
  expect(this.state, TOKEN_TYPES.RPAREN, "Expected ')' to close trait value");

  return { name, value, kind: 'value', location };
};

/**
 * Parse the value between a trait's parentheses. A leading string or
 * identifier followed by ':' starts a shorthand object without braces.
 */
Parser.prototype.parseTraitBody = function (
  this: Parser,
  location: SourceLocation
): ValueNode {
  const token = current(this.state);

  switch (token.type) {
    case TOKEN_TYPES.LBRACE:
    case TOKEN_TYPES.LBRACKET:
      return this.parseNode(location);

    case TOKEN_TYPES.TEXT_BLOCK:
      advance(this.state);
      return stringNode(token.value, location);

    case TOKEN_TYPES.NUMBER:
      advance(this.state);
      return numberNode(tokenNumber(token), location);

    case TOKEN_TYPES.STRING: {
      advance(this.state);
      skipInsignificantAndDocs(this.state);
      if (check(this.state, TOKEN_TYPES.COLON)) {
        advance(this.state);
        skipInsignificantAndDocs(this.state);
        const key = internString(this.state, token.value);
        return this.parseStructuredTrait(key, token.span.start);
      }
      return stringNode(token.value, location);
    }

    case TOKEN_TYPES.IDENTIFIER: {
      const identifier = internString(this.state, token.value);
      advance(this.state);
      skipInsignificantAndDocs(this.state);
      if (check(this.state, TOKEN_TYPES.COLON)) {
        advance(this.state);
        skipInsignificantAndDocs(this.state);
        return this.parseStructuredTrait(identifier, token.span.start);
      }
      return this.resolver.resolveBareIdentifier(identifier, location);
    }

    case TOKEN_TYPES.AT:
    case TOKEN_TYPES.COLON:
    case TOKEN_TYPES.WALRUS:
    case TOKEN_TYPES.EQUAL:
    case TOKEN_TYPES.DOT:
    case TOKEN_TYPES.POUND:
    case TOKEN_TYPES.DOLLAR:
    case TOKEN_TYPES.COMMA:
    case TOKEN_TYPES.LPAREN:
    case TOKEN_TYPES.RPAREN:
    case TOKEN_TYPES.RBRACE:
    case TOKEN_TYPES.RBRACKET:
    case TOKEN_TYPES.NEWLINE:
    case TOKEN_TYPES.COMMENT:
    case TOKEN_TYPES.DOC_COMMENT:
    case TOKEN_TYPES.EOF:
      return failExpected(this.state, ...NODE_START_TOKENS);

    default: {
      const unreachable: never = token.type;
      throw new Error(`Unhandled token type: ${String(unreachable)}`);
    }
  }
};

// ============================================================
// SHORTHAND OBJECTS
// ============================================================

/**
 * Parse `key: value` pairs up to the closing ')'. The cursor is just past
 * the first key's ':'. A repeated key fails at the repeated key.
 */
Parser.prototype.parseStructuredTrait = function (
  this: Parser,
  firstKey: string,
  firstKeyLocation: SourceLocation
): ObjectNode {
  return withNesting(this.state, firstKeyLocation, () => {
    const members = new Map<string, ValueNode>();
    members.set(firstKey, this.parseNode());
    skipInsignificantAndDocs(this.state);

    while (!check(this.state, TOKEN_TYPES.RPAREN)) {
      const keyToken = expectOneOf(
        this.state,
        TOKEN_TYPES.RPAREN,
        TOKEN_TYPES.IDENTIFIER,
        TOKEN_TYPES.STRING
      );
      const key = internString(this.state, keyToken.value);
      advance(this.state);
      skipInsignificantAndDocs(this.state);
      expect(
        this.state,
        TOKEN_TYPES.COLON,
        `Expected ':' after trait member '${key}'`
      );
      skipInsignificantAndDocs(this.state);

      const value = this.parseNode();
      if (members.has(key)) {
        throw ParseError.create(
          'IDL-P003',
          { container: 'trait', key },
          keyToken.span.start
        );
      }
      members.set(key, value);
      skipInsignificantAndDocs(this.state);
    }

    return objectNode(members, firstKeyLocation);
  });
};
