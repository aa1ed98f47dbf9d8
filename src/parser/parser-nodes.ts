/**
 * Parser Extension: Value Nodes
 * Strings, text blocks, numbers, identifiers, objects and arrays
 */

import { ParseError } from '../error-classes.js';
import type {
  ArrayNode,
  ObjectNode,
  ValueNode,
} from '../node-types.js';
import {
  arrayNode,
  numberNode,
  objectNode,
  relocate,
  stringNode,
} from '../node-types.js';
import type { SourceLocation } from '../source-location.js';
import { TOKEN_TYPES } from '../token-types.js';
import { Parser } from './parser.js';
import {
  advance,
  check,
  current,
  expect,
  expectOneOf,
  failExpected,
  internString,
  isAtEnd,
  skipInsignificantAndDocs,
  tokenNumber,
  withNesting,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseNode(location?: SourceLocation): ValueNode;
    parseObject(): ObjectNode;
    parseArray(): ArrayNode;
  }
}

/** Tokens that can start a value */
export const NODE_START_TOKENS = [
  TOKEN_TYPES.LBRACE,
  TOKEN_TYPES.LBRACKET,
  TOKEN_TYPES.TEXT_BLOCK,
  TOKEN_TYPES.STRING,
  TOKEN_TYPES.NUMBER,
  TOKEN_TYPES.IDENTIFIER,
] as const;

// ============================================================
// VALUE PARSING
// ============================================================

/**
 * Parse one value. When `location` is given the returned node reports it
 * instead of its own start.
 */
Parser.prototype.parseNode = function (
  this: Parser,
  location?: SourceLocation
): ValueNode {
  const node = parseNodeAt(this);
  return location ? relocate(node, location) : node;
};

function parseNodeAt(parser: Parser): ValueNode {
  const state = parser.state;
  const token = current(state);

  if (check(state, TOKEN_TYPES.LBRACE)) {
    return parser.parseObject();
  }

  if (check(state, TOKEN_TYPES.LBRACKET)) {
    return parser.parseArray();
  }

  if (check(state, TOKEN_TYPES.STRING, TOKEN_TYPES.TEXT_BLOCK)) {
    advance(state);
    return stringNode(token.value, token.span.start);
  }

  if (check(state, TOKEN_TYPES.NUMBER)) {
    advance(state);
    return numberNode(tokenNumber(token), token.span.start);
  }

  if (check(state, TOKEN_TYPES.IDENTIFIER)) {
    const name = parser.parseShapeId();
    return parser.resolver.resolveBareIdentifier(name, token.span.start);
  }

  return failExpected(state, ...NODE_START_TOKENS);
}

// ============================================================
// OBJECT & ARRAY PARSING
// ============================================================

Parser.prototype.parseObject = function (this: Parser): ObjectNode {
  const open = expect(this.state, TOKEN_TYPES.LBRACE, "Expected '{'");

  return withNesting(this.state, open.span.start, () => {
    const members = new Map<string, ValueNode>();
    skipInsignificantAndDocs(this.state);

    while (!check(this.state, TOKEN_TYPES.RBRACE)) {
      const keyToken = expectOneOf(
        this.state,
        TOKEN_TYPES.RBRACE,
        TOKEN_TYPES.IDENTIFIER,
        TOKEN_TYPES.STRING
      );
      const key = internString(this.state, keyToken.value);
      advance(this.state);
      skipInsignificantAndDocs(this.state);
      expect(this.state, TOKEN_TYPES.COLON, `Expected ':' after key '${key}'`);
      skipInsignificantAndDocs(this.state);

      const value = this.parseNode();
      if (members.has(key)) {
        throw ParseError.create(
          'IDL-P003',
          { container: 'object', key },
          keyToken.span.start
        );
      }
      members.set(key, value);
      skipInsignificantAndDocs(this.state);
    }

    advance(this.state); // consume }
    return objectNode(members, open.span.start);
  });
};

Parser.prototype.parseArray = function (this: Parser): ArrayNode {
  const open = expect(this.state, TOKEN_TYPES.LBRACKET, "Expected '['");

  return withNesting(this.state, open.span.start, () => {
    const elements: ValueNode[] = [];
    skipInsignificantAndDocs(this.state);

    while (!check(this.state, TOKEN_TYPES.RBRACKET)) {
      if (isAtEnd(this.state)) {
        expect(this.state, TOKEN_TYPES.RBRACKET, "Expected ']'");
      }
      elements.push(this.parseNode());
      skipInsignificantAndDocs(this.state);
    }

    advance(this.state); // consume ]
    return arrayNode(elements, open.span.start);
  });
};
