/**
 * Trait Parser
 * Main entry points and re-exports
 */

import { tokenize } from '../lexer/index.js';
import type { ValueNode } from '../node-types.js';
import type { ReferenceResolver } from '../resolver.js';
import type { ApplyStatement, TraitApplication } from '../trait-types.js';
import {
  Parser,
  type ParserOptions,
  type SharedStateParserOptions,
} from './parser.js';
import { TOKEN_TYPES } from '../token-types.js';
import {
  type ParserState,
  expectOneOf,
  skipInsignificantAndDocs,
} from './state.js';

// Import extension modules to register prototype methods on Parser.
// These must be imported AFTER parser.js to ensure the class is defined.
import './parser-shape-id.js';
import './parser-nodes.js';
import './parser-traits.js';
import './parser-apply.js';

// ============================================================
// MAIN ENTRY POINTS
// ============================================================

/**
 * Parse the doc comment and traits at the cursor, for the declaration
 * that follows. Shares the cursor with the caller, which continues with
 * the declaration's own grammar.
 *
 * Throws ParseError or ResourceLimitError; no partial list is returned.
 */
export function parseLeadingTraits(
  state: ParserState,
  resolver: ReferenceResolver,
  options: Omit<SharedStateParserOptions, 'resolver'> = {}
): TraitApplication[] {
  return new Parser(state, { ...options, resolver }).parseLeadingTraits();
}

/**
 * Tokenize `source` and parse the traits in front of its first
 * declaration.
 *
 * @example
 * ```typescript
 * const traits = parseTraits('/// Docs\n@length(min: 1)\nstring Name');
 * // [{ name: 'length', kind: 'value', ... }, { name: 'smithy.api#documentation', kind: 'doc-comment', ... }]
 * ```
 */
export function parseTraits(
  source: string,
  options: ParserOptions = {}
): TraitApplication[] {
  const parser = new Parser(tokenize(source), options);
  return parser.parseLeadingTraits();
}

/** Tokenize and parse a single `apply` statement */
export function parseApply(
  source: string,
  options: ParserOptions = {}
): ApplyStatement {
  const parser = new Parser(tokenize(source), options);
  return parser.parseApply();
}

/** Tokenize and parse one complete value; trailing tokens are an error */
export function parseNodeValue(
  source: string,
  options: ParserOptions = {}
): ValueNode {
  const parser = new Parser(tokenize(source), options);
  skipInsignificantAndDocs(parser.state);
  const node = parser.parseNode();
  skipInsignificantAndDocs(parser.state);
  expectOneOf(parser.state, TOKEN_TYPES.EOF);
  return node;
}

// ============================================================
// RE-EXPORTS
// ============================================================

// State (for advanced usage)
export {
  clearPendingDocs,
  createParserState,
  DEFAULT_MAX_NESTING_DEPTH,
  takePendingDocText,
  type ParserState,
  type ParserStateOptions,
} from './state.js';

// Parser class (for advanced usage)
export {
  Parser,
  type ParserOptions,
  type SharedStateParserOptions,
} from './parser.js';
