/**
 * Parser State
 * Token cursor shared by every parsing routine: navigation, insignificant
 * token skipping, pending doc comments, string interning, nesting depth
 */

import {
  messageFor,
  ParseError,
  ResourceLimitError,
} from '../error-classes.js';
import type { SourceLocation } from '../source-location.js';
import type { Token, TokenType } from '../token-types.js';
import { INSIGNIFICANT_TOKENS, TOKEN_TYPES } from '../token-types.js';

/** Nesting depth allowed when no limit is configured */
export const DEFAULT_MAX_NESTING_DEPTH = 64;

// ============================================================
// PARSER STATE
// ============================================================

export interface ParserState {
  readonly tokens: readonly Token[];
  pos: number;
  /** Current nesting depth of objects, arrays and shorthand trait values */
  depth: number;
  readonly maxNestingDepth: number;
  /** Doc comment lines passed over and not yet taken */
  readonly pendingDocLines: string[];
  /** Interned identifier and key strings */
  readonly strings: Map<string, string>;
}

export interface ParserStateOptions {
  maxNestingDepth?: number | undefined;
}

export function createParserState(
  tokens: readonly Token[],
  options: ParserStateOptions = {}
): ParserState {
  return {
    tokens,
    pos: 0,
    depth: 0,
    maxNestingDepth: options.maxNestingDepth ?? DEFAULT_MAX_NESTING_DEPTH,
    pendingDocLines: [],
    strings: new Map(),
  };
}

// ============================================================
// TOKEN NAVIGATION
// ============================================================

/** @internal */
export function current(state: ParserState): Token {
  const token = state.tokens[state.pos];
  if (token) return token;
  const last = state.tokens[state.tokens.length - 1];
  if (last) return last;
  throw new Error('No tokens available');
}

/** @internal */
export function peek(state: ParserState, offset = 0): Token {
  const token = state.tokens[state.pos + offset];
  if (token) return token;
  const last = state.tokens[state.tokens.length - 1];
  if (last) return last;
  throw new Error('No tokens available');
}

/** @internal */
export function isAtEnd(state: ParserState): boolean {
  return current(state).type === TOKEN_TYPES.EOF;
}

/** @internal */
export function check(state: ParserState, ...types: TokenType[]): boolean {
  return types.includes(current(state).type);
}

/**
 * Move past the current token. Doc comment text is collected as it is
 * passed over, for `takePendingDocText`.
 * @internal
 */
export function advance(state: ParserState): Token {
  const token = current(state);
  if (token.type === TOKEN_TYPES.DOC_COMMENT) {
    state.pendingDocLines.push(token.value);
  }
  if (!isAtEnd(state)) state.pos++;
  return token;
}

/** The most recently consumed token @internal */
export function previous(state: ParserState): Token {
  return peek(state, state.pos > 0 ? -1 : 0);
}

/** True when `next` starts exactly where `previous` ends */
export function isAdjacent(previous: Token, next: Token): boolean {
  return previous.span.end.offset === next.span.start.offset;
}

// ============================================================
// EXPECTATIONS
// ============================================================

const TOKEN_DESCRIPTIONS: Record<TokenType, string> = {
  STRING: 'string',
  TEXT_BLOCK: 'text block',
  NUMBER: 'number',
  IDENTIFIER: 'identifier',
  AT: "'@'",
  COLON: "':'",
  WALRUS: "':='",
  EQUAL: "'='",
  DOT: "'.'",
  POUND: "'#'",
  DOLLAR: "'$'",
  COMMA: "','",
  LPAREN: "'('",
  RPAREN: "')'",
  LBRACE: "'{'",
  RBRACE: "'}'",
  LBRACKET: "'['",
  RBRACKET: "']'",
  NEWLINE: 'newline',
  COMMENT: 'comment',
  DOC_COMMENT: 'doc comment',
  EOF: 'end of input',
};

/** Human-readable description of a token for error messages */
export function describeToken(token: Token): string {
  const description = TOKEN_DESCRIPTIONS[token.type];
  switch (token.type) {
    case TOKEN_TYPES.IDENTIFIER:
    case TOKEN_TYPES.NUMBER:
      return `${description} '${token.value}'`;
    case TOKEN_TYPES.STRING:
      return `${description} "${token.value}"`;
    default:
      return description;
  }
}

function describeExpected(types: readonly TokenType[]): string {
  const descriptions = types.map((type) => TOKEN_DESCRIPTIONS[type]);
  if (descriptions.length === 1) return descriptions.join('');
  return `one of ${descriptions.join(', ')}`;
}

/**
 * Require the current token to be one of `types` without consuming it.
 * @internal
 */
export function expectOneOf(state: ParserState, ...types: TokenType[]): Token {
  const token = current(state);
  if (types.includes(token.type)) return token;
  return failExpected(state, ...types);
}

/**
 * Fail at the current token, reporting the token kinds that were acceptable.
 * @internal
 */
export function failExpected(state: ParserState, ...types: TokenType[]): never {
  const token = current(state);
  const context = {
    expected: describeExpected(types),
    actual: describeToken(token),
    expectedTypes: types,
    actualType: token.type,
  };
  const message = messageFor('IDL-P001', context);
  const hint = generateHint(types, token);
  throw new ParseError(
    'IDL-P001',
    hint ? `${message}. ${hint}` : message,
    token.span.start,
    context
  );
}

/**
 * Consume a token of `type`, or fail with `message`.
 * @internal
 */
export function expect(
  state: ParserState,
  type: TokenType,
  message: string
): Token {
  if (check(state, type)) return advance(state);
  const token = current(state);
  const hint = generateHint([type], token);
  const fullMessage = hint ? `${message}. ${hint}` : message;
  throw ParseError.create(
    'IDL-P002',
    { message: fullMessage, expectedTypes: [type], actualType: token.type },
    token.span.start
  );
}

/**
 * Contextual hints for common parse errors.
 * @internal
 */
function generateHint(
  expectedTypes: readonly TokenType[],
  actualToken: Token
): string | null {
  if (actualToken.type !== TOKEN_TYPES.EOF) return null;
  if (expectedTypes.includes(TOKEN_TYPES.RPAREN)) {
    return 'Hint: Check for unclosed parenthesis';
  }
  if (expectedTypes.includes(TOKEN_TYPES.RBRACE)) {
    return 'Hint: Check for unclosed brace';
  }
  if (expectedTypes.includes(TOKEN_TYPES.RBRACKET)) {
    return 'Hint: Check for unclosed bracket';
  }
  return null;
}

// ============================================================
// SKIPPING
// ============================================================

/** Skip newlines, commas and comments @internal */
export function skipInsignificant(state: ParserState): void {
  while (INSIGNIFICANT_TOKENS.includes(current(state).type)) advance(state);
}

/** Skip insignificant tokens and doc comments, collecting doc text @internal */
export function skipInsignificantAndDocs(state: ParserState): void {
  while (
    check(state, TOKEN_TYPES.DOC_COMMENT) ||
    INSIGNIFICANT_TOKENS.includes(current(state).type)
  ) {
    advance(state);
  }
}

// ============================================================
// DOC COMMENTS
// ============================================================

/**
 * Take all pending doc comment lines joined by newlines.
 * Returns null when no doc comment was passed since the last take.
 */
export function takePendingDocText(state: ParserState): string | null {
  if (state.pendingDocLines.length === 0) return null;
  const text = state.pendingDocLines.join('\n');
  state.pendingDocLines.length = 0;
  return text;
}

/** Drop pending doc comment lines that belong to no declaration */
export function clearPendingDocs(state: ParserState): void {
  state.pendingDocLines.length = 0;
}

// ============================================================
// INTERNING
// ============================================================

/** Return the shared instance of `text` */
export function internString(state: ParserState, text: string): string {
  const existing = state.strings.get(text);
  if (existing !== undefined) return existing;
  state.strings.set(text, text);
  return text;
}

// ============================================================
// NESTING
// ============================================================

/** @internal */
export function increaseNesting(
  state: ParserState,
  location: SourceLocation
): void {
  if (state.depth + 1 > state.maxNestingDepth) {
    throw new ResourceLimitError(state.maxNestingDepth, location);
  }
  state.depth++;
}

/** @internal */
export function decreaseNesting(state: ParserState): void {
  state.depth--;
}

/**
 * Run `fn` one nesting level deeper. The level is released on every
 * exit path, including thrown errors.
 */
export function withNesting<T>(
  state: ParserState,
  location: SourceLocation,
  fn: () => T
): T {
  increaseNesting(state, location);
  try {
    return fn();
  } finally {
    decreaseNesting(state);
  }
}

// ============================================================
// VALUE ACCESS
// ============================================================

const INTEGER_LEXEME = /^-?\d+$/;

/**
 * Numeric value of a NUMBER token. Integers that a double cannot hold
 * exactly become a bigint.
 */
export function tokenNumber(token: Token): number | bigint {
  const value = Number(token.value);
  if (INTEGER_LEXEME.test(token.value) && !Number.isSafeInteger(value)) {
    return BigInt(token.value);
  }
  if (!Number.isFinite(value)) {
    throw ParseError.create(
      'IDL-P005',
      { value: token.value },
      token.span.start
    );
  }
  return value;
}
