/**
 * Tokenizer
 * Main tokenization logic
 */

import type { SourceLocation } from '../source-location.js';
import type { Token, TokenType } from '../token-types.js';
import { TOKEN_TYPES } from '../token-types.js';
import { LexerError } from './errors.js';
import { SINGLE_CHAR_OPERATORS, TWO_CHAR_OPERATORS } from './operators.js';
import {
  isDigit,
  isIdentifierStart,
  readComment,
  readIdentifier,
  readNumber,
  readString,
  readTextBlock,
} from './readers.js';
import {
  advance,
  createLexerState,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
  peekString,
  tokenFrom,
} from './state.js';

function skipWhitespace(state: LexerState): void {
  while (peek(state) === ' ' || peek(state) === '\t') {
    advance(state);
  }
}

function readOperator(
  state: LexerState,
  type: TokenType,
  text: string,
  start: SourceLocation
): Token {
  for (let i = 0; i < text.length; i++) advance(state);
  return tokenFrom(state, type, text, start);
}

export function nextToken(state: LexerState): Token {
  skipWhitespace(state);

  if (isAtEnd(state)) {
    return tokenFrom(state, TOKEN_TYPES.EOF, '', currentLocation(state));
  }

  const start = currentLocation(state);
  const ch = peek(state);

  // Newline (\n, \r\n or a lone \r)
  if (ch === '\n' || ch === '\r') {
    if (peekString(state, 2) === '\r\n') advance(state);
    advance(state);
    return tokenFrom(state, TOKEN_TYPES.NEWLINE, '\n', start);
  }

  // Comments and doc comments
  if (peekString(state, 2) === '//') {
    return readComment(state);
  }

  // String (text block checked before quoted string)
  if (ch === '"') {
    if (peekString(state, 3) === '"""') {
      return readTextBlock(state);
    }
    return readString(state);
  }

  // Number (leading minus belongs to the literal)
  if (isDigit(ch) || (ch === '-' && isDigit(peek(state, 1)))) {
    return readNumber(state);
  }

  if (isIdentifierStart(ch)) {
    return readIdentifier(state);
  }

  // Two-character operators (lookup table)
  const twoChar = peekString(state, 2);
  const twoCharType = TWO_CHAR_OPERATORS[twoChar];
  if (twoCharType) {
    return readOperator(state, twoCharType, twoChar, start);
  }

  // Single-character operators (lookup table)
  const singleCharType = SINGLE_CHAR_OPERATORS[ch];
  if (singleCharType) {
    return readOperator(state, singleCharType, ch, start);
  }

  throw LexerError.create('IDL-L002', { char: ch }, start);
}

export interface TokenizeOptions {
  /** Keep `//` COMMENT tokens in the output */
  includeComments?: boolean;
}

export function tokenize(
  source: string,
  baseLocation?: SourceLocation,
  options?: TokenizeOptions
): Token[] {
  const state = createLexerState(source, baseLocation);
  const tokens: Token[] = [];
  let token: Token;

  do {
    token = nextToken(state);
    tokens.push(token);
  } while (token.type !== TOKEN_TYPES.EOF);

  if (options?.includeComments !== true) {
    return tokens.filter((t) => t.type !== TOKEN_TYPES.COMMENT);
  }

  return tokens;
}
