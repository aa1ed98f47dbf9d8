/**
 * Token Readers
 * Functions to read specific token types from source
 */

import type { SourceLocation } from '../source-location.js';
import type { Token } from '../token-types.js';
import { TOKEN_TYPES } from '../token-types.js';
import { LexerError } from './errors.js';
import {
  advance,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
  peekString,
  tokenFrom,
} from './state.js';

// ============================================================
// CHARACTER CLASSES
// ============================================================

const DIGIT = /^[0-9]$/;
const HEX_DIGIT = /^[0-9A-Fa-f]$/;
const IDENTIFIER_START = /^[A-Za-z_]$/;
const IDENTIFIER_PART = /^[A-Za-z0-9_]$/;

export function isDigit(ch: string): boolean {
  return DIGIT.test(ch);
}

export function isIdentifierStart(ch: string): boolean {
  return IDENTIFIER_START.test(ch);
}

function isIdentifierChar(ch: string): boolean {
  return IDENTIFIER_PART.test(ch);
}

// ============================================================
// ESCAPES
// ============================================================

const SIMPLE_ESCAPES: Record<string, string> = {
  '"': '"',
  '\\': '\\',
  '/': '/',
  b: '\b',
  f: '\f',
  n: '\n',
  r: '\r',
  t: '\t',
};

/**
 * Decode backslash escapes in already-delimited text.
 * A backslash before a line break joins the lines.
 */
export function processEscapes(text: string, location: SourceLocation): string {
  let result = '';
  let i = 0;

  while (i < text.length) {
    const ch = text.charAt(i);
    if (ch !== '\\') {
      result += ch;
      i++;
      continue;
    }

    const escaped = text.charAt(i + 1);
    const simple = SIMPLE_ESCAPES[escaped];
    if (simple !== undefined) {
      result += simple;
      i += 2;
    } else if (escaped === '\n') {
      i += 2;
    } else if (escaped === 'u') {
      const hex = text.slice(i + 2, i + 6);
      if (hex.length !== 4 || ![...hex].every((digit) => HEX_DIGIT.test(digit))) {
        throw LexerError.create('IDL-L005', { sequence: `u${hex}` }, location);
      }
      result += String.fromCharCode(parseInt(hex, 16));
      i += 6;
    } else {
      throw LexerError.create('IDL-L005', { sequence: escaped }, location);
    }
  }

  return result;
}

function normalizeNewlines(text: string): string {
  return text.replace(/\r\n?/g, '\n');
}

// ============================================================
// STRINGS
// ============================================================

export function readString(state: LexerState): Token {
  const start = currentLocation(state);
  advance(state); // consume opening "

  let raw = '';
  while (peek(state) !== '"') {
    if (isAtEnd(state)) {
      throw LexerError.create('IDL-L001', {}, start);
    }
    if (peek(state) === '\\') {
      raw += advance(state); // keep backslash, decoded below
      if (isAtEnd(state)) {
        throw LexerError.create('IDL-L001', {}, start);
      }
    }
    raw += advance(state);
  }
  advance(state); // consume closing "

  const value = processEscapes(normalizeNewlines(raw), start);
  return tokenFrom(state, TOKEN_TYPES.STRING, value, start);
}

/**
 * Strip incidental indentation from text block content.
 * The line holding the closing delimiter always counts toward the
 * common indentation, even when blank.
 */
export function formatTextBlock(raw: string): string {
  const lines = normalizeNewlines(raw).split('\n');
  const lastIndex = lines.length - 1;

  let minIndent = Infinity;
  lines.forEach((line, index) => {
    const isBlank = line.trim() === '';
    if (isBlank && index !== lastIndex) return;
    const indent = line.length - line.trimStart().length;
    minIndent = Math.min(minIndent, indent);
  });
  if (minIndent === Infinity) minIndent = 0;

  return lines
    .map((line) => (line.trim() === '' ? '' : line.slice(minIndent).trimEnd()))
    .join('\n');
}

export function readTextBlock(state: LexerState): Token {
  const start = currentLocation(state);
  advance(state); // consume first "
  advance(state); // consume second "
  advance(state); // consume third "

  if (peek(state) === '\r' && peek(state, 1) === '\n') {
    advance(state);
  }
  if (peek(state) !== '\n' && peek(state) !== '\r') {
    throw LexerError.create(
      'IDL-L004',
      { reason: 'opening """ must be followed by a newline' },
      start
    );
  }
  advance(state); // consume opening newline

  let raw = '';
  while (peekString(state, 3) !== '"""') {
    if (isAtEnd(state)) {
      throw LexerError.create(
        'IDL-L004',
        { reason: 'missing closing """' },
        start
      );
    }
    if (peek(state) === '\\') {
      raw += advance(state);
      if (isAtEnd(state)) continue;
    }
    raw += advance(state);
  }
  advance(state); // consume first "
  advance(state); // consume second "
  advance(state); // consume third "

  const value = processEscapes(formatTextBlock(raw), start);
  return tokenFrom(state, TOKEN_TYPES.TEXT_BLOCK, value, start);
}

// ============================================================
// NUMBERS
// ============================================================

function readDigits(state: LexerState): string {
  let digits = '';
  while (isDigit(peek(state))) {
    digits += advance(state);
  }
  return digits;
}

/** JSON number grammar: -?(0|[1-9][0-9]*)(\.[0-9]+)?([eE][+-]?[0-9]+)? */
export function readNumber(state: LexerState): Token {
  const start = currentLocation(state);
  let value = '';

  const invalid = (): LexerError =>
    LexerError.create('IDL-L003', { value: value + peek(state) }, start);

  if (peek(state) === '-') {
    value += advance(state);
  }

  if (peek(state) === '0') {
    value += advance(state);
    if (isDigit(peek(state))) throw invalid();
  } else {
    const digits = readDigits(state);
    if (digits === '') throw invalid();
    value += digits;
  }

  if (peek(state) === '.') {
    value += advance(state);
    const fraction = readDigits(state);
    if (fraction === '') throw invalid();
    value += fraction;
  }

  if (peek(state) === 'e' || peek(state) === 'E') {
    value += advance(state);
    if (peek(state) === '+' || peek(state) === '-') {
      value += advance(state);
    }
    const exponent = readDigits(state);
    if (exponent === '') throw invalid();
    value += exponent;
  }

  if (isIdentifierChar(peek(state))) throw invalid();

  return tokenFrom(state, TOKEN_TYPES.NUMBER, value, start);
}

// ============================================================
// IDENTIFIERS AND COMMENTS
// ============================================================

export function readIdentifier(state: LexerState): Token {
  const start = currentLocation(state);
  let value = '';

  while (!isAtEnd(state) && isIdentifierChar(peek(state))) {
    value += advance(state);
  }

  return tokenFrom(state, TOKEN_TYPES.IDENTIFIER, value, start);
}

function readRestOfLine(state: LexerState): string {
  let text = '';
  while (!isAtEnd(state) && peek(state) !== '\n' && peek(state) !== '\r') {
    text += advance(state);
  }
  return text;
}

/**
 * Read `//` comments. A `///` comment is a doc comment whose value is the
 * line text after the marker, minus one leading space.
 */
export function readComment(state: LexerState): Token {
  const start = currentLocation(state);
  advance(state); // consume first /
  advance(state); // consume second /

  if (peek(state) === '/') {
    advance(state);
    if (peek(state) === ' ') advance(state);
    const text = readRestOfLine(state);
    return tokenFrom(state, TOKEN_TYPES.DOC_COMMENT, text, start);
  }

  const text = readRestOfLine(state);
  return tokenFrom(state, TOKEN_TYPES.COMMENT, text, start);
}
