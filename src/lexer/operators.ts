/**
 * Operator Lookup Tables
 */

import type { TokenType } from '../token-types.js';
import { TOKEN_TYPES } from '../token-types.js';

/** Two-character operator lookup table */
export const TWO_CHAR_OPERATORS: Record<string, TokenType> = {
  ':=': TOKEN_TYPES.WALRUS,
};

/** Single-character operator lookup table */
export const SINGLE_CHAR_OPERATORS: Record<string, TokenType> = {
  '@': TOKEN_TYPES.AT,
  ':': TOKEN_TYPES.COLON,
  '=': TOKEN_TYPES.EQUAL,
  '.': TOKEN_TYPES.DOT,
  '#': TOKEN_TYPES.POUND,
  $: TOKEN_TYPES.DOLLAR,
  ',': TOKEN_TYPES.COMMA,
  '(': TOKEN_TYPES.LPAREN,
  ')': TOKEN_TYPES.RPAREN,
  '{': TOKEN_TYPES.LBRACE,
  '}': TOKEN_TYPES.RBRACE,
  '[': TOKEN_TYPES.LBRACKET,
  ']': TOKEN_TYPES.RBRACKET,
};
