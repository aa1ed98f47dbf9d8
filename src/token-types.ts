import type { SourceSpan } from './source-location.js';

// ============================================================
// TOKEN TYPES
// ============================================================

export const TOKEN_TYPES = {
  // Literals
  STRING: 'STRING',
  TEXT_BLOCK: 'TEXT_BLOCK', // """..."""
  NUMBER: 'NUMBER',

  // Identifiers
  IDENTIFIER: 'IDENTIFIER',

  // Operators
  AT: 'AT', // @
  COLON: 'COLON', // :
  WALRUS: 'WALRUS', // :=
  EQUAL: 'EQUAL', // =
  DOT: 'DOT', // .
  POUND: 'POUND', // #
  DOLLAR: 'DOLLAR', // $
  COMMA: 'COMMA', // , (insignificant)

  // Delimiters
  LPAREN: 'LPAREN', // (
  RPAREN: 'RPAREN', // )
  LBRACE: 'LBRACE', // {
  RBRACE: 'RBRACE', // }
  LBRACKET: 'LBRACKET', // [
  RBRACKET: 'RBRACKET', // ]

  // Special
  NEWLINE: 'NEWLINE',
  COMMENT: 'COMMENT', // //
  DOC_COMMENT: 'DOC_COMMENT', // ///
  EOF: 'EOF',
} as const;

export type TokenType = (typeof TOKEN_TYPES)[keyof typeof TOKEN_TYPES];

export interface Token {
  readonly type: TokenType;
  /**
   * Token text. Strings and text blocks hold their decoded contents,
   * doc comments the line text after the `///` marker.
   */
  readonly value: string;
  readonly span: SourceSpan;
}

/** Tokens with no meaning between significant tokens */
export const INSIGNIFICANT_TOKENS: readonly TokenType[] = [
  TOKEN_TYPES.NEWLINE,
  TOKEN_TYPES.COMMA,
  TOKEN_TYPES.COMMENT,
];
