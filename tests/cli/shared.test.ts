/**
 * Tests for CLI shared formatting
 */

import { describe, expect, it } from 'vitest';
import { formatBlocks, formatError } from '../../src/cli-shared.js';
import {
  LexerError,
  ParseError,
  ResourceLimitError,
  extractTraitBlocks,
  parseTraits,
  tokenize,
} from '../../src/index.js';
import { catchError } from '../helpers/errors.js';

describe('formatError', () => {
  it('formats lexer errors with their line', () => {
    const err = catchError(() => tokenize('\n@since("1.0'), LexerError);
    expect(formatError(err)).toBe(
      'Lexer error at line 2: Unterminated string literal'
    );
  });

  it('formats parse errors with their line', () => {
    const err = catchError(() => parseTraits('@foo(a: 1, a: 2)'), ParseError);
    expect(formatError(err)).toBe(
      "Parse error at line 1: Duplicate member of trait: 'a'"
    );
  });

  it('formats resource limit errors with their line', () => {
    const err = catchError(
      () => parseTraits('@foo(a: {b: 1})', { maxNestingDepth: 1 }),
      ResourceLimitError
    );
    expect(formatError(err)).toBe(
      'Resource limit exceeded at line 1: Parser exceeded maximum allowed depth of 1'
    );
  });

  it('formats missing files', () => {
    const err = Object.assign(new Error('ENOENT: no such file'), {
      code: 'ENOENT',
      path: 'missing.smithy',
    });
    expect(formatError(err)).toBe('File not found: missing.smithy');
  });

  it('passes other messages through', () => {
    expect(formatError(new Error('boom'))).toBe('boom');
  });
});

describe('formatBlocks', () => {
  it('separates text blocks with a blank line', () => {
    const blocks = extractTraitBlocks(
      '/// Docs\nstring A\n\n@since("1.0")\nstring B'
    );
    expect(formatBlocks(blocks, 'text')).toBe(
      [
        'line 2: string A',
        '  @smithy.api#documentation = "Docs"',
        '',
        'line 5: string B',
        '  @since = "1.0"',
      ].join('\n')
    );
  });

  it('writes large integers and __proto__ keys without loss', () => {
    const blocks = extractTraitBlocks(
      '@range(max: 9007199254740993)\nstring A\n\n@foo(__proto__: "x")\nstring B'
    );
    expect(formatBlocks(blocks, 'text')).toBe(
      [
        'line 2: string A',
        '  @range = {"max":"9007199254740993"}',
        '',
        'line 5: string B',
        '  @foo = {"__proto__":"x"}',
      ].join('\n')
    );
  });

  it('writes large integers as exact digit strings in JSON', () => {
    const blocks = extractTraitBlocks('@foo(9007199254740993)\nstring A');
    const output: unknown = JSON.parse(formatBlocks(blocks, 'json'));
    expect(output).toEqual([
      {
        kind: 'declaration',
        declaration: 'string A',
        line: 2,
        traits: [
          { name: 'foo', kind: 'value', line: 1, value: '9007199254740993' },
        ],
      },
    ]);
  });

  it('reports an empty result in text format', () => {
    expect(formatBlocks([], 'text')).toBe('No traits found');
  });

  it('reports an empty result as an empty JSON array', () => {
    expect(formatBlocks([], 'json')).toBe('[]');
  });
});
