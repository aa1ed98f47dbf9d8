/**
 * Parser Tests: Value Nodes
 * Object, array and scalar literals outside trait parentheses
 */

import { describe, expect, it } from 'vitest';
import {
  ParseError,
  ResourceLimitError,
  nodeToValue,
  parseNodeValue,
} from '../../src/index.js';
import { catchError } from '../helpers/errors.js';

describe('Parser: Value Nodes', () => {
  it('parses nested objects and arrays', () => {
    const node = parseNodeValue('{a: 1, "b": [true, null, "x"]}');
    expect(nodeToValue(node)).toEqual({ a: 1, b: [true, null, 'x'] });
    expect(node.location).toEqual({ line: 1, column: 1, offset: 0 });
  });

  it('locates each member value at its own token', () => {
    const node = parseNodeValue('{\n  a: "x"\n}');
    if (node.type !== 'Object') throw new Error('Expected Object node');
    expect(node.members.get('a')?.location).toEqual({
      line: 2,
      column: 6,
      offset: 7,
    });
  });

  it('ignores trailing commas, comments and doc comments', () => {
    const node = parseNodeValue('[\n  1, // one\n  /// two\n  2,\n]');
    expect(nodeToValue(node)).toEqual([1, 2]);
  });

  it('parses negative and fractional numbers', () => {
    expect(nodeToValue(parseNodeValue('[-1, 2.5, 1e2]'))).toEqual([
      -1, 2.5, 100,
    ]);
  });

  it('keeps integers beyond the safe range exact as bigint', () => {
    const node = parseNodeValue(
      '[9007199254740991, 9007199254740993, -9007199254740993]'
    );
    expect(nodeToValue(node)).toEqual([
      9007199254740991, 9007199254740993n, -9007199254740993n,
    ]);
  });

  it('keeps a __proto__ key as an own member', () => {
    const value = nodeToValue(parseNodeValue('{__proto__: 1, b: 2}'));
    expect(Object.keys(value ?? {})).toEqual(['__proto__', 'b']);
    expect(JSON.stringify(value)).toBe('{"__proto__":1,"b":2}');
  });

  it('keeps shape IDs as strings with the default resolver', () => {
    expect(nodeToValue(parseNodeValue('smithy.api#String'))).toBe(
      'smithy.api#String'
    );
  });

  it('parses empty containers', () => {
    expect(nodeToValue(parseNodeValue('{}'))).toEqual({});
    expect(nodeToValue(parseNodeValue('[]'))).toEqual([]);
  });

  describe('Errors', () => {
    it('rejects duplicate object keys', () => {
      const err = catchError(() => parseNodeValue('{a: 1, a: 2}'), ParseError);
      expect(err.errorId).toBe('IDL-P003');
      expect(err.message).toBe("Duplicate member of object: 'a' at 1:8");
    });

    it('rejects a number that overflows a double', () => {
      const err = catchError(() => parseNodeValue('[1e400]'), ParseError);
      expect(err.errorId).toBe('IDL-P005');
      expect(err.message).toBe('Number out of range: 1e400 at 1:2');
    });

    it('requires a colon after an object key', () => {
      const err = catchError(() => parseNodeValue('{a 1}'), ParseError);
      expect(err.message).toBe("Expected ':' after key 'a' at 1:4");
    });

    it('hints at an unclosed bracket', () => {
      const err = catchError(() => parseNodeValue('[1, 2'), ParseError);
      expect(err.message).toBe(
        "Expected ']'. Hint: Check for unclosed bracket at 1:6"
      );
    });

    it('hints at an unclosed brace', () => {
      const err = catchError(() => parseNodeValue('{a: 1'), ParseError);
      expect(err.message).toBe(
        "Expected one of '}', identifier, string but found end of input. Hint: Check for unclosed brace at 1:6"
      );
    });

    it('rejects trailing tokens after the value', () => {
      const err = catchError(() => parseNodeValue('1 2'), ParseError);
      expect(err.message).toBe(
        "Expected end of input but found number '2' at 1:3"
      );
    });

    it('enforces the nesting limit on arrays', () => {
      const err = catchError(
        () => parseNodeValue('[[[1]]]', { maxNestingDepth: 2 }),
        ResourceLimitError
      );
      expect(err.message).toBe(
        'Parser exceeded maximum allowed depth of 2 at 1:3'
      );
    });
  });
});
