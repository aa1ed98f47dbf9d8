/**
 * Parser Tests: Shorthand Trait Objects
 * key: value lists without braces, duplicate keys, resolver use
 */

import { describe, expect, it } from 'vitest';
import {
  ParseError,
  type ReferenceResolver,
  type SourceLocation,
  type ValueNode,
  nodeToValue,
  parseTraits,
} from '../../src/index.js';
import { catchError } from '../helpers/errors.js';

function objectMembers(node: ValueNode | undefined): ReadonlyMap<string, ValueNode> {
  if (node?.type !== 'Object') {
    throw new Error(`Expected Object node, got ${node?.type ?? 'nothing'}`);
  }
  return node.members;
}

/** Resolver that answers every identifier with the same sentinel node */
class SentinelResolver implements ReferenceResolver {
  readonly calls: Array<{ name: string; location: SourceLocation }> = [];

  constructor(readonly sentinel: ValueNode) {}

  resolveBareIdentifier(name: string, location: SourceLocation): ValueNode {
    this.calls.push({ name, location });
    return this.sentinel;
  }
}

describe('Parser: Shorthand Trait Objects', () => {
  it('keeps member values exact through nodeToValue', () => {
    const [trait] = parseTraits('@range(max: 9007199254740993, __proto__: 1)');
    const value = trait ? nodeToValue(trait.value) : null;
    expect(Object.entries(value ?? {})).toEqual([
      ['max', 9007199254740993n],
      ['__proto__', 1],
    ]);
  });

  it('preserves key order and values', () => {
    const [trait] = parseTraits('@foo(a: 1, b: 2)');
    const members = objectMembers(trait?.value);
    expect([...members.keys()]).toEqual(['a', 'b']);
    expect([...members.values()].map(nodeToValue)).toEqual([1, 2]);
    expect(trait?.kind).toBe('value');
  });

  it('locates the object at its first key', () => {
    const [trait] = parseTraits('@foo(a: 1, b: 2)');
    expect(trait?.value.location).toEqual({ line: 1, column: 6, offset: 5 });
    expect(trait?.location).toEqual({ line: 1, column: 1, offset: 0 });
  });

  it('accepts quoted keys', () => {
    const [trait] = parseTraits('@foo("a": 1, "b c": true)');
    expect(trait && nodeToValue(trait.value)).toEqual({ a: 1, 'b c': true });
    expect(trait?.value.location).toEqual({ line: 1, column: 6, offset: 5 });
  });

  it('accepts nested literal values and members across lines', () => {
    const source = '@http(\n  method: "PUT",\n  uri: "/items",\n  codes: [200, 201]\n)';
    const [trait] = parseTraits(source);
    expect(trait && nodeToValue(trait.value)).toEqual({
      method: 'PUT',
      uri: '/items',
      codes: [200, 201],
    });
    expect(trait?.value.location).toEqual({ line: 2, column: 3, offset: 9 });
  });

  describe('Duplicate Keys', () => {
    it('fails at the repeated key', () => {
      const err = catchError(() => parseTraits('@foo(a: 1, a: 2)'), ParseError);
      expect(err.errorId).toBe('IDL-P003');
      expect(err.message).toBe("Duplicate member of trait: 'a' at 1:12");
      expect(err.location).toEqual({ line: 1, column: 12, offset: 11 });
      expect(err.context).toEqual({ container: 'trait', key: 'a' });
    });

    it('treats a quoted key equal to an identifier key as a duplicate', () => {
      const err = catchError(() => parseTraits('@foo(a: 1, "a": 2)'), ParseError);
      expect(err.message).toBe("Duplicate member of trait: 'a' at 1:12");
    });
  });

  describe('Reference Resolution', () => {
    it('resolves a bare identifier value through the resolver', () => {
      const sentinel: ValueNode = {
        type: 'String',
        value: 'resolved-sentinel',
        location: { line: 9, column: 9, offset: 99 },
      };
      const resolver = new SentinelResolver(sentinel);
      const [trait] = parseTraits('@foo(bar: baz)', { resolver });

      expect(objectMembers(trait?.value).get('bar')).toBe(sentinel);
      expect(resolver.calls).toEqual([
        { name: 'baz', location: { line: 1, column: 11, offset: 10 } },
      ]);
    });

    it('never sends shorthand keys to the resolver', () => {
      const resolver = new SentinelResolver({
        type: 'Null',
        location: { line: 1, column: 1, offset: 0 },
      });
      parseTraits('@foo(a: 1, b: "x")', { resolver });
      expect(resolver.calls).toEqual([]);
    });

    it('resolves a whole-value identifier at the trait location', () => {
      const resolver = new SentinelResolver({
        type: 'Null',
        location: { line: 1, column: 1, offset: 0 },
      });
      parseTraits('@enumValue(ACTIVE)', { resolver });
      expect(resolver.calls).toEqual([
        { name: 'ACTIVE', location: { line: 1, column: 1, offset: 0 } },
      ]);
    });
  });

  describe('Errors', () => {
    it('requires a colon after each key', () => {
      const err = catchError(() => parseTraits('@foo(a: 1, b 2)'), ParseError);
      expect(err.message).toBe("Expected ':' after trait member 'b' at 1:14");
    });

    it('reports acceptable tokens and a hint at end of input', () => {
      const err = catchError(() => parseTraits('@foo(a: 1'), ParseError);
      expect(err.errorId).toBe('IDL-P001');
      expect(err.message).toBe(
        "Expected one of ')', identifier, string but found end of input. Hint: Check for unclosed parenthesis at 1:10"
      );
    });

    it('rejects a number where a key is expected', () => {
      const err = catchError(() => parseTraits('@foo(a: 1, 2: 3)'), ParseError);
      expect(err.message).toBe(
        "Expected one of ')', identifier, string but found number '2' at 1:12"
      );
    });
  });
});
