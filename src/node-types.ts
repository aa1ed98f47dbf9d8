/**
 * Value Nodes
 * Located values produced for trait bodies and literal values
 */

import type { SourceLocation } from './source-location.js';

// ============================================================
// VALUE NODES
// ============================================================

export type ValueNodeType =
  | 'Null'
  | 'Boolean'
  | 'String'
  | 'Number'
  | 'Array'
  | 'Object';

interface BaseNode {
  readonly type: ValueNodeType;
  readonly location: SourceLocation;
}

export interface NullNode extends BaseNode {
  readonly type: 'Null';
}

export interface BooleanNode extends BaseNode {
  readonly type: 'Boolean';
  readonly value: boolean;
}

export interface StringNode extends BaseNode {
  readonly type: 'String';
  readonly value: string;
}

/** Integers outside the safe range are kept exactly as a bigint */
export interface NumberNode extends BaseNode {
  readonly type: 'Number';
  readonly value: number | bigint;
}

export interface ArrayNode extends BaseNode {
  readonly type: 'Array';
  readonly elements: readonly ValueNode[];
}

/** Object members keep insertion order; keys are unique */
export interface ObjectNode extends BaseNode {
  readonly type: 'Object';
  readonly members: ReadonlyMap<string, ValueNode>;
}

export type ValueNode =
  | NullNode
  | BooleanNode
  | StringNode
  | NumberNode
  | ArrayNode
  | ObjectNode;

// ============================================================
// CONSTRUCTORS
// ============================================================

export function nullNode(location: SourceLocation): NullNode {
  return { type: 'Null', location };
}

export function booleanNode(
  value: boolean,
  location: SourceLocation
): BooleanNode {
  return { type: 'Boolean', value, location };
}

export function stringNode(value: string, location: SourceLocation): StringNode {
  return { type: 'String', value, location };
}

export function numberNode(
  value: number | bigint,
  location: SourceLocation
): NumberNode {
  return { type: 'Number', value, location };
}

export function arrayNode(
  elements: readonly ValueNode[],
  location: SourceLocation
): ArrayNode {
  return { type: 'Array', elements, location };
}

export function objectNode(
  members: ReadonlyMap<string, ValueNode>,
  location: SourceLocation
): ObjectNode {
  return { type: 'Object', members, location };
}

/** Return a copy of a node reported at a different location */
export function relocate(node: ValueNode, location: SourceLocation): ValueNode {
  return { ...node, location };
}

// ============================================================
// CONVERSION
// ============================================================

/** Plain data for a value node */
export type NodeValue =
  | null
  | boolean
  | string
  | number
  | bigint
  | NodeValue[]
  | { [key: string]: NodeValue };

/**
 * Convert a value node to plain data, dropping locations.
 * Object keys keep their insertion order.
 */
export function nodeToValue(node: ValueNode): NodeValue {
  switch (node.type) {
    case 'Null':
      return null;
    case 'Boolean':
    case 'String':
    case 'Number':
      return node.value;
    case 'Array':
      return node.elements.map(nodeToValue);
    case 'Object':
      // fromEntries defines own properties, so `__proto__` stays a key
      return Object.fromEntries(
        Array.from(
          node.members,
          ([key, member]) => [key, nodeToValue(member)] as const
        )
      );
  }
}
