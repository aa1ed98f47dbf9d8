/**
 * Reference Resolver
 * Turns bare identifiers in value position into value nodes, deferring
 * shape references to a later phase that holds the full namespace table.
 */

import type { ValueNode } from './node-types.js';
import { booleanNode, nullNode, stringNode } from './node-types.js';
import type { SourceLocation } from './source-location.js';

// ============================================================
// CONTRACT
// ============================================================

export interface ReferenceResolver {
  /**
   * Resolve an unquoted identifier used as a value.
   * Called with the interned identifier text and its location.
   */
  resolveBareIdentifier(name: string, location: SourceLocation): ValueNode;
}

/** A shape reference captured before the shape it names is known */
export interface ForwardReference {
  readonly name: string;
  readonly location: SourceLocation;
}

export interface ReferenceResolution {
  /** Reference name to absolute shape ID */
  readonly resolved: ReadonlyMap<string, string>;
  readonly unresolved: readonly ForwardReference[];
}

// ============================================================
// KEYWORDS
// ============================================================

const KEYWORDS: Record<string, (location: SourceLocation) => ValueNode> = {
  true: (location) => booleanNode(true, location),
  false: (location) => booleanNode(false, location),
  null: (location) => nullNode(location),
};

/** Returns the keyword node for `name`, or null when it is not a keyword */
function keywordNode(
  name: string,
  location: SourceLocation
): ValueNode | null {
  const create = Object.hasOwn(KEYWORDS, name) ? KEYWORDS[name] : undefined;
  return create ? create(location) : null;
}

// ============================================================
// DEFAULT RESOLVER
// ============================================================

/**
 * Default resolver: keywords become literals, every other identifier
 * becomes a String node holding the name as written and is recorded
 * as a forward reference.
 */
export class ForwardReferenceCollector implements ReferenceResolver {
  private readonly pending: ForwardReference[] = [];

  resolveBareIdentifier(name: string, location: SourceLocation): ValueNode {
    const keyword = keywordNode(name, location);
    if (keyword) return keyword;
    this.pending.push({ name, location });
    return stringNode(name, location);
  }

  /** References recorded so far, in encounter order */
  get references(): readonly ForwardReference[] {
    return this.pending;
  }

  /**
   * Resolve recorded references once all shapes are known.
   * `lookup` maps a name as written to an absolute shape ID, or
   * returns undefined when the name does not resolve.
   */
  resolveReferences(
    lookup: (name: string) => string | undefined
  ): ReferenceResolution {
    const resolved = new Map<string, string>();
    const unresolved: ForwardReference[] = [];

    for (const reference of this.pending) {
      const target = lookup(reference.name);
      if (target === undefined) {
        unresolved.push(reference);
      } else {
        resolved.set(reference.name, target);
      }
    }

    return { resolved, unresolved };
  }
}
