/**
 * Trait Application Records
 * Pending traits captured before a declaration, not yet resolved
 */

import type { ValueNode } from './node-types.js';
import type { SourceLocation } from './source-location.js';

/** Trait id that doc comments are applied as, unless configured otherwise */
export const DEFAULT_DOCUMENTATION_TRAIT = 'smithy.api#documentation';

/**
 * How a trait was written:
 * - annotation: `@foo` or `@foo()`, value is always Null
 * - value: `@foo(...)`
 * - doc-comment: synthesized from `///` lines
 */
export type TraitKind = 'annotation' | 'value' | 'doc-comment';

export interface TraitApplication {
  /** Trait name as written; may be relative to the current namespace */
  readonly name: string;
  readonly value: ValueNode;
  readonly kind: TraitKind;
  /** Location of the `@` token, or of the first doc-comment marker */
  readonly location: SourceLocation;
}

/** Traits attached by an `apply` statement */
export interface ApplyStatement {
  readonly target: string;
  readonly location: SourceLocation;
  readonly traits: readonly TraitApplication[];
}
