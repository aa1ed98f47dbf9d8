/**
 * Parser Class - Core
 *
 * Defines the Parser class structure. Methods are added via prototype
 * extension from separate modules, using TypeScript declaration merging
 * for type safety.
 */

import { ForwardReferenceCollector } from '../resolver.js';
import type { ReferenceResolver } from '../resolver.js';
import type { Token } from '../token-types.js';
import { DEFAULT_DOCUMENTATION_TRAIT } from '../trait-types.js';
import { type ParserState, createParserState } from './state.js';

export interface ParserOptions {
  /** Resolver for bare identifiers in value position */
  resolver?: ReferenceResolver | undefined;
  /** Maximum nesting of objects, arrays and shorthand trait values */
  maxNestingDepth?: number | undefined;
  /** Trait name given to records synthesized from doc comments */
  documentationTrait?: string | undefined;
}

/** Options for a parser that shares a cursor; its limit is already set */
export type SharedStateParserOptions = Omit<ParserOptions, 'maxNestingDepth'>;

/**
 * Parser over a token stream for the trait sublanguage.
 *
 * Methods are organized across multiple files:
 * - parser-shape-id.ts: shape identifiers
 * - parser-nodes.ts: literal values (objects, arrays, scalars)
 * - parser-traits.ts: doc comments, trait lists, single traits, shorthand
 * - parser-apply.ts: apply statements
 *
 * A parser built over an existing ParserState shares its cursor, so
 * several parsers can take turns consuming one token stream. The nesting
 * limit then comes from that state and `maxNestingDepth` is rejected.
 *
 * @example
 * ```typescript
 * const parser = new Parser(tokenize(source));
 * const traits = parser.parseLeadingTraits();
 * ```
 */
export class Parser {
  /** Token cursor including position, pending docs and nesting depth */
  readonly state: ParserState;
  readonly resolver: ReferenceResolver;
  readonly documentationTrait: string;

  constructor(tokens: readonly Token[], options?: ParserOptions);
  constructor(state: ParserState, options?: SharedStateParserOptions);
  constructor(
    input: readonly Token[] | ParserState,
    options: ParserOptions = {}
  ) {
    if (isParserState(input)) {
      if (options.maxNestingDepth !== undefined) {
        throw new Error(
          'maxNestingDepth cannot be set on a parser over an existing ParserState'
        );
      }
      this.state = input;
    } else {
      this.state = createParserState(input, {
        maxNestingDepth: options.maxNestingDepth,
      });
    }
    this.resolver = options.resolver ?? new ForwardReferenceCollector();
    this.documentationTrait =
      options.documentationTrait ?? DEFAULT_DOCUMENTATION_TRAIT;
  }
}

function isParserState(
  input: readonly Token[] | ParserState
): input is ParserState {
  return !Array.isArray(input);
}
