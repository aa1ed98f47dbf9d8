/**
 * Trait Block Extraction
 * Collects the traits of every declaration and apply statement in a document
 */

import { tokenize } from './lexer/index.js';
import { Parser, type ParserOptions } from './parser/index.js';
import {
  advance,
  clearPendingDocs,
  current,
  failExpected,
  isAtEnd,
  peek,
} from './parser/state.js';
import type { SourceLocation } from './source-location.js';
import type { Token } from './token-types.js';
import { TOKEN_TYPES } from './token-types.js';
import type { TraitApplication } from './trait-types.js';

export type TraitBlockKind = 'declaration' | 'apply';

export interface TraitBlock {
  readonly kind: TraitBlockKind;
  /** Source text of the declaration line, e.g. `structure Person` */
  readonly declaration: string;
  readonly location: SourceLocation;
  readonly traits: readonly TraitApplication[];
}

/** Declaration line starting at `token`, without a trailing `{` or `,` */
function declarationText(source: string, token: Token): string {
  const start = token.span.start.offset;
  const newline = source.indexOf('\n', start);
  const end = newline === -1 ? source.length : newline;
  return source
    .slice(start, end)
    .trim()
    .replace(/\s*[{,]$/, '');
}

function isApplyStatement(token: Token, next: Token): boolean {
  return (
    token.type === TOKEN_TYPES.IDENTIFIER &&
    token.value === 'apply' &&
    next.type === TOKEN_TYPES.IDENTIFIER
  );
}

/**
 * Scan a whole document and return one block per declaration that has
 * traits or documentation, plus one per apply statement, in source order.
 * Doc comments never carry over from one declaration to the next.
 *
 * Throws on the first syntax error; no partial result is returned.
 */
export function extractTraitBlocks(
  source: string,
  options: ParserOptions = {}
): TraitBlock[] {
  const parser = new Parser(tokenize(source), options);
  const state = parser.state;
  const blocks: TraitBlock[] = [];

  for (;;) {
    const traits = parser.parseLeadingTraits();

    if (isAtEnd(state)) {
      // A trailing doc comment documents nothing; trailing traits are an error
      if (traits.some((trait) => trait.kind !== 'doc-comment')) {
        failExpected(state, TOKEN_TYPES.IDENTIFIER);
      }
      break;
    }

    const token = current(state);
    if (traits.length === 0 && isApplyStatement(token, peek(state, 1))) {
      const statement = parser.parseApply();
      blocks.push({
        kind: 'apply',
        declaration: `apply ${statement.target}`,
        location: statement.location,
        traits: statement.traits,
      });
      continue;
    }

    if (traits.length > 0) {
      blocks.push({
        kind: 'declaration',
        declaration: declarationText(source, token),
        location: token.span.start,
        traits,
      });
    }

    advance(state);
    clearPendingDocs(state);
  }

  return blocks;
}
