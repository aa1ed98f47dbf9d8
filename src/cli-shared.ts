/**
 * CLI Shared Utilities
 * Common formatting functions for CLI tools
 */

import { readFile } from 'node:fs/promises';
import type { OutputFormat } from './config.js';
import { ParseError, ResourceLimitError } from './error-classes.js';
import type { TraitBlock } from './extract.js';
import { LexerError } from './lexer/errors.js';
import { type NodeValue, nodeToValue } from './node-types.js';
import type { TraitApplication } from './trait-types.js';

function stripLocation(message: string): string {
  return message.replace(/ at \d+:\d+$/, '');
}

/**
 * Format error for stderr output
 *
 * @param err - The error to format
 * @returns Formatted error message
 */
export function formatError(err: Error): string {
  if (err instanceof LexerError) {
    return `Lexer error at line ${err.location.line}: ${stripLocation(err.message)}`;
  }

  if (err instanceof ResourceLimitError) {
    return `Resource limit exceeded at line ${err.location.line}: ${stripLocation(err.message)}`;
  }

  if (err instanceof ParseError) {
    return `Parse error at line ${err.location.line}: ${stripLocation(err.message)}`;
  }

  // Handle file not found errors (ENOENT)
  if ('code' in err && err.code === 'ENOENT' && 'path' in err) {
    return `File not found: ${String(err.path)}`;
  }

  return err.message;
}

// ============================================================
// TRAIT BLOCK FORMATTING
// ============================================================

interface TraitJson {
  name: string;
  kind: TraitApplication['kind'];
  line: number;
  value: NodeValue;
}

interface TraitBlockJson {
  kind: TraitBlock['kind'];
  declaration: string;
  line: number;
  traits: TraitJson[];
}

/** JSON text where bigint integers are written as their exact digits in a string */
function stringifyValue(value: unknown, indent?: number): string {
  return JSON.stringify(
    value,
    (_key, member: unknown) =>
      typeof member === 'bigint' ? member.toString() : member,
    indent
  );
}

function traitToJson(trait: TraitApplication): TraitJson {
  return {
    name: trait.name,
    kind: trait.kind,
    line: trait.location.line,
    value: nodeToValue(trait.value),
  };
}

/**
 * One line per trait:
 *   @name                 (annotation)
 *   @name = <json value>  (value, doc-comment)
 */
function formatTraitText(trait: TraitApplication): string {
  if (trait.kind === 'annotation') {
    return `  @${trait.name}`;
  }
  return `  @${trait.name} = ${stringifyValue(nodeToValue(trait.value))}`;
}

/**
 * Format extracted trait blocks for stdout
 *
 * Text format: `line N: declaration` followed by indented traits,
 * blocks separated by a blank line.
 * JSON format: array of blocks with plain trait values.
 */
export function formatBlocks(
  blocks: readonly TraitBlock[],
  format: OutputFormat
): string {
  if (format === 'json') {
    const output: TraitBlockJson[] = blocks.map((block) => ({
      kind: block.kind,
      declaration: block.declaration,
      line: block.location.line,
      traits: block.traits.map(traitToJson),
    }));
    return stringifyValue(output, 2);
  }

  if (blocks.length === 0) {
    return 'No traits found';
  }

  return blocks
    .map((block) =>
      [
        `line ${block.location.line}: ${block.declaration}`,
        ...block.traits.map(formatTraitText),
      ].join('\n')
    )
    .join('\n\n');
}

// ============================================================
// VERSION
// ============================================================

/**
 * Read the package version from package.json beside the sources
 * (src/ under the test runner, dist/ once built).
 */
export async function readVersion(): Promise<string> {
  const content = await readFile(
    new URL('../package.json', import.meta.url),
    'utf-8'
  );
  const pkg: unknown = JSON.parse(content);
  if (
    typeof pkg === 'object' &&
    pkg !== null &&
    'version' in pkg &&
    typeof pkg.version === 'string'
  ) {
    return pkg.version;
  }
  throw new Error('package.json has no version');
}
