#!/usr/bin/env node
/**
 * CLI Traits Entry Point
 *
 * Implements argument parsing for idl-traits.
 * Lists the traits applied to each declaration of an IDL model file.
 */

import { existsSync, readFileSync, statSync } from 'node:fs';
import {
  type OutputFormat,
  type TraitsConfig,
  createDefaultConfig,
  isOutputFormat,
  loadConfig,
} from './config.js';
import { formatBlocks, formatError, readVersion } from './cli-shared.js';
import { IdlError } from './error-classes.js';
import { extractTraitBlocks } from './extract.js';

/**
 * Parsed command-line arguments for idl-traits
 */
export type ParsedTraitsArgs =
  | {
      mode: 'extract';
      file: string;
      format?: OutputFormat | undefined;
      maxDepth?: number | undefined;
    }
  | { mode: 'help' }
  | { mode: 'version' };

/** Flags that take a value */
const VALUE_FLAGS = new Set(['--format', '--max-depth']);

const KNOWN_FLAGS = new Set([
  '--help',
  '-h',
  '--version',
  '-v',
  ...VALUE_FLAGS,
]);

function flagValue(argv: string[], flag: string): string | undefined {
  const index = argv.indexOf(flag);
  if (index === -1) return undefined;
  const value = argv[index + 1];
  if (value === undefined || value.startsWith('-')) {
    throw new Error(`${flag} requires an argument`);
  }
  return value;
}

/**
 * Parse command-line arguments for idl-traits
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 * @returns Parsed command object
 */
export function parseTraitsArgs(argv: string[]): ParsedTraitsArgs {
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { mode: 'version' };
  }

  let file: string | undefined;
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;

    if (arg.startsWith('-')) {
      if (!KNOWN_FLAGS.has(arg)) {
        throw new Error(`Unknown option: ${arg}`);
      }
      if (VALUE_FLAGS.has(arg)) i++;
      continue;
    }

    // First positional argument is the file
    if (file === undefined) {
      file = arg;
    } else {
      throw new Error(`Unexpected argument: ${arg}`);
    }
  }

  const formatValue = flagValue(argv, '--format');
  let format: OutputFormat | undefined;
  if (formatValue !== undefined) {
    if (!isOutputFormat(formatValue)) {
      throw new Error(`Invalid format: ${formatValue}. Expected text or json`);
    }
    format = formatValue;
  }

  const depthValue = flagValue(argv, '--max-depth');
  let maxDepth: number | undefined;
  if (depthValue !== undefined) {
    maxDepth = Number(depthValue);
    if (!Number.isInteger(maxDepth) || maxDepth < 1) {
      throw new Error(
        `Invalid --max-depth: ${depthValue}. Expected a positive integer`
      );
    }
  }

  if (file === undefined) {
    throw new Error('Missing file argument');
  }

  return { mode: 'extract', file, format, maxDepth };
}

/** Command-line flags take precedence over the configuration file */
export function resolveSettings(
  args: Extract<ParsedTraitsArgs, { mode: 'extract' }>,
  config: TraitsConfig
): TraitsConfig {
  return {
    ...config,
    format: args.format ?? config.format,
    maxNestingDepth: args.maxDepth ?? config.maxNestingDepth,
  };
}

/**
 * Extract and format the trait blocks of `source`.
 * Lexer, parse and limit errors propagate to the caller.
 */
export function runExtract(source: string, settings: TraitsConfig): string {
  const blocks = extractTraitBlocks(source, {
    maxNestingDepth: settings.maxNestingDepth,
    documentationTrait: settings.documentationTrait,
  });
  return formatBlocks(blocks, settings.format);
}

// ============================================================
// MAIN ENTRY POINT
// ============================================================

const HELP_TEXT = `idl-traits - List trait applications in an IDL model file

Usage: idl-traits [options] <file>

Options:
  --format <fmt>   Output format: text (default) or json
  --max-depth <n>  Maximum nesting depth of trait values (default 64)
  -h, --help       Show this help message
  -v, --version    Show version number

Exit codes:
  0  Success
  1  Lexer, parse or resource limit error
  2  Usage, configuration or file error`;

function readSource(file: string): string {
  if (!existsSync(file)) {
    console.error(`Error: File not found: ${file}`);
    process.exit(2);
  }
  if (statSync(file).isDirectory()) {
    console.error(`Error: Path is a directory: ${file}`);
    process.exit(2);
  }
  return readFileSync(file, 'utf-8');
}

/**
 * Main entry point for idl-traits CLI.
 * Orchestrates argument parsing, configuration, file reading and output.
 */
async function main(): Promise<void> {
  let args: ParsedTraitsArgs;
  let config: TraitsConfig;
  try {
    args = parseTraitsArgs(process.argv.slice(2));
    config = loadConfig(process.cwd()) ?? createDefaultConfig();
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(2);
  }

  if (args.mode === 'help') {
    console.log(HELP_TEXT);
    process.exit(0);
  }

  if (args.mode === 'version') {
    console.log(await readVersion());
    process.exit(0);
  }

  const source = readSource(args.file);

  try {
    console.log(runExtract(source, resolveSettings(args, config)));
    process.exit(0);
  } catch (err) {
    if (err instanceof IdlError) {
      console.error(formatError(err));
      process.exit(1);
    }
    throw err;
  }
}

// Only run main if this is the entry point (not imported)
const shouldRunMain =
  process.env['NODE_ENV'] !== 'test' &&
  !process.env['VITEST'] &&
  !process.env['VITEST_WORKER_ID'];

if (shouldRunMain) {
  main().catch((err: unknown) => {
    console.error(
      `Error: ${err instanceof Error ? formatError(err) : String(err)}`
    );
    process.exit(2);
  });
}
