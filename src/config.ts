/**
 * Configuration Loader for idl-traits
 * Loads and validates .idl-traits.yaml configuration files.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import * as yaml from 'yaml';
import { DEFAULT_MAX_NESTING_DEPTH } from './parser/index.js';
import { DEFAULT_DOCUMENTATION_TRAIT } from './trait-types.js';

// ============================================================
// TYPES
// ============================================================

export type OutputFormat = 'text' | 'json';

export interface TraitsConfig {
  readonly maxNestingDepth: number;
  readonly documentationTrait: string;
  readonly format: OutputFormat;
}

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file names, in lookup order */
const CONFIG_FILE_NAMES = ['.idl-traits.yaml', '.idl-traits.yml'] as const;

// ============================================================
// DEFAULT CONFIGURATION
// ============================================================

export function createDefaultConfig(): TraitsConfig {
  return {
    maxNestingDepth: DEFAULT_MAX_NESTING_DEPTH,
    documentationTrait: DEFAULT_DOCUMENTATION_TRAIT,
    format: 'text',
  };
}

// ============================================================
// VALIDATION
// ============================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isOutputFormat(value: unknown): value is OutputFormat {
  return value === 'text' || value === 'json';
}

/**
 * Validate parsed YAML and keep the options it sets.
 * Throws Error if configuration is invalid.
 */
function readConfigData(data: unknown): Partial<TraitsConfig> {
  // yaml.parse returns null for an empty document
  if (data === null || data === undefined) {
    return {};
  }
  if (!isRecord(data)) {
    throw new Error('Invalid configuration: must be a mapping');
  }

  let result: Partial<TraitsConfig> = {};
  for (const [key, value] of Object.entries(data)) {
    switch (key) {
      case 'maxNestingDepth':
        if (
          typeof value !== 'number' ||
          !Number.isInteger(value) ||
          value < 1
        ) {
          throw new Error(
            'Invalid configuration: maxNestingDepth must be a positive integer'
          );
        }
        result = { ...result, maxNestingDepth: value };
        break;
      case 'documentationTrait':
        if (typeof value !== 'string' || value === '') {
          throw new Error(
            'Invalid configuration: documentationTrait must be a non-empty string'
          );
        }
        result = { ...result, documentationTrait: value };
        break;
      case 'format':
        if (!isOutputFormat(value)) {
          throw new Error(
            `Invalid configuration: format "${String(value)}" must be 'text' or 'json'`
          );
        }
        result = { ...result, format: value };
        break;
      default:
        throw new Error(`Invalid configuration: unknown option ${key}`);
    }
  }
  return result;
}

// ============================================================
// CONFIGURATION LOADING
// ============================================================

/**
 * Load configuration from .idl-traits.yaml (or .yml) in `cwd`.
 *
 * @returns Config merged over defaults, or null if no file is found
 * @throws Error with "Invalid configuration: {reason}" if the file is invalid
 */
export function loadConfig(cwd: string): TraitsConfig | null {
  const configPath = CONFIG_FILE_NAMES.map((name) => join(cwd, name)).find(
    (path) => existsSync(path)
  );
  if (configPath === undefined) {
    return null;
  }

  let fileContent: string;
  try {
    fileContent = readFileSync(configPath, 'utf-8');
  } catch (err) {
    throw new Error(
      `Invalid configuration: failed to read file (${err instanceof Error ? err.message : String(err)})`
    );
  }

  let parsedData: unknown;
  try {
    parsedData = yaml.parse(fileContent);
  } catch (err) {
    throw new Error(
      `Invalid configuration: invalid YAML (${err instanceof Error ? err.message : String(err)})`
    );
  }

  return { ...createDefaultConfig(), ...readConfigData(parsedData) };
}
