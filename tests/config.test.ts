/**
 * Configuration Loader Tests
 * Tests for .idl-traits.yaml loading and validation.
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { existsSync, mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { createDefaultConfig, loadConfig } from '../src/index.js';

// ============================================================
// TEST FIXTURES
// ============================================================

const TEST_DIR = join(process.cwd(), 'tests', 'fixtures', 'traits-config');

function writeConfig(content: string, fileName = '.idl-traits.yaml'): void {
  mkdirSync(TEST_DIR, { recursive: true });
  writeFileSync(join(TEST_DIR, fileName), content, 'utf-8');
}

function cleanupTestConfig(): void {
  if (existsSync(TEST_DIR)) {
    rmSync(TEST_DIR, { recursive: true, force: true });
  }
}

// ============================================================
// DEFAULT CONFIGURATION
// ============================================================

describe('createDefaultConfig', () => {
  it('returns the parser defaults and text output', () => {
    expect(createDefaultConfig()).toEqual({
      maxNestingDepth: 64,
      documentationTrait: 'smithy.api#documentation',
      format: 'text',
    });
  });
});

// ============================================================
// LOADING
// ============================================================

describe('loadConfig', () => {
  beforeEach(() => {
    cleanupTestConfig();
  });

  afterEach(() => {
    cleanupTestConfig();
  });

  it('returns null when config file does not exist', () => {
    expect(loadConfig(TEST_DIR)).toBeNull();
  });

  it('merges file options over defaults', () => {
    writeConfig('maxNestingDepth: 16\nformat: json\n');
    expect(loadConfig(TEST_DIR)).toEqual({
      maxNestingDepth: 16,
      documentationTrait: 'smithy.api#documentation',
      format: 'json',
    });
  });

  it('treats an empty file as defaults', () => {
    writeConfig('');
    expect(loadConfig(TEST_DIR)).toEqual(createDefaultConfig());
  });

  it('reads the .yml extension', () => {
    writeConfig('documentationTrait: documentation\n', '.idl-traits.yml');
    expect(loadConfig(TEST_DIR)?.documentationTrait).toBe('documentation');
  });

  it('prefers .idl-traits.yaml over .idl-traits.yml', () => {
    writeConfig('maxNestingDepth: 8\n');
    writeConfig('maxNestingDepth: 4\n', '.idl-traits.yml');
    expect(loadConfig(TEST_DIR)?.maxNestingDepth).toBe(8);
  });

  describe('validation', () => {
    it('rejects a non-positive maxNestingDepth', () => {
      writeConfig('maxNestingDepth: 0\n');
      expect(() => loadConfig(TEST_DIR)).toThrow(
        'Invalid configuration: maxNestingDepth must be a positive integer'
      );
    });

    it('rejects a fractional maxNestingDepth', () => {
      writeConfig('maxNestingDepth: 2.5\n');
      expect(() => loadConfig(TEST_DIR)).toThrow(
        'Invalid configuration: maxNestingDepth must be a positive integer'
      );
    });

    it('rejects an empty documentationTrait', () => {
      writeConfig('documentationTrait: ""\n');
      expect(() => loadConfig(TEST_DIR)).toThrow(
        'Invalid configuration: documentationTrait must be a non-empty string'
      );
    });

    it('rejects an unknown format', () => {
      writeConfig('format: xml\n');
      expect(() => loadConfig(TEST_DIR)).toThrow(
        `Invalid configuration: format "xml" must be 'text' or 'json'`
      );
    });

    it('rejects unknown options', () => {
      writeConfig('colour: red\n');
      expect(() => loadConfig(TEST_DIR)).toThrow(
        'Invalid configuration: unknown option colour'
      );
    });

    it('rejects a top-level list', () => {
      writeConfig('- a\n- b\n');
      expect(() => loadConfig(TEST_DIR)).toThrow(
        'Invalid configuration: must be a mapping'
      );
    });

    it('rejects malformed YAML', () => {
      writeConfig('maxNestingDepth: [1, 2\n');
      expect(() => loadConfig(TEST_DIR)).toThrow(
        /^Invalid configuration: invalid YAML/
      );
    });
  });
});
