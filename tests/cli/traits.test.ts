/**
 * Tests for idl-traits argument parsing and extraction
 */

import { describe, expect, it } from 'vitest';
import {
  parseTraitsArgs,
  resolveSettings,
  runExtract,
} from '../../src/cli-traits.js';
import { createDefaultConfig } from '../../src/index.js';

describe('parseTraitsArgs', () => {
  describe('help and version modes', () => {
    it('returns help mode when --help or -h is present', () => {
      expect(parseTraitsArgs(['--help'])).toEqual({ mode: 'help' });
      expect(parseTraitsArgs(['model.smithy', '-h'])).toEqual({ mode: 'help' });
    });

    it('returns version mode when --version or -v is present', () => {
      expect(parseTraitsArgs(['--version'])).toEqual({ mode: 'version' });
      expect(parseTraitsArgs(['-v', 'model.smithy'])).toEqual({
        mode: 'version',
      });
    });
  });

  describe('extract mode', () => {
    it('parses a file argument', () => {
      expect(parseTraitsArgs(['model.smithy'])).toEqual({
        mode: 'extract',
        file: 'model.smithy',
        format: undefined,
        maxDepth: undefined,
      });
    });

    it('parses --format and --max-depth in any position', () => {
      expect(
        parseTraitsArgs(['--format', 'json', 'model.smithy', '--max-depth', '8'])
      ).toEqual({
        mode: 'extract',
        file: 'model.smithy',
        format: 'json',
        maxDepth: 8,
      });
    });
  });

  describe('error cases', () => {
    it('throws for an unknown flag', () => {
      expect(() => parseTraitsArgs(['--nope', 'model.smithy'])).toThrow(
        'Unknown option: --nope'
      );
    });

    it('throws when the file is missing', () => {
      expect(() => parseTraitsArgs([])).toThrow('Missing file argument');
    });

    it('throws for a second positional argument', () => {
      expect(() => parseTraitsArgs(['a.smithy', 'b.smithy'])).toThrow(
        'Unexpected argument: b.smithy'
      );
    });

    it('throws for an invalid format', () => {
      expect(() => parseTraitsArgs(['--format', 'xml', 'a.smithy'])).toThrow(
        'Invalid format: xml. Expected text or json'
      );
    });

    it('throws when --format has no value', () => {
      expect(() => parseTraitsArgs(['--format'])).toThrow(
        '--format requires an argument'
      );
    });

    it('throws for a non-positive --max-depth', () => {
      expect(() => parseTraitsArgs(['--max-depth', '0', 'a.smithy'])).toThrow(
        'Invalid --max-depth: 0. Expected a positive integer'
      );
    });
  });
});

describe('resolveSettings', () => {
  it('lets flags override the configuration', () => {
    const settings = resolveSettings(
      { mode: 'extract', file: 'a.smithy', format: 'json', maxDepth: 3 },
      createDefaultConfig()
    );
    expect(settings).toEqual({
      maxNestingDepth: 3,
      documentationTrait: 'smithy.api#documentation',
      format: 'json',
    });
  });

  it('keeps configured values when flags are absent', () => {
    const config = {
      ...createDefaultConfig(),
      maxNestingDepth: 12,
      format: 'json' as const,
    };
    expect(resolveSettings({ mode: 'extract', file: 'a.smithy' }, config)).toEqual(
      config
    );
  });
});

describe('runExtract', () => {
  it('formats blocks as text', () => {
    const output = runExtract(
      '@length(min: 1)\n@sensitive\nstring Name',
      createDefaultConfig()
    );
    expect(output).toBe(
      'line 3: string Name\n  @length = {"min":1}\n  @sensitive'
    );
  });

  it('formats blocks as JSON', () => {
    const output = runExtract('@foo\nstructure A {}', {
      ...createDefaultConfig(),
      format: 'json',
    });
    expect(JSON.parse(output)).toEqual([
      {
        kind: 'declaration',
        declaration: 'structure A {}',
        line: 2,
        traits: [{ name: 'foo', kind: 'annotation', line: 1, value: null }],
      },
    ]);
  });

  it('applies the configured nesting limit', () => {
    expect(() =>
      runExtract('@foo(a: [[1]])\nstring Name', {
        ...createDefaultConfig(),
        maxNestingDepth: 2,
      })
    ).toThrow('Parser exceeded maximum allowed depth of 2 at 1:10');
  });
});
