/**
 * Tests for .newickrc.json loading
 */

import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import {
  CONFIG_FILE_NAME,
  ConfigError,
  createDefaultReaderOptions,
  loadReaderConfig,
  NewickReader,
  parseReaderConfig,
} from '../src/index.js';
import { captureError, readTree } from './helpers/reader.js';

describe('createDefaultReaderOptions', () => {
  it('lists every JSON option at its default', () => {
    expect(createDefaultReaderOptions()).toEqual({
      rooting: undefined,
      edgeLengthType: 'float',
      suppressEdgeLengths: false,
      extractCommentMetadata: true,
      storeTreeWeights: false,
      defaultTreeWeight: 1,
      caseSensitiveTaxonLabels: false,
      preserveUnderscores: false,
      suppressInternalNodeTaxa: true,
      suppressLeafNodeTaxa: false,
      suppressInternalNodeLabels: false,
      suppressLeafNodeLabels: false,
      parseJplaceTokens: false,
      assignInternalLabelsToEdges: false,
      terminatingSemicolonRequired: true,
    });
  });
});

describe('parseReaderConfig', () => {
  it('accepts known options', () => {
    expect(parseReaderConfig({ rooting: 'force-rooted', defaultTreeWeight: 2 })).toEqual({
      rooting: 'force-rooted',
      defaultTreeWeight: 2,
    });
  });

  it('skips undefined values', () => {
    expect(parseReaderConfig({ rooting: undefined })).toEqual({});
  });

  it('rejects unknown keys', () => {
    const error = captureError(() => parseReaderConfig({ bogus: true }));
    expect(error).toBeInstanceOf(ConfigError);
    expect(error.message).toBe('Invalid configuration: unknown option bogus');
  });

  it('rejects an unknown rooting directive', () => {
    const error = captureError(() => parseReaderConfig({ rooting: 'sideways' }));
    expect(error.context).toEqual({
      detail:
        "Unrecognized rooting directive: 'sideways' (must be one of default-unrooted, default-rooted, force-unrooted, force-rooted)",
    });
  });

  it('rejects mistyped values', () => {
    expect(() => parseReaderConfig({ storeTreeWeights: 'yes' })).toThrow(
      'Invalid configuration: storeTreeWeights must be a boolean'
    );
    expect(() => parseReaderConfig({ edgeLengthType: 'double' })).toThrow(
      "Invalid configuration: edgeLengthType must be 'float' or 'int', got 'double'"
    );
    expect(() => parseReaderConfig({ defaultTreeWeight: Number.NaN })).toThrow(
      'Invalid configuration: defaultTreeWeight must be a finite number'
    );
    expect(() => parseReaderConfig([])).toThrow(
      'Invalid configuration: reader options must be an object'
    );
  });
});

describe('loadReaderConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'newickrc-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(content: string): void {
    writeFileSync(join(dir, CONFIG_FILE_NAME), content);
  }

  it('returns null without a config file', () => {
    expect(loadReaderConfig(dir)).toBeNull();
  });

  it('merges file options over the defaults', () => {
    writeConfig(JSON.stringify({ rooting: 'default-rooted', storeTreeWeights: true }));
    const config = loadReaderConfig(dir);
    expect(config).toEqual({
      ...createDefaultReaderOptions(),
      rooting: 'default-rooted',
      storeTreeWeights: true,
    });
  });

  it('configures a reader', () => {
    writeConfig('{"rooting": "default-rooted", "preserveUnderscores": true}');
    const reader = new NewickReader(loadReaderConfig(dir) ?? {});
    const { trees } = reader.readTrees('(Homo_sapiens,B);');
    const tree = trees[0] ?? readTree('();');
    expect(tree.isRooted).toBe(true);
    expect(tree.leafNodes()[0]?.taxon?.label).toBe('Homo_sapiens');
  });

  it('rejects invalid JSON', () => {
    writeConfig('{ rooting: ');
    const error = captureError(() => loadReaderConfig(dir));
    expect(error).toBeInstanceOf(ConfigError);
    expect(error.message.startsWith('Invalid configuration: invalid JSON (')).toBe(true);
  });

  it('rejects a non-object root', () => {
    writeConfig('[]');
    expect(() => loadReaderConfig(dir)).toThrow(ConfigError);
  });

  it('rejects unknown keys', () => {
    writeConfig('{"rooted": true}');
    expect(() => loadReaderConfig(dir)).toThrow('Invalid configuration: unknown option rooted');
  });

  it('rejects conflicting options', () => {
    writeConfig('{"assignInternalLabelsToEdges": true, "suppressInternalNodeTaxa": false}');
    expect(() => loadReaderConfig(dir)).toThrow(ConfigError);
  });
});
