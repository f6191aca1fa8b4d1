/**
 * Configuration Tests
 * YAML parsing, validation and directory lookup
 */

import { describe, expect, it, beforeAll, afterAll } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { ConfigError } from '../src/error-classes.js';
import {
  CONFIG_FILE_NAME,
  createDefaultConfig,
  loadConfig,
  loadConfigFile,
  parseConfig,
  transcodeFlags,
} from '../src/config.js';
import { TRANSCODE_FLAGS } from '../src/unicode/types.js';

describe('parseConfig', () => {
  it('returns defaults for an empty document', () => {
    expect(parseConfig('')).toEqual(createDefaultConfig());
    expect(parseConfig('# only a comment\n')).toEqual(createDefaultConfig());
  });

  it('merges given keys over the defaults', () => {
    const config = parseConfig(
      'lexer:\n  skipWhitespace: true\n  lineCommentOpener: "#"\nformat:\n  thousandsSeparator: "_"\n'
    );
    expect(config.lexer.skipWhitespace).toBe(true);
    expect(config.lexer.skipNewlines).toBe(false);
    expect(config.lexer.lineCommentOpener).toBe('#');
    expect(config.lexer.blockCommentOpener).toBe('/*');
    expect(config.format).toEqual({ thousandsSeparator: '_', decimalSeparator: '.' });
    expect(config.transcode).toEqual({ forbidBom: false, errorOnInvalidCodePoint: false });
  });

  it.each([
    ['output:\n  color: true\n', 'Invalid configuration: unknown section output'],
    ['lexer:\n  skipTabs: true\n', 'Invalid configuration: unknown key lexer.skipTabs'],
    ['transcode:\n  forbidBom: "yes"\n', 'Invalid configuration: transcode.forbidBom must be a boolean'],
    [
      'format:\n  thousandsSeparator: ",,"\n',
      'Invalid configuration: format.thousandsSeparator must be a single character',
    ],
    [
      'lexer:\n  blockCommentCloser: ""\n',
      'Invalid configuration: lexer.blockCommentCloser must be a non-empty string',
    ],
    ['lexer: 5\n', 'Invalid configuration: lexer must be a mapping'],
    ['- lexer\n', 'Invalid configuration: configuration must be a mapping'],
  ])('rejects %j', (content, message) => {
    expect(() => parseConfig(content)).toThrow(ConfigError);
    expect(() => parseConfig(content)).toThrow(message);
  });

  it('throws TEXT-C001 for malformed YAML', () => {
    let caught: unknown;
    try {
      parseConfig('lexer: [', 'custom.yaml');
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    if (caught instanceof ConfigError) {
      expect(caught.errorId).toBe('TEXT-C001');
      expect(caught.message.startsWith('Failed to parse custom.yaml: ')).toBe(true);
    }
  });
});

describe('loadConfig', () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'textkit-config-'));
  });

  afterAll(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('returns defaults when the directory has no configuration', async () => {
    const empty = await fs.mkdtemp(path.join(tempDir, 'empty-'));
    expect(loadConfig(empty)).toEqual(createDefaultConfig());
  });

  it('reads the configuration file from the directory', async () => {
    await fs.writeFile(
      path.join(tempDir, CONFIG_FILE_NAME),
      'transcode:\n  forbidBom: true\n',
      'utf-8'
    );
    expect(loadConfig(tempDir).transcode.forbidBom).toBe(true);
  });

  it('throws TEXT-C001 for a missing explicit file', () => {
    const missing = path.join(tempDir, 'missing.yaml');
    expect(() => loadConfigFile(missing)).toThrow(`Failed to parse ${missing}: `);
  });
});

describe('transcodeFlags', () => {
  it('maps each option to its flag bit', () => {
    expect(transcodeFlags({ forbidBom: false, errorOnInvalidCodePoint: false })).toBe(0);
    expect(transcodeFlags({ forbidBom: true, errorOnInvalidCodePoint: true })).toBe(
      TRANSCODE_FLAGS.FORBID_BOM | TRANSCODE_FLAGS.ERROR_ON_INVALID_CODE_POINT
    );
  });
});
