/**
 * Configuration Loader
 * Loads and validates textkit.config.yaml files.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import * as yaml from 'yaml';
import { ConfigError } from './error-classes.js';
import { DEFAULT_FORMAT_CONFIG, type FormatConfig } from './format/types.js';
import { DEFAULT_LEXER_OPTIONS } from './lexer/state.js';
import { TRANSCODE_FLAGS } from './unicode/types.js';

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file name */
export const CONFIG_FILE_NAME = 'textkit.config.yaml';

// ============================================================
// TYPES
// ============================================================

export interface LexerConfig {
  readonly skipWhitespace: boolean;
  readonly skipNewlines: boolean;
  readonly skipComments: boolean;
  readonly allowDashesInIdentifiers: boolean;
  readonly lineCommentOpener: string;
  readonly blockCommentOpener: string;
  readonly blockCommentCloser: string;
}

export interface TranscodeConfig {
  readonly forbidBom: boolean;
  readonly errorOnInvalidCodePoint: boolean;
}

export interface TextkitConfig {
  readonly lexer: LexerConfig;
  readonly format: FormatConfig;
  readonly transcode: TranscodeConfig;
}

type Section = Record<string, unknown>;

/** Value rules per key: flags, non-empty markers, one-character separators */
type FieldKind = 'boolean' | 'marker' | 'separator';

const SECTION_FIELDS: Readonly<Record<keyof TextkitConfig, Readonly<Record<string, FieldKind>>>> = {
  lexer: {
    skipWhitespace: 'boolean',
    skipNewlines: 'boolean',
    skipComments: 'boolean',
    allowDashesInIdentifiers: 'boolean',
    lineCommentOpener: 'marker',
    blockCommentOpener: 'marker',
    blockCommentCloser: 'marker',
  },
  format: {
    thousandsSeparator: 'separator',
    decimalSeparator: 'separator',
  },
  transcode: {
    forbidBom: 'boolean',
    errorOnInvalidCodePoint: 'boolean',
  },
};

// ============================================================
// DEFAULT CONFIGURATION
// ============================================================

/** Built-in defaults used when no configuration file exists */
export function createDefaultConfig(): TextkitConfig {
  return {
    lexer: { ...DEFAULT_LEXER_OPTIONS },
    format: { ...DEFAULT_FORMAT_CONFIG },
    transcode: { forbidBom: false, errorOnInvalidCodePoint: false },
  };
}

/** Transcoder flag bits for a transcode section */
export function transcodeFlags(config: TranscodeConfig): number {
  let flags = TRANSCODE_FLAGS.NONE;
  if (config.forbidBom) flags |= TRANSCODE_FLAGS.FORBID_BOM;
  if (config.errorOnInvalidCodePoint) flags |= TRANSCODE_FLAGS.ERROR_ON_INVALID_CODE_POINT;
  return flags;
}

// ============================================================
// VALIDATION
// ============================================================

function isSection(value: unknown): value is Section {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isSectionName(name: string): name is keyof TextkitConfig {
  return Object.hasOwn(SECTION_FIELDS, name);
}

function checkField(section: string, key: string, kind: FieldKind, value: unknown): void {
  const where = `${section}.${key}`;
  switch (kind) {
    case 'boolean':
      if (typeof value !== 'boolean') {
        throw new ConfigError('TEXT-C002', { details: `${where} must be a boolean` });
      }
      return;
    case 'marker':
      if (typeof value !== 'string' || value.length === 0) {
        throw new ConfigError('TEXT-C002', { details: `${where} must be a non-empty string` });
      }
      return;
    case 'separator':
      if (typeof value !== 'string' || value.length !== 1) {
        throw new ConfigError('TEXT-C002', { details: `${where} must be a single character` });
      }
      return;
  }
}

/**
 * Validate configuration structure and values.
 * Throws ConfigError (TEXT-C002) on unknown keys or wrong types.
 */
export function validateConfig(
  data: unknown
): asserts data is Partial<Record<keyof TextkitConfig, Section>> {
  if (!isSection(data)) {
    throw new ConfigError('TEXT-C002', { details: 'configuration must be a mapping' });
  }

  for (const [name, section] of Object.entries(data)) {
    if (!isSectionName(name)) {
      throw new ConfigError('TEXT-C002', { details: `unknown section ${name}` });
    }
    if (!isSection(section)) {
      throw new ConfigError('TEXT-C002', { details: `${name} must be a mapping` });
    }

    const fields = SECTION_FIELDS[name];
    for (const [key, value] of Object.entries(section)) {
      const kind = fields[key];
      if (!kind) {
        throw new ConfigError('TEXT-C002', { details: `unknown key ${name}.${key}` });
      }
      checkField(name, key, kind, value);
    }
  }
}

// ============================================================
// MERGING
// ============================================================

function pickBoolean(section: Section | undefined, key: string, fallback: boolean): boolean {
  const value = section?.[key];
  return typeof value === 'boolean' ? value : fallback;
}

function pickString(section: Section | undefined, key: string, fallback: string): string {
  const value = section?.[key];
  return typeof value === 'string' ? value : fallback;
}

function mergeConfig(data: Partial<Record<keyof TextkitConfig, Section>>): TextkitConfig {
  const defaults = createDefaultConfig();
  const { lexer, format, transcode } = data;
  return {
    lexer: {
      skipWhitespace: pickBoolean(lexer, 'skipWhitespace', defaults.lexer.skipWhitespace),
      skipNewlines: pickBoolean(lexer, 'skipNewlines', defaults.lexer.skipNewlines),
      skipComments: pickBoolean(lexer, 'skipComments', defaults.lexer.skipComments),
      allowDashesInIdentifiers: pickBoolean(
        lexer,
        'allowDashesInIdentifiers',
        defaults.lexer.allowDashesInIdentifiers
      ),
      lineCommentOpener: pickString(lexer, 'lineCommentOpener', defaults.lexer.lineCommentOpener),
      blockCommentOpener: pickString(lexer, 'blockCommentOpener', defaults.lexer.blockCommentOpener),
      blockCommentCloser: pickString(lexer, 'blockCommentCloser', defaults.lexer.blockCommentCloser),
    },
    format: {
      thousandsSeparator: pickString(format, 'thousandsSeparator', defaults.format.thousandsSeparator),
      decimalSeparator: pickString(format, 'decimalSeparator', defaults.format.decimalSeparator),
    },
    transcode: {
      forbidBom: pickBoolean(transcode, 'forbidBom', defaults.transcode.forbidBom),
      errorOnInvalidCodePoint: pickBoolean(
        transcode,
        'errorOnInvalidCodePoint',
        defaults.transcode.errorOnInvalidCodePoint
      ),
    },
  };
}

// ============================================================
// CONFIGURATION LOADING
// ============================================================

/**
 * Parse and validate YAML configuration text.
 *
 * @param file - Name used in error messages
 * @throws ConfigError (TEXT-C001) if the YAML does not parse
 * @throws ConfigError (TEXT-C002) if the structure is invalid
 */
export function parseConfig(content: string, file = CONFIG_FILE_NAME): TextkitConfig {
  let parsedData: unknown;
  try {
    parsedData = yaml.parse(content);
  } catch (err) {
    throw new ConfigError('TEXT-C001', {
      file,
      details: err instanceof Error ? err.message : String(err),
    });
  }

  // an empty document parses to null
  const data = parsedData ?? {};
  validateConfig(data);
  return mergeConfig(data);
}

/**
 * Load configuration from a file path.
 *
 * @throws ConfigError (TEXT-C001) if the file cannot be read or parsed
 * @throws ConfigError (TEXT-C002) if the structure is invalid
 */
export function loadConfigFile(configPath: string): TextkitConfig {
  let fileContent: string;
  try {
    fileContent = readFileSync(configPath, 'utf-8');
  } catch (err) {
    throw new ConfigError('TEXT-C001', {
      file: configPath,
      details: err instanceof Error ? err.message : String(err),
    });
  }
  return parseConfig(fileContent, configPath);
}

/**
 * Load textkit.config.yaml from the specified directory.
 *
 * @param cwd - Directory to search for the configuration file
 * @returns The merged configuration, or the defaults if the file is absent
 */
export function loadConfig(cwd: string): TextkitConfig {
  const configPath = join(cwd, CONFIG_FILE_NAME);
  if (!existsSync(configPath)) {
    return createDefaultConfig();
  }
  return loadConfigFile(configPath);
}
