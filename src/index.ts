/**
 * textkit
 * Exports the transcoder, lexer, dynamic strings, formatter and text helpers
 */

export {
  TextkitError,
  TranscodeError,
  LexerError,
  StringError,
  FormatError,
  PathError,
  ConfigError,
  createError,
  type SourceLocation,
  type StringErrorKind,
  type TextkitErrorData,
} from './error-classes.js';
export {
  ERROR_REGISTRY,
  ERROR_ID_PATTERN,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorExample,
  type ErrorRegistry,
  type ErrorSeverity,
} from './error-registry.js';
export * from './unicode/index.js';
export * from './lexer/index.js';
export * from './string/index.js';
export * from './format/index.js';
export * from './path.js';
export * from './ascii.js';
export {
  CONFIG_FILE_NAME,
  createDefaultConfig,
  loadConfig,
  loadConfigFile,
  parseConfig,
  transcodeFlags,
  validateConfig,
  type LexerConfig,
  type TextkitConfig,
  type TranscodeConfig,
} from './config.js';
export { stripComments, type StripCommentsOptions } from './strip-comments.js';
export { explainError } from './cli-explain.js';
