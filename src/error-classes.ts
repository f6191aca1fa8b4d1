/**
 * Error Classes and Factory
 * Structured error types with registry-based error codes
 */

import {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
} from './error-registry.js';

// ============================================================
// SOURCE LOCATION
// ============================================================

/** Position inside a lexed text */
export interface SourceLocation {
  /** 1-based line number */
  readonly line: number;
  /** 0-based byte offset into the UTF-8 source */
  readonly offset: number;
}

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface TextkitErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

const LOCATION_SUFFIX = / at line \d+$/;

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all textkit errors.
 * Provides structured data for host applications to format as needed.
 */
export class TextkitError extends Error {
  readonly errorId: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: TextkitErrorData) {
    if (!data.errorId) {
      throw new TypeError('errorId is required');
    }

    if (!ERROR_REGISTRY.has(data.errorId)) {
      throw new TypeError(`Unknown error ID: ${data.errorId}`);
    }

    const locationStr = data.location ? ` at line ${data.location.line}` : '';
    super(`${data.message}${locationStr}`);
    this.name = 'TextkitError';
    this.errorId = data.errorId;
    this.location = data.location;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): TextkitErrorData {
    return {
      errorId: this.errorId,
      message: this.message.replace(LOCATION_SUFFIX, ''),
      location: this.location,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: TextkitErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

/**
 * Validate that errorId exists and belongs to the expected category.
 * Throws TypeError otherwise.
 */
function assertCategory(errorId: string, category: ErrorCategory): void {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  if (definition.category !== category) {
    throw new TypeError(`Expected ${category} error ID, got: ${errorId}`);
  }
}

/**
 * Render the registry template for errorId.
 * Throws TypeError if errorId is not registered.
 */
function messageFor(errorId: string, context: Record<string, unknown>): string {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  return renderMessage(definition.messageTemplate, context);
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

/** Failed transcoder conversions surfaced by the convenience wrappers */
export class TranscodeError extends TextkitError {
  constructor(errorId: string, context: Record<string, unknown>) {
    assertCategory(errorId, 'transcode');
    super({ errorId, message: messageFor(errorId, context), context });
    this.name = 'TranscodeError';
  }
}

export class LexerError extends TextkitError {
  // Lexer errors always have a location
  override readonly location: SourceLocation;

  constructor(
    errorId: string,
    context: Record<string, unknown>,
    location: SourceLocation
  ) {
    assertCategory(errorId, 'lexer');
    super({
      errorId,
      message: messageFor(errorId, context),
      location,
      context,
    });
    this.name = 'LexerError';
    this.location = location;
  }
}

/** Failure kinds reported by dynamic string operations */
export type StringErrorKind = 'out-of-memory' | 'invalid-argument';

const STRING_ERROR_KINDS: Readonly<Record<string, StringErrorKind>> = {
  'TEXT-S001': 'out-of-memory',
  'TEXT-S002': 'invalid-argument',
};

export class StringError extends TextkitError {
  readonly kind: StringErrorKind;

  constructor(errorId: string, context: Record<string, unknown>) {
    assertCategory(errorId, 'string');
    super({ errorId, message: messageFor(errorId, context), context });
    this.name = 'StringError';
    this.kind = STRING_ERROR_KINDS[errorId] ?? 'invalid-argument';
  }
}

export class FormatError extends TextkitError {
  constructor(errorId: string, context: Record<string, unknown>) {
    assertCategory(errorId, 'format');
    super({ errorId, message: messageFor(errorId, context), context });
    this.name = 'FormatError';
  }
}

export class PathError extends TextkitError {
  constructor(errorId: string, context: Record<string, unknown>) {
    assertCategory(errorId, 'path');
    super({ errorId, message: messageFor(errorId, context), context });
    this.name = 'PathError';
  }
}

export class ConfigError extends TextkitError {
  constructor(errorId: string, context: Record<string, unknown>) {
    assertCategory(errorId, 'config');
    super({ errorId, message: messageFor(errorId, context), context });
    this.name = 'ConfigError';
  }
}

// ============================================================
// ERROR FACTORY
// ============================================================

/**
 * Create an error from the registry, picking the class by category.
 *
 * @throws TypeError if errorId is not found in registry
 *
 * @example
 * createError('TEXT-F002', { index: 3 })
 * // FormatError: "Missing argument 3 for format string"
 */
export function createError(
  errorId: string,
  context: Record<string, unknown>,
  location?: SourceLocation | undefined
): TextkitError {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }

  switch (definition.category) {
    case 'transcode':
      return new TranscodeError(errorId, context);
    case 'lexer':
      return new LexerError(errorId, context, location ?? { line: 1, offset: 0 });
    case 'string':
      return new StringError(errorId, context);
    case 'format':
      return new FormatError(errorId, context);
    case 'path':
      return new PathError(errorId, context);
    case 'config':
      return new ConfigError(errorId, context);
  }
}
