/**
 * Lexer State
 * Cursor over a UTF-8 source, advanced one token at a time
 */

import { encodeUtf8 } from '../unicode/strings.js';
import { NULL_TERMINATED } from '../unicode/types.js';
import { namedTag, TOKEN_TYPES, type Token } from './token-types.js';

// ============================================================
// OPTIONS
// ============================================================

/**
 * Observability callbacks.
 * onToken sees every scanned token, skipped ones included.
 */
export interface LexerCallbacks {
  readonly onToken?: ((token: Token) => void) | undefined;
  readonly onError?: ((token: Token) => void) | undefined;
}

export interface LexerOptions extends LexerCallbacks {
  readonly skipWhitespace?: boolean | undefined;
  readonly skipNewlines?: boolean | undefined;
  readonly skipComments?: boolean | undefined;
  /** Accept '-' inside identifiers (kebab-case) */
  readonly allowDashesInIdentifiers?: boolean | undefined;
  readonly lineCommentOpener?: string | undefined;
  readonly blockCommentOpener?: string | undefined;
  readonly blockCommentCloser?: string | undefined;
  /** Bytes to read; omitted reads everything, NULL_TERMINATED stops at the first zero byte */
  readonly length?: number | undefined;
}

export interface ResolvedLexerOptions extends LexerCallbacks {
  readonly skipWhitespace: boolean;
  readonly skipNewlines: boolean;
  readonly skipComments: boolean;
  readonly allowDashesInIdentifiers: boolean;
  readonly lineCommentOpener: Uint8Array;
  readonly blockCommentOpener: Uint8Array;
  readonly blockCommentCloser: Uint8Array;
}

export const DEFAULT_LEXER_OPTIONS = {
  skipWhitespace: false,
  skipNewlines: false,
  skipComments: false,
  allowDashesInIdentifiers: false,
  lineCommentOpener: '//',
  blockCommentOpener: '/*',
  blockCommentCloser: '*/',
} as const;

// ============================================================
// STATE
// ============================================================

export const LEXER_STATUS = {
  SUCCESS: 'success',
  /** No more input; the current token is EOF with length 0 */
  END_OF_INPUT: 'end-of-input',
  /** The current token is an error token; stop advancing */
  INVALID_ARGUMENT: 'invalid-argument',
} as const;

export type LexerStatus = (typeof LEXER_STATUS)[keyof typeof LEXER_STATUS];

export interface LexerState {
  readonly source: Uint8Array;
  readonly length: number;
  offset: number;
  lineNumber: number;
  token: Token;
  readonly options: ResolvedLexerOptions;
}

function marker(value: string, name: string): Uint8Array {
  if (value.length === 0) {
    throw new TypeError(`${name} must not be empty`);
  }
  return encodeUtf8(value);
}

function resolveLength(source: Uint8Array, length: number | undefined): number {
  if (length === undefined) {
    return source.length;
  }
  if (length === NULL_TERMINATED) {
    const zero = source.indexOf(0);
    return zero === -1 ? source.length : zero;
  }
  if (!Number.isInteger(length) || length < 0 || length > source.length) {
    throw new RangeError(`Lexer length ${length} outside source of ${source.length} bytes`);
  }
  return length;
}

export function resolveLexerOptions(options: LexerOptions = {}): ResolvedLexerOptions {
  return {
    skipWhitespace: options.skipWhitespace ?? DEFAULT_LEXER_OPTIONS.skipWhitespace,
    skipNewlines: options.skipNewlines ?? DEFAULT_LEXER_OPTIONS.skipNewlines,
    skipComments: options.skipComments ?? DEFAULT_LEXER_OPTIONS.skipComments,
    allowDashesInIdentifiers:
      options.allowDashesInIdentifiers ?? DEFAULT_LEXER_OPTIONS.allowDashesInIdentifiers,
    lineCommentOpener: marker(
      options.lineCommentOpener ?? DEFAULT_LEXER_OPTIONS.lineCommentOpener,
      'lineCommentOpener'
    ),
    blockCommentOpener: marker(
      options.blockCommentOpener ?? DEFAULT_LEXER_OPTIONS.blockCommentOpener,
      'blockCommentOpener'
    ),
    blockCommentCloser: marker(
      options.blockCommentCloser ?? DEFAULT_LEXER_OPTIONS.blockCommentCloser,
      'blockCommentCloser'
    ),
    onToken: options.onToken,
    onError: options.onError,
  };
}

/**
 * Create a cursor at offset 0, line 1.
 * String input is encoded to UTF-8; byte input is borrowed, not copied.
 *
 * @throws TypeError for an empty comment marker
 * @throws RangeError when `length` does not fit the source
 */
export function createLexer(text: string | Uint8Array, options: LexerOptions = {}): LexerState {
  const source = typeof text === 'string' ? encodeUtf8(text) : text;
  return {
    source,
    length: resolveLength(source, options.length),
    offset: 0,
    lineNumber: 1,
    token: { tag: namedTag(TOKEN_TYPES.EOF), offset: 0, length: 0, line: 1, text: '' },
    options: resolveLexerOptions(options),
  };
}

export function isAtEnd(state: LexerState): boolean {
  return state.offset >= state.length;
}

/** Byte at offset from the cursor, or -1 past the end */
export function peek(state: LexerState, ahead = 0): number {
  const index = state.offset + ahead;
  return index < state.length ? state.source[index] : -1;
}

/** Remaining input as a view */
export function rest(state: LexerState): Uint8Array {
  return state.source.subarray(state.offset, state.length);
}
