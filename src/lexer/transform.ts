/**
 * Token Value Transform
 * Logical value of the current token: unquoted strings, comment bodies
 */

import { err } from 'neverthrow';
import { LexerError, StringError } from '../error-classes.js';
import { newStringFromSpan, type StringResult } from '../string/dynamic-string.js';
import { startsWithAt } from './helpers.js';
import type { LexerState } from './state.js';
import { isNamedToken, TOKEN_TYPES, tokenTypeName } from './token-types.js';

const CH_BACKSLASH = 0x5c;
const CH_DOUBLE_QUOTE = 0x22;
const CH_SINGLE_QUOTE = 0x27;

/** Escape letter -> byte it stands for; anything else passes through */
const ESCAPES: ReadonlyMap<number, number> = new Map([
  [0x72, 0x0d], // \r
  [0x6e, 0x0a], // \n
  [0x74, 0x09], // \t
  [0x66, 0x0c], // \f
  [CH_DOUBLE_QUOTE, CH_DOUBLE_QUOTE],
  [CH_SINGLE_QUOTE, CH_SINGLE_QUOTE],
  [CH_BACKSLASH, CH_BACKSLASH],
  [0x30, 0x00], // \0
]);

// ============================================================
// HELPERS
// ============================================================

function unquote(raw: Uint8Array): Uint8Array {
  const first = raw[0];
  if ((first === CH_DOUBLE_QUOTE || first === CH_SINGLE_QUOTE) && raw.length >= 2) {
    return raw.subarray(1, raw.length - 1);
  }
  return raw;
}

/** Collapse two-byte escapes; \u, \x and octal escapes stay as written */
function collapseEscapes(body: Uint8Array): { bytes: Uint8Array; length: number } {
  const out = new Uint8Array(body.length);
  let length = 0;
  let i = 0;
  while (i < body.length) {
    const byte = body[i];
    const replacement = byte === CH_BACKSLASH && i + 1 < body.length
      ? ESCAPES.get(body[i + 1])
      : undefined;
    if (replacement !== undefined) {
      out[length++] = replacement;
      i += 2;
    } else {
      out[length++] = byte;
      i++;
    }
  }
  return { bytes: out, length };
}

function endsWith(bytes: Uint8Array, suffix: Uint8Array): boolean {
  return (
    bytes.length >= suffix.length &&
    startsWithAt(bytes, bytes.length - suffix.length, bytes.length, suffix)
  );
}

/** Comment body without its markers; an unterminated block keeps its tail */
function commentBody(state: LexerState, raw: Uint8Array): Uint8Array {
  const { lineCommentOpener, blockCommentOpener, blockCommentCloser } = state.options;

  if (startsWithAt(raw, 0, raw.length, lineCommentOpener)) {
    return raw.subarray(lineCommentOpener.length);
  }
  if (startsWithAt(raw, 0, raw.length, blockCommentOpener)) {
    const body = raw.subarray(blockCommentOpener.length);
    return endsWith(body, blockCommentCloser)
      ? body.subarray(0, body.length - blockCommentCloser.length)
      : body;
  }
  return raw;
}

// ============================================================
// PUBLIC API
// ============================================================

/**
 * Materialize the logical value of `state.token` as a dynamic string.
 *
 * - strings: quotes stripped, `\r \n \t \f \" \' \\ \0` collapsed
 * - line comments: opener stripped
 * - block comments: opener stripped, closer stripped when present
 * - anything else: raw bytes
 *
 * An error token yields an invalid-argument failure.
 */
export function transformToken(state: LexerState): StringResult {
  const { tag, offset, length } = state.token;
  if (isNamedToken(tag, TOKEN_TYPES.ERROR)) {
    return err(new StringError('TEXT-S002', { reason: 'error tokens have no value' }));
  }

  const raw = state.source.subarray(offset, offset + length);

  if (isNamedToken(tag, TOKEN_TYPES.STRING_DOUBLE) || isNamedToken(tag, TOKEN_TYPES.STRING_SINGLE)) {
    const collapsed = collapseEscapes(unquote(raw));
    return newStringFromSpan(collapsed.bytes, collapsed.length);
  }

  if (isNamedToken(tag, TOKEN_TYPES.COMMENT)) {
    const body = commentBody(state, raw);
    return newStringFromSpan(body, body.length);
  }

  return newStringFromSpan(raw, raw.length);
}

/**
 * Logical value of `state.token` as text.
 *
 * @throws LexerError (TEXT-L002) for an error token
 *
 * @example
 * const state = createLexer('"a\\tb"');
 * nextToken(state);
 * tokenValue(state) // 'a\tb'
 */
export function tokenValue(state: LexerState): string {
  return transformToken(state).match(
    (str) => str.toString(),
    () => {
      throw new LexerError(
        'TEXT-L002',
        { type: tokenTypeName(state.token.tag) },
        { line: state.token.line, offset: state.token.offset }
      );
    }
  );
}
