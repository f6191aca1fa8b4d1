/**
 * Comment Stripper
 * Re-emits lexed source without its comment tokens
 */

import { TextDecoder } from 'node:util';
import { LexerError } from './error-classes.js';
import { createLexer, LEXER_STATUS, type LexerOptions } from './lexer/state.js';
import { nextToken } from './lexer/tokenizer.js';
import { isNamedToken, TOKEN_TYPES, tokenTypeName } from './lexer/token-types.js';

/** Marker and identifier options; skip settings are forced off */
export type StripCommentsOptions = Omit<
  LexerOptions,
  'skipWhitespace' | 'skipNewlines' | 'skipComments'
>;

const TEXT_DECODER = new TextDecoder('utf-8', { ignoreBOM: true });

/**
 * Remove comments, keeping every other token byte for byte.
 * A line comment's terminating newline survives; a block comment leaves
 * nothing behind.
 *
 * @throws LexerError (TEXT-L001) at a malformed numeric literal
 *
 * @example
 * stripComments('a = 1; // note\nb = 2;')
 * // 'a = 1; \nb = 2;'
 */
export function stripComments(source: string | Uint8Array, options: StripCommentsOptions = {}): string {
  const state = createLexer(source, {
    ...options,
    skipWhitespace: false,
    skipNewlines: false,
    skipComments: false,
  });
  const kept: Uint8Array[] = [];
  let total = 0;

  for (;;) {
    const status = nextToken(state);
    if (status === LEXER_STATUS.END_OF_INPUT) {
      break;
    }
    const { tag, offset, length, line } = state.token;
    if (status === LEXER_STATUS.INVALID_ARGUMENT) {
      throw new LexerError(
        'TEXT-L001',
        { text: state.token.text, type: tokenTypeName(tag) },
        { line, offset }
      );
    }
    if (!isNamedToken(tag, TOKEN_TYPES.COMMENT)) {
      kept.push(state.source.subarray(offset, offset + length));
      total += length;
    }
  }

  const out = new Uint8Array(total);
  let pos = 0;
  for (const bytes of kept) {
    out.set(bytes, pos);
    pos += bytes.length;
  }
  return TEXT_DECODER.decode(out);
}
