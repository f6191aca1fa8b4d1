/**
 * Tokenizer
 * Pull-based advance over a lexer state, plus a collecting convenience
 */

import { TextDecoder } from 'node:util';
import { LexerError } from '../error-classes.js';
import { countLineBreaks } from '../unicode/whitespace.js';
import { isDigit, isIdentifierStart } from './helpers.js';
import { scanNumber } from './numbers.js';
import { COMPOUND_OPERATORS } from './operators.js';
import {
  readBlockComment,
  readIdentifier,
  readLayout,
  readLineComment,
  readString,
  type Scan,
} from './readers.js';
import {
  createLexer,
  isAtEnd,
  LEXER_STATUS,
  type LexerOptions,
  type LexerState,
  type LexerStatus,
  type ResolvedLexerOptions,
} from './state.js';
import {
  charTag,
  namedTag,
  TOKEN_TYPES,
  tokenTypeName,
  type Token,
  type TokenTag,
} from './token-types.js';

const CH_DOUBLE_QUOTE = 0x22;
const CH_SINGLE_QUOTE = 0x27;

/** Token text keeps a leading U+FEFF and maps malformed bytes to U+FFFD */
const TEXT_DECODER = new TextDecoder('utf-8', { ignoreBOM: true });

interface TaggedScan {
  readonly tag: TokenTag;
  readonly length: number;
}

// ============================================================
// SCANNING
// ============================================================

function named(scan: Scan): TaggedScan {
  return { tag: namedTag(scan.type), length: scan.length };
}

function readOperator(state: LexerState, byte: number): TaggedScan | null {
  const candidates = COMPOUND_OPERATORS[String.fromCharCode(byte)];
  if (!candidates) {
    return null;
  }
  const available = state.length - state.offset;
  for (const [text, type] of candidates) {
    if (text.length > available) continue;
    let matches = true;
    for (let i = 1; i < text.length; i++) {
      if (state.source[state.offset + i] !== text.charCodeAt(i)) {
        matches = false;
        break;
      }
    }
    if (matches) {
      return { tag: namedTag(type), length: text.length };
    }
  }
  return null;
}

/** Classify the token at the cursor; the cursor is not at end */
function scanToken(state: LexerState): TaggedScan {
  const layout = readLayout(state) ?? readLineComment(state) ?? readBlockComment(state);
  if (layout) {
    return named(layout);
  }

  const byte = state.source[state.offset];

  if (byte === CH_DOUBLE_QUOTE || byte === CH_SINGLE_QUOTE) {
    const str = readString(state, byte);
    if (str) return named(str);
  }

  if (isDigit(byte)) {
    const number = scanNumber(state.source, state.offset, state.length);
    return { tag: namedTag(number.type), length: number.end - state.offset };
  }

  const operator = readOperator(state, byte);
  if (operator) {
    return operator;
  }

  if (isIdentifierStart(byte)) {
    return named(readIdentifier(state));
  }

  return { tag: charTag(byte), length: 1 };
}

// ============================================================
// TOKEN BOOKKEEPING
// ============================================================

function setToken(state: LexerState, tag: TokenTag, length: number): Token {
  const bytes = state.source.subarray(state.offset, state.offset + length);
  const token: Token = {
    tag,
    offset: state.offset,
    length,
    line: state.lineNumber,
    text: TEXT_DECODER.decode(bytes),
  };

  state.token = token;
  state.offset += length;

  if (tag.kind === 'named') {
    if (tag.type === TOKEN_TYPES.NEWLINE) {
      state.lineNumber += 1;
    } else if (
      tag.type === TOKEN_TYPES.COMMENT ||
      tag.type === TOKEN_TYPES.STRING_DOUBLE ||
      tag.type === TOKEN_TYPES.STRING_SINGLE
    ) {
      state.lineNumber += countLineBreaks(bytes);
    }
  }

  state.options.onToken?.(token);
  return token;
}

function isSkipped(options: ResolvedLexerOptions, tag: TokenTag): boolean {
  if (tag.kind !== 'named') return false;
  switch (tag.type) {
    case TOKEN_TYPES.WHITESPACE:
      return options.skipWhitespace;
    case TOKEN_TYPES.NEWLINE:
      return options.skipNewlines;
    case TOKEN_TYPES.COMMENT:
      return options.skipComments;
    default:
      return false;
  }
}

// ============================================================
// PUBLIC API
// ============================================================

/**
 * Advance to the next token not configured as skipped.
 *
 * - `success`: `state.token` holds the new token
 * - `end-of-input`: `state.token` is EOF with length 0
 * - `invalid-argument`: `state.token` is an error token covering the
 *   consumed bytes; the caller must stop advancing
 */
export function nextToken(state: LexerState): LexerStatus {
  for (;;) {
    if (isAtEnd(state)) {
      setToken(state, namedTag(TOKEN_TYPES.EOF), 0);
      return LEXER_STATUS.END_OF_INPUT;
    }

    const scan = scanToken(state);
    const token = setToken(state, scan.tag, scan.length);

    if (scan.tag.kind === 'named' && scan.tag.type === TOKEN_TYPES.ERROR) {
      state.options.onError?.(token);
      return LEXER_STATUS.INVALID_ARGUMENT;
    }

    if (!isSkipped(state.options, scan.tag)) {
      return LEXER_STATUS.SUCCESS;
    }
  }
}

/**
 * Collect every token up to end of input (EOF excluded).
 *
 * @throws LexerError (TEXT-L001) at the first malformed literal
 *
 * @example
 * tokenize('a == 1', { skipWhitespace: true }).map((t) => t.text)
 * // ['a', '==', '1']
 */
export function tokenize(text: string | Uint8Array, options: LexerOptions = {}): Token[] {
  const state = createLexer(text, options);
  const tokens: Token[] = [];

  for (;;) {
    const status = nextToken(state);
    if (status === LEXER_STATUS.END_OF_INPUT) {
      return tokens;
    }
    if (status === LEXER_STATUS.INVALID_ARGUMENT) {
      throw new LexerError(
        'TEXT-L001',
        { text: state.token.text, type: tokenTypeName(state.token.tag) },
        { line: state.token.line, offset: state.token.offset }
      );
    }
    tokens.push(state.token);
  }
}
