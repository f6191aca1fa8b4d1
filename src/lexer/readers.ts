/**
 * Token Readers
 * Scanners for layout, comments, strings and identifiers
 */

import {
  findNextLine,
  findNextWhitespace,
  ltrimOffset,
  NOT_FOUND,
} from '../unicode/whitespace.js';
import { indexOfMarker, isIdentifierPart, startsWithAt } from './helpers.js';
import { rest, type LexerState } from './state.js';
import { TOKEN_TYPES, type TokenType } from './token-types.js';

/** Category and byte length of a scanned token */
export interface Scan {
  readonly type: TokenType;
  readonly length: number;
}

const CH_BACKSLASH = 0x5c;

/**
 * Whitespace or newline at the cursor.
 * A whitespace run that reaches a line break is cut before the break;
 * the break itself (`\r\n` as one) becomes the next newline token.
 */
export function readLayout(state: LexerState): Scan | null {
  const remaining = rest(state);
  const whitespace = ltrimOffset(remaining);
  if (whitespace === 0) {
    return null;
  }

  const line = findNextLine(remaining);
  if (line.lineLength > whitespace) {
    return { type: TOKEN_TYPES.WHITESPACE, length: whitespace };
  }
  if (line.lineLength > 0) {
    return { type: TOKEN_TYPES.WHITESPACE, length: line.lineLength };
  }
  return { type: TOKEN_TYPES.NEWLINE, length: line.nextLineOffset };
}

/** Opener plus the rest of the line, terminator excluded */
export function readLineComment(state: LexerState): Scan | null {
  const opener = state.options.lineCommentOpener;
  if (!startsWithAt(state.source, state.offset, state.length, opener)) {
    return null;
  }

  const body = state.source.subarray(state.offset + opener.length, state.length);
  return {
    type: TOKEN_TYPES.COMMENT,
    length: opener.length + findNextLine(body).lineLength,
  };
}

/** Opener through closer; an unterminated comment runs to end of input */
export function readBlockComment(state: LexerState): Scan | null {
  const { blockCommentOpener: opener, blockCommentCloser: closer } = state.options;
  if (!startsWithAt(state.source, state.offset, state.length, opener)) {
    return null;
  }

  const close = indexOfMarker(
    state.source,
    state.offset + opener.length,
    state.length,
    closer
  );
  const end = close === -1 ? state.length : close + closer.length;
  return { type: TOKEN_TYPES.COMMENT, length: end - state.offset };
}

/**
 * Quoted string through its closing quote. A quote preceded by a backslash
 * does not close. Returns null when no closing quote exists.
 */
export function readString(state: LexerState, quote: number): Scan | null {
  const { source, offset, length } = state;
  for (let pos = offset + 1; pos < length; pos++) {
    if (source[pos] === quote && source[pos - 1] !== CH_BACKSLASH) {
      return { type: TOKEN_TYPES.STRING_DOUBLE, length: pos + 1 - offset };
    }
  }
  return null;
}

/**
 * Identifier starting at the cursor, never extending into Unicode whitespace.
 * The caller has checked that the first byte can start an identifier.
 */
export function readIdentifier(state: LexerState): Scan {
  const remaining = rest(state);
  const whitespaceAt = findNextWhitespace(remaining);
  const limit = whitespaceAt === NOT_FOUND ? remaining.length : whitespaceAt;
  const dashes = state.options.allowDashesInIdentifiers;

  let length = 1;
  while (length < limit && isIdentifierPart(remaining[length], dashes)) {
    length++;
  }
  return { type: TOKEN_TYPES.IDENTIFIER, length };
}
