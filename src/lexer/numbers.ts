/**
 * Numeric Literals
 * Radix detection, exponent validation and type suffixes
 */

import {
  isBinaryDigit,
  isDigit,
  isHexDigit,
  isLetter,
  isNonZeroOctalDigit,
  isOctalDigit,
} from './helpers.js';
import { TOKEN_TYPES, type TokenType } from './token-types.js';

const CH_0 = 0x30;
const CH_DOT = 0x2e;
const CH_PLUS = 0x2b;
const CH_MINUS = 0x2d;

/** Scanned literal: its category and exclusive end offset */
export interface NumberScan {
  readonly type: TokenType;
  readonly end: number;
}

type ByteAt = (index: number) => number;

function skipWhile(at: ByteAt, from: number, test: (byte: number) => boolean): number {
  let pos = from;
  while (test(at(pos))) pos++;
  return pos;
}

/** u, ul, ull, l, ll, lu, llu in any case */
function integerSuffixEnd(at: ByteAt, from: number): number {
  let pos = from;
  if (isLetter(at(pos), 'u')) {
    pos++;
    if (isLetter(at(pos), 'l')) {
      pos++;
      if (isLetter(at(pos), 'l')) pos++;
    }
  } else if (isLetter(at(pos), 'l')) {
    pos++;
    if (isLetter(at(pos), 'l')) {
      pos++;
      if (isLetter(at(pos), 'u')) pos++;
    } else if (isLetter(at(pos), 'u')) {
      pos++;
    }
  }
  return pos;
}

function floatSuffixEnd(at: ByteAt, from: number): number {
  const byte = at(from);
  return isLetter(byte, 'f') || isLetter(byte, 'd') || isLetter(byte, 'l')
    ? from + 1
    : from;
}

function withSuffix(at: ByteAt, type: TokenType, end: number): NumberScan {
  const floating = type === TOKEN_TYPES.FLOAT_DEC || type === TOKEN_TYPES.FLOAT_HEX;
  return {
    type,
    end: floating ? floatSuffixEnd(at, end) : integerSuffixEnd(at, end),
  };
}

/**
 * Scan an exponent after its marker: optional sign, then at least one digit.
 * When the digit is missing, `end` is where it was expected.
 */
function scanExponent(at: ByteAt, afterMarker: number): { valid: boolean; end: number } {
  let pos = afterMarker;
  if (at(pos) === CH_PLUS || at(pos) === CH_MINUS) pos++;
  if (!isDigit(at(pos))) return { valid: false, end: pos };
  return { valid: true, end: skipWhile(at, pos, isDigit) };
}

function error(end: number): NumberScan {
  return { type: TOKEN_TYPES.ERROR, end };
}

function scanHex(at: ByteAt, start: number): NumberScan {
  let pos = skipWhile(at, start + 2, isHexDigit);
  let floating = false;

  if (at(pos) === CH_DOT) {
    floating = true;
    pos = skipWhile(at, pos + 1, isHexDigit);
  }

  if (isLetter(at(pos), 'p')) {
    const exponent = scanExponent(at, pos + 1);
    if (!exponent.valid) return error(exponent.end);
    return withSuffix(at, TOKEN_TYPES.FLOAT_HEX, exponent.end);
  }

  // A hex fraction needs a binary exponent
  if (floating) return error(pos);
  return withSuffix(at, TOKEN_TYPES.INTEGER_HEX, pos);
}

/**
 * Octal when the digits after the leading zeros start with 1-7 and the whole
 * run stays octal; null hands the literal to the decimal scanner.
 */
function scanOctal(at: ByteAt, start: number): NumberScan | null {
  const firstSignificant = skipWhile(at, start + 1, (byte) => byte === CH_0);
  if (!isNonZeroOctalDigit(at(firstSignificant))) return null;

  const end = skipWhile(at, firstSignificant, isOctalDigit);
  const next = at(end);
  if (isDigit(next) || next === CH_DOT || isLetter(next, 'e')) return null;

  return withSuffix(at, TOKEN_TYPES.INTEGER_OCT, end);
}

function scanDecimal(at: ByteAt, start: number): NumberScan {
  let pos = skipWhile(at, start + 1, isDigit);
  const next = at(pos);

  if (next !== CH_DOT && !isLetter(next, 'e')) {
    return withSuffix(at, TOKEN_TYPES.INTEGER_DEC, pos);
  }

  if (next === CH_DOT) {
    pos = skipWhile(at, pos + 1, isDigit);
  }
  if (isLetter(at(pos), 'e')) {
    const exponent = scanExponent(at, pos + 1);
    if (!exponent.valid) return error(exponent.end);
    pos = exponent.end;
  }
  return withSuffix(at, TOKEN_TYPES.FLOAT_DEC, pos);
}

/**
 * Scan the numeric literal starting at `start` (a digit).
 * Returns ERROR when an exponent marker has no digits; `end` then covers
 * what was consumed.
 */
export function scanNumber(source: Uint8Array, start: number, length: number): NumberScan {
  const at: ByteAt = (index) => (index < length ? source[index] : -1);

  if (at(start) === CH_0 && start + 1 < length) {
    const marker = at(start + 1);
    if (isLetter(marker, 'x')) {
      return scanHex(at, start);
    }
    if (isLetter(marker, 'b')) {
      return withSuffix(at, TOKEN_TYPES.INTEGER_BIN, skipWhile(at, start + 2, isBinaryDigit));
    }
    const octal = scanOctal(at, start);
    if (octal) return octal;
  }

  return scanDecimal(at, start);
}
