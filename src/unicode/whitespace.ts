/**
 * Unicode Whitespace
 * Whitespace and line-break scanning over UTF-8 text
 */

import { REPLACEMENT_CODE_POINT } from './code-point.js';
import { decodeUtf8At } from './decoders.js';

/** Value returned by findNextWhitespace when no whitespace follows */
export const NOT_FOUND = -1;

export function isUnicodeWhitespace(cp: number): boolean {
  if (cp >= 0x09 && cp <= 0x0d) return true;
  if (cp === 0x20 || cp === 0x85 || cp === 0xa0 || cp === 0x1680) return true;
  if (cp >= 0x2000 && cp <= 0x200a) return true;
  return (
    cp === 0x2028 ||
    cp === 0x2029 ||
    cp === 0x202f ||
    cp === 0x205f ||
    cp === 0x3000
  );
}

/** LF, VT, FF, CR, NEL, LINE SEPARATOR and PARAGRAPH SEPARATOR */
export function isUnicodeNewline(cp: number): boolean {
  return (cp >= 0x0a && cp <= 0x0d) || cp === 0x85 || cp === 0x2028 || cp === 0x2029;
}

function isNullOrWhitespaceCodePoint(cp: number): boolean {
  return cp === 0 || isUnicodeWhitespace(cp);
}

/**
 * Lenient single step: malformed input reads as U+FFFD.
 * Returns null at a truncated sequence.
 */
function stepAt(
  bytes: Uint8Array,
  pos: number,
  end: number
): { cp: number; size: number } | null {
  const step = decodeUtf8At(bytes, pos, end);
  switch (step.kind) {
    case 'code-point':
      return { cp: step.codePoint, size: step.size };
    case 'invalid':
      return { cp: REPLACEMENT_CODE_POINT, size: step.size };
    case 'truncated':
      return null;
  }
}

/** Byte length of the leading whitespace run; a zero byte ends the scan */
export function ltrimOffset(bytes: Uint8Array, length = bytes.length): number {
  let pos = 0;
  while (pos < length && bytes[pos] !== 0) {
    const step = stepAt(bytes, pos, length);
    if (step === null || !isNullOrWhitespaceCodePoint(step.cp)) break;
    pos += step.size;
  }
  return pos;
}

/**
 * Offset just past the last non-whitespace code point.
 * Returns 0 when the text is empty or all whitespace.
 */
export function rtrimOffset(bytes: Uint8Array, length = bytes.length): number {
  let pos = 0;
  let lastContentEnd = 0;
  while (pos < length) {
    const step = stepAt(bytes, pos, length);
    if (step === null) break;
    pos += step.size;
    if (!isNullOrWhitespaceCodePoint(step.cp)) {
      lastContentEnd = pos;
    }
  }
  return lastContentEnd;
}

/** Offset of the first whitespace or zero code point, or NOT_FOUND */
export function findNextWhitespace(bytes: Uint8Array, length = bytes.length): number {
  let pos = 0;
  while (pos < length) {
    const step = stepAt(bytes, pos, length);
    if (step === null) break;
    if (isNullOrWhitespaceCodePoint(step.cp)) return pos;
    pos += step.size;
  }
  return NOT_FOUND;
}

export interface LineBreak {
  /** Bytes before the line break */
  readonly lineLength: number;
  /** Offset of the following line; equals lineLength when no break was found */
  readonly nextLineOffset: number;
}

/**
 * Locate the end of the current line. `\r\n` counts as a single break;
 * a zero byte ends the text.
 *
 * @example
 * findNextLine(encodeUtf8('ab\r\ncd')) // { lineLength: 2, nextLineOffset: 4 }
 */
export function findNextLine(bytes: Uint8Array, length = bytes.length): LineBreak {
  let pos = 0;
  while (pos < length && bytes[pos] !== 0) {
    const step = stepAt(bytes, pos, length);
    if (step === null) break;

    if (isUnicodeNewline(step.cp)) {
      let next = pos + step.size;
      if (step.cp === 0x0d && next < length && bytes[next] === 0x0a) {
        next += 1;
      }
      return { lineLength: pos, nextLineOffset: next };
    }

    pos += step.size;
  }
  return { lineLength: pos, nextLineOffset: pos };
}

/** Count line breaks in a span, treating `\r\n` as one */
export function countLineBreaks(bytes: Uint8Array, length = bytes.length): number {
  let count = 0;
  let rest = bytes.subarray(0, length);
  for (;;) {
    const line = findNextLine(rest);
    if (line.nextLineOffset === line.lineLength) return count;
    count += 1;
    rest = rest.subarray(line.nextLineOffset);
  }
}

/** True when every code point is whitespace or zero; empty text counts */
export function isNullOrWhitespace(bytes: Uint8Array | null, length = bytes?.length ?? 0): boolean {
  if (bytes === null) return true;
  let pos = 0;
  while (pos < length) {
    const step = stepAt(bytes, pos, length);
    if (step === null) return false;
    if (!isNullOrWhitespaceCodePoint(step.cp)) return false;
    pos += step.size;
  }
  return true;
}

export function utf32IsNullOrWhitespace(
  units: Uint32Array | null,
  length = units?.length ?? 0
): boolean {
  if (units === null) return true;
  for (let i = 0; i < length; i++) {
    if (!isNullOrWhitespaceCodePoint(units[i])) return false;
  }
  return true;
}
