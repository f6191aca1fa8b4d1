/**
 * Lexer Helpers
 * Byte classification and marker matching
 */

const CH_0 = 0x30;
const CH_1 = 0x31;
const CH_7 = 0x37;
const CH_9 = 0x39;

export function isDigit(byte: number): boolean {
  return byte >= CH_0 && byte <= CH_9;
}

export function isOctalDigit(byte: number): boolean {
  return byte >= CH_0 && byte <= CH_7;
}

export function isNonZeroOctalDigit(byte: number): boolean {
  return byte >= CH_1 && byte <= CH_7;
}

export function isBinaryDigit(byte: number): boolean {
  return byte === CH_0 || byte === CH_1;
}

export function isHexDigit(byte: number): boolean {
  return (
    isDigit(byte) ||
    (byte >= 0x61 && byte <= 0x66) ||
    (byte >= 0x41 && byte <= 0x46)
  );
}

export function isAsciiLetter(byte: number): boolean {
  return (byte >= 0x61 && byte <= 0x7a) || (byte >= 0x41 && byte <= 0x5a);
}

/** Letters, underscore and any byte of a multi-byte UTF-8 sequence */
export function isIdentifierStart(byte: number): boolean {
  return isAsciiLetter(byte) || byte === 0x5f || byte >= 0x80;
}

export function isIdentifierPart(byte: number, allowDashes: boolean): boolean {
  return isIdentifierStart(byte) || isDigit(byte) || (allowDashes && byte === 0x2d);
}

/** Case-insensitive ASCII match of byte against a letter given in lower case */
export function isLetter(byte: number, lower: string): boolean {
  const code = lower.charCodeAt(0);
  return byte === code || byte === code - 0x20;
}

/** True when source[offset..end) starts with marker */
export function startsWithAt(
  source: Uint8Array,
  offset: number,
  end: number,
  marker: Uint8Array
): boolean {
  if (offset + marker.length > end) {
    return false;
  }
  for (let i = 0; i < marker.length; i++) {
    if (source[offset + i] !== marker[i]) {
      return false;
    }
  }
  return true;
}

/** First offset >= from where marker starts, or -1 */
export function indexOfMarker(
  source: Uint8Array,
  from: number,
  end: number,
  marker: Uint8Array
): number {
  for (let i = from; i + marker.length <= end; i++) {
    if (startsWithAt(source, i, end, marker)) {
      return i;
    }
  }
  return -1;
}
