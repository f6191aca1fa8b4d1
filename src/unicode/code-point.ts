/**
 * Code Point Primitives
 * Validity predicates, encoded lengths and single code point encoders
 */

export const MAX_CODE_POINT = 0x10ffff;
export const REPLACEMENT_CODE_POINT = 0xfffd;

/** U+FFFD occupies 3 UTF-8 units, 1 UTF-16 unit and 1 UTF-32 unit */
export const REPLACEMENT_UTF8 = [0xef, 0xbf, 0xbd] as const;

export function isSurrogate(value: number): boolean {
  return value >= 0xd800 && value <= 0xdfff;
}

export function isHighSurrogate(value: number): boolean {
  return value >= 0xd800 && value <= 0xdbff;
}

export function isLowSurrogate(value: number): boolean {
  return value >= 0xdc00 && value <= 0xdfff;
}

export function isValidCodePoint(cp: number): boolean {
  return Number.isInteger(cp) && cp >= 0 && cp <= MAX_CODE_POINT && !isSurrogate(cp);
}

/**
 * UTF-8 lead bytes that can never appear in well-formed text.
 * C0 and C1 only start overlong 2-byte forms; F5 and above exceed U+10FFFF.
 */
export function isInvalidUtf8Octet(byte: number): boolean {
  return byte === 0xc0 || byte === 0xc1 || byte >= 0xf5;
}

export function isUtf8Continuation(byte: number): boolean {
  return (byte & 0xc0) === 0x80;
}

function assertValid(cp: number): void {
  if (!isValidCodePoint(cp)) {
    throw new RangeError(`Invalid code point: 0x${cp.toString(16)}`);
  }
}

export function utf8EncodedLength(cp: number): 1 | 2 | 3 | 4 {
  assertValid(cp);
  if (cp <= 0x7f) return 1;
  if (cp <= 0x7ff) return 2;
  if (cp <= 0xffff) return 3;
  return 4;
}

export function utf16EncodedLength(cp: number): 1 | 2 {
  assertValid(cp);
  return cp <= 0xffff ? 1 : 2;
}

/**
 * Write cp as UTF-8 into dest starting at offset.
 * The caller guarantees room for utf8EncodedLength(cp) bytes.
 *
 * @returns Bytes written
 */
export function encodeUtf8CodePoint(
  cp: number,
  dest: Uint8Array,
  offset: number
): number {
  const size = utf8EncodedLength(cp);
  switch (size) {
    case 1:
      dest[offset] = cp;
      break;
    case 2:
      dest[offset] = 0xc0 | (cp >> 6);
      dest[offset + 1] = 0x80 | (cp & 0x3f);
      break;
    case 3:
      dest[offset] = 0xe0 | (cp >> 12);
      dest[offset + 1] = 0x80 | ((cp >> 6) & 0x3f);
      dest[offset + 2] = 0x80 | (cp & 0x3f);
      break;
    case 4:
      dest[offset] = 0xf0 | (cp >> 18);
      dest[offset + 1] = 0x80 | ((cp >> 12) & 0x3f);
      dest[offset + 2] = 0x80 | ((cp >> 6) & 0x3f);
      dest[offset + 3] = 0x80 | (cp & 0x3f);
      break;
  }
  return size;
}

/**
 * Split cp into UTF-16 unit values (host order).
 *
 * @example
 * encodeUtf16CodePoint(0x1f600) // [0xd83d, 0xde00]
 */
export function encodeUtf16CodePoint(cp: number): [number] | [number, number] {
  if (utf16EncodedLength(cp) === 1) {
    return [cp];
  }
  const u = cp - 0x10000;
  return [0xd800 | (u >> 10), 0xdc00 | (u & 0x3ff)];
}

export function combineSurrogates(high: number, low: number): number {
  return (((high & 0x3ff) << 10) | (low & 0x3ff)) + 0x10000;
}
