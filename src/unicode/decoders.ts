/**
 * Decoders
 * Single-step decoding of one code point from each encoding
 */

import {
  combineSurrogates,
  isInvalidUtf8Octet,
  isLowSurrogate,
  isSurrogate,
  isUtf8Continuation,
  isValidCodePoint,
  MAX_CODE_POINT,
} from './code-point.js';
import { swap16, swap32 } from './endian.js';

/**
 * Result of decoding at one position.
 * - `code-point`: a valid scalar consumed `size` units
 * - `invalid`: malformed input; skip `size` units (replaceable)
 * - `truncated`: the sequence runs past the end of input (never replaced)
 */
export type DecodeStep =
  | { readonly kind: 'code-point'; readonly codePoint: number; readonly size: number }
  | { readonly kind: 'invalid'; readonly size: number }
  | { readonly kind: 'truncated' };

/** Decoder over one source view; `end` is exclusive */
export type DecodeFn = (pos: number, end: number) => DecodeStep;

const TRUNCATED: DecodeStep = { kind: 'truncated' };

function valid(codePoint: number, size: number): DecodeStep {
  return { kind: 'code-point', codePoint, size };
}

function invalid(size: number): DecodeStep {
  return { kind: 'invalid', size };
}

// ============================================================
// UTF-8
// ============================================================

function utf8SequenceSize(lead: number): 2 | 3 | 4 | 0 {
  if ((lead & 0xe0) === 0xc0) return 2;
  if ((lead & 0xf0) === 0xe0) return 3;
  if ((lead & 0xf8) === 0xf0) return 4;
  return 0;
}

function assembleUtf8(bytes: Uint8Array, pos: number, size: 2 | 3 | 4): number {
  const lead = bytes[pos];
  if (size === 2) {
    return ((lead & 0x1f) << 6) | (bytes[pos + 1] & 0x3f);
  }
  if (size === 3) {
    return (
      ((lead & 0x0f) << 12) |
      ((bytes[pos + 1] & 0x3f) << 6) |
      (bytes[pos + 2] & 0x3f)
    );
  }
  return (
    ((lead & 0x07) << 18) |
    ((bytes[pos + 1] & 0x3f) << 12) |
    ((bytes[pos + 2] & 0x3f) << 6) |
    (bytes[pos + 3] & 0x3f)
  );
}

/**
 * Decode the UTF-8 sequence starting at pos.
 *
 * Forbidden octets and stray continuation bytes skip one byte. A bad
 * continuation byte skips only the lead. Surrogates and values above
 * U+10FFFF skip the whole sequence.
 */
export function decodeUtf8At(
  bytes: Uint8Array,
  pos: number,
  end: number
): DecodeStep {
  const lead = bytes[pos];
  if (lead < 0x80) {
    return valid(lead, 1);
  }
  if (isInvalidUtf8Octet(lead)) {
    return invalid(1);
  }

  const size = utf8SequenceSize(lead);
  if (size === 0) {
    return invalid(1);
  }
  if (pos + size > end) {
    return TRUNCATED;
  }
  for (let i = 1; i < size; i++) {
    if (!isUtf8Continuation(bytes[pos + i])) {
      return invalid(1);
    }
  }

  const cp = assembleUtf8(bytes, pos, size);

  if (isSurrogate(cp) || cp > MAX_CODE_POINT) {
    return invalid(size);
  }
  return valid(cp, size);
}

/**
 * Decode one code point from the front of a UTF-8 view.
 * Returns null when the view is empty, truncated or malformed.
 */
export function decodeUtf8CodePoint(
  bytes: Uint8Array,
  offset = 0,
  end = bytes.length
): { codePoint: number; size: number } | null {
  if (offset >= end) return null;
  const step = decodeUtf8At(bytes, offset, end);
  return step.kind === 'code-point'
    ? { codePoint: step.codePoint, size: step.size }
    : null;
}

// ============================================================
// UTF-16
// ============================================================

export function createUtf16Decoder(units: Uint16Array, swap: boolean): DecodeFn {
  const read = swap ? (i: number) => swap16(units[i]) : (i: number) => units[i];

  return (pos, end) => {
    const first = read(pos);
    if (!isSurrogate(first)) {
      return valid(first, 1);
    }
    if (isLowSurrogate(first)) {
      return invalid(1);
    }
    if (pos + 1 >= end) {
      return TRUNCATED;
    }
    const second = read(pos + 1);
    if (!isLowSurrogate(second)) {
      return invalid(1);
    }
    return valid(combineSurrogates(first, second), 2);
  };
}

// ============================================================
// UTF-32
// ============================================================

export function createUtf32Decoder(units: Uint32Array, swap: boolean): DecodeFn {
  const read = swap ? (i: number) => swap32(units[i]) : (i: number) => units[i];

  return (pos) => {
    const cp = read(pos);
    return isValidCodePoint(cp) ? valid(cp, 1) : invalid(1);
  };
}

export function createUtf8Decoder(bytes: Uint8Array): DecodeFn {
  return (pos, end) => decodeUtf8At(bytes, pos, end);
}
