/**
 * Conversion Round-Trip Tests
 * Every encoding pair and byte order, and every Unicode scalar value
 */

import { describe, expect, it } from 'vitest';
import {
  MAX_CODE_POINT,
  isSurrogate,
  measureUtf16BeToUtf32Be,
  measureUtf16BeToUtf8,
  measureUtf16LeToUtf32Le,
  measureUtf16LeToUtf8,
  measureUtf16NeToUtf32Ne,
  measureUtf16NeToUtf8,
  measureUtf32BeToUtf16Be,
  measureUtf32BeToUtf8,
  measureUtf32LeToUtf16Le,
  measureUtf32LeToUtf8,
  measureUtf32NeToUtf16Ne,
  measureUtf32NeToUtf8,
  measureUtf8ToUtf16Be,
  measureUtf8ToUtf16Le,
  measureUtf8ToUtf16Ne,
  measureUtf8ToUtf32Be,
  measureUtf8ToUtf32Le,
  measureUtf8ToUtf32Ne,
  utf16BeToUtf32Be,
  utf16BeToUtf8,
  utf16LeToUtf32Le,
  utf16LeToUtf8,
  utf16NeToUtf32Ne,
  utf16NeToUtf8,
  utf32BeToUtf16Be,
  utf32BeToUtf8,
  utf32LeToUtf16Le,
  utf32LeToUtf8,
  utf32NeToUtf16Ne,
  utf32NeToUtf8,
  utf8ToUtf16Be,
  utf8ToUtf16Le,
  utf8ToUtf16Ne,
  utf8ToUtf32Be,
  utf8ToUtf32Le,
  utf8ToUtf32Ne,
  type Converter,
  type Measurer,
  type TranscodeResult,
} from '../../src/unicode/index.js';

/** "hé€😀" in UTF-8 */
const UTF8 = new Uint8Array([0x68, 0xc3, 0xa9, 0xe2, 0x82, 0xac, 0xf0, 0x9f, 0x98, 0x80]);

function utf16(convert: Converter<Uint8Array, Uint16Array>): Uint16Array {
  const units = new Uint16Array(5);
  convert(units, UTF8);
  return units;
}

function utf32(convert: Converter<Uint8Array, Uint32Array>): Uint32Array {
  const units = new Uint32Array(4);
  convert(units, UTF8);
  return units;
}

const UTF16 = { ne: utf16(utf8ToUtf16Ne), le: utf16(utf8ToUtf16Le), be: utf16(utf8ToUtf16Be) };
const UTF32 = { ne: utf32(utf8ToUtf32Ne), le: utf32(utf8ToUtf32Le), be: utf32(utf8ToUtf32Be) };

interface PairOutcome {
  readonly measured: TranscodeResult;
  readonly converted: TranscodeResult;
  readonly original: number[];
  readonly restored: number[];
}

/** Measure, convert into a destination of exactly that size, then convert back */
function convertPair<S extends ArrayLike<number>, D extends ArrayLike<number>>(
  source: S,
  measureForward: Measurer<S>,
  forward: Converter<S, D>,
  back: Converter<D, S>,
  allocDest: (length: number) => D,
  allocSource: (length: number) => S
): PairOutcome {
  const measured = measureForward(source);
  const dest = allocDest(measured.length);
  const converted = forward(dest, source);
  const restored = allocSource(source.length);
  back(restored, dest);
  return {
    measured,
    converted,
    original: Array.from(source),
    restored: Array.from(restored),
  };
}

const bytes = (length: number): Uint8Array => new Uint8Array(length);
const units16 = (length: number): Uint16Array => new Uint16Array(length);
const units32 = (length: number): Uint32Array => new Uint32Array(length);

const PAIRS: [string, () => PairOutcome][] = [
  ['utf8 -> utf16ne', () => convertPair(UTF8, measureUtf8ToUtf16Ne, utf8ToUtf16Ne, utf16NeToUtf8, units16, bytes)],
  ['utf8 -> utf16le', () => convertPair(UTF8, measureUtf8ToUtf16Le, utf8ToUtf16Le, utf16LeToUtf8, units16, bytes)],
  ['utf8 -> utf16be', () => convertPair(UTF8, measureUtf8ToUtf16Be, utf8ToUtf16Be, utf16BeToUtf8, units16, bytes)],
  ['utf8 -> utf32ne', () => convertPair(UTF8, measureUtf8ToUtf32Ne, utf8ToUtf32Ne, utf32NeToUtf8, units32, bytes)],
  ['utf8 -> utf32le', () => convertPair(UTF8, measureUtf8ToUtf32Le, utf8ToUtf32Le, utf32LeToUtf8, units32, bytes)],
  ['utf8 -> utf32be', () => convertPair(UTF8, measureUtf8ToUtf32Be, utf8ToUtf32Be, utf32BeToUtf8, units32, bytes)],
  ['utf16ne -> utf8', () => convertPair(UTF16.ne, measureUtf16NeToUtf8, utf16NeToUtf8, utf8ToUtf16Ne, bytes, units16)],
  ['utf16le -> utf8', () => convertPair(UTF16.le, measureUtf16LeToUtf8, utf16LeToUtf8, utf8ToUtf16Le, bytes, units16)],
  ['utf16be -> utf8', () => convertPair(UTF16.be, measureUtf16BeToUtf8, utf16BeToUtf8, utf8ToUtf16Be, bytes, units16)],
  ['utf16ne -> utf32ne', () => convertPair(UTF16.ne, measureUtf16NeToUtf32Ne, utf16NeToUtf32Ne, utf32NeToUtf16Ne, units32, units16)],
  ['utf16le -> utf32le', () => convertPair(UTF16.le, measureUtf16LeToUtf32Le, utf16LeToUtf32Le, utf32LeToUtf16Le, units32, units16)],
  ['utf16be -> utf32be', () => convertPair(UTF16.be, measureUtf16BeToUtf32Be, utf16BeToUtf32Be, utf32BeToUtf16Be, units32, units16)],
  ['utf32ne -> utf8', () => convertPair(UTF32.ne, measureUtf32NeToUtf8, utf32NeToUtf8, utf8ToUtf32Ne, bytes, units32)],
  ['utf32le -> utf8', () => convertPair(UTF32.le, measureUtf32LeToUtf8, utf32LeToUtf8, utf8ToUtf32Le, bytes, units32)],
  ['utf32be -> utf8', () => convertPair(UTF32.be, measureUtf32BeToUtf8, utf32BeToUtf8, utf8ToUtf32Be, bytes, units32)],
  ['utf32ne -> utf16ne', () => convertPair(UTF32.ne, measureUtf32NeToUtf16Ne, utf32NeToUtf16Ne, utf16NeToUtf32Ne, units16, units32)],
  ['utf32le -> utf16le', () => convertPair(UTF32.le, measureUtf32LeToUtf16Le, utf32LeToUtf16Le, utf16LeToUtf32Le, units16, units32)],
  ['utf32be -> utf16be', () => convertPair(UTF32.be, measureUtf32BeToUtf16Be, utf32BeToUtf16Be, utf16BeToUtf32Be, units16, units32)],
];

describe('encoding pairs', () => {
  it.each(PAIRS)('%s fills a measured destination and converts back', (_name, run) => {
    const { measured, converted, original, restored } = run();
    expect(measured.status).toBe('success');
    expect(converted).toEqual({
      status: 'success',
      length: measured.length,
      processed: original.length,
    });
    expect(restored).toEqual(original);
  });

  it('stores the same code points in every byte order', () => {
    expect(Array.from(UTF16.ne)).toEqual([0x68, 0xe9, 0x20ac, 0xd83d, 0xde00]);
    expect(Array.from(UTF32.ne)).toEqual([0x68, 0xe9, 0x20ac, 0x1f600]);
    expect(UTF16.le).not.toEqual(UTF16.be);
  });
});

// ============================================================
// SCALAR VALUE SWEEP
// ============================================================

/** Every code point outside the surrogate range, in order from U+0000 */
function allScalarValues(): Uint32Array {
  const values = new Uint32Array(MAX_CODE_POINT + 1 - 0x800);
  let count = 0;
  for (let cp = 0; cp <= MAX_CODE_POINT; cp++) {
    if (!isSurrogate(cp)) {
      values[count++] = cp;
    }
  }
  return values;
}

/** Index of the first differing element, or -1 */
function firstMismatch(a: Uint32Array, b: Uint32Array): number {
  if (a.length !== b.length) return Math.min(a.length, b.length);
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return i;
  }
  return -1;
}

describe('scalar value round trip', () => {
  const values = allScalarValues();

  it('survives UTF-32 -> UTF-8 -> UTF-32', () => {
    const encoded = new Uint8Array(measureUtf32NeToUtf8(values).length);
    utf32NeToUtf8(encoded, values);
    const decoded = new Uint32Array(values.length);
    expect(utf8ToUtf32Ne(decoded, encoded).status).toBe('success');
    expect(firstMismatch(values, decoded)).toBe(-1);
  });

  it('survives UTF-32 -> UTF-16 -> UTF-32', () => {
    const encoded = new Uint16Array(measureUtf32NeToUtf16Ne(values).length);
    utf32NeToUtf16Ne(encoded, values);
    const decoded = new Uint32Array(values.length);
    expect(utf16NeToUtf32Ne(decoded, encoded).status).toBe('success');
    expect(firstMismatch(values, decoded)).toBe(-1);
  });

  it('consumes a leading U+FEFF as a byte-order mark', () => {
    expect(utf32NeToUtf8(null, new Uint32Array([0xfeff]))).toEqual({
      status: 'success',
      length: 0,
      processed: 1,
    });
    expect(utf8ToUtf32Ne(null, new Uint8Array([0xef, 0xbb, 0xbf]))).toEqual({
      status: 'success',
      length: 0,
      processed: 3,
    });
  });

  it('consumes a leading UTF-16 U+FFFE as a byte-swapped mark', () => {
    expect(utf16NeToUtf32Ne(null, new Uint16Array([0xfffe]))).toEqual({
      status: 'success',
      length: 0,
      processed: 1,
    });
  });

  it('keeps U+FFFE in UTF-8 and UTF-32', () => {
    expect(utf32NeToUtf8(null, new Uint32Array([0xfffe])).length).toBe(3);
    expect(utf8ToUtf32Ne(null, new Uint8Array([0xef, 0xbf, 0xbe])).length).toBe(1);
  });

  it('keeps both marks after the first unit', () => {
    expect(utf16NeToUtf32Ne(null, new Uint16Array([0x41, 0xfeff, 0xfffe])).length).toBe(3);
  });
});
