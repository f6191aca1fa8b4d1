/**
 * Named Conversions
 * One entry point per encoding pair and byte-order variant.
 *
 * Every function takes `(dest, source, options)`; a null `dest` measures.
 * `Ne` means native (host) order. Source-side functions without an order
 * in their name let a leading BOM pick the order and otherwise read native.
 */

import { transcode } from './transcode.js';
import type {
  ByteOrder,
  SourceByteOrder,
  TranscodeOptions,
  TranscodeResult,
} from './types.js';

export type Converter<S, D> = (
  dest: D | null,
  source: S | null,
  options?: TranscodeOptions
) => TranscodeResult;

/** Destination length a converter would need, without writing */
export type Measurer<S> = (source: S | null, options?: TranscodeOptions) => TranscodeResult;

// ============================================================
// FACTORIES
// ============================================================

function fromUtf8ToUtf16(destOrder: ByteOrder): Converter<Uint8Array, Uint16Array> {
  return (dest, source, options = {}) =>
    transcode({ ...options, from: 'utf8', source, to: 'utf16', dest, destOrder });
}

function fromUtf8ToUtf32(destOrder: ByteOrder): Converter<Uint8Array, Uint32Array> {
  return (dest, source, options = {}) =>
    transcode({ ...options, from: 'utf8', source, to: 'utf32', dest, destOrder });
}

function fromUtf16ToUtf8(sourceOrder: SourceByteOrder): Converter<Uint16Array, Uint8Array> {
  return (dest, source, options = {}) =>
    transcode({ ...options, from: 'utf16', source, sourceOrder, to: 'utf8', dest });
}

/** The UTF-32 output keeps the source's order; a detected source writes native */
function fromUtf16ToUtf32(sourceOrder: SourceByteOrder): Converter<Uint16Array, Uint32Array> {
  const destOrder = sourceOrder === 'detect' ? 'native' : sourceOrder;
  return (dest, source, options = {}) =>
    transcode({
      ...options,
      from: 'utf16',
      source,
      sourceOrder,
      to: 'utf32',
      dest,
      destOrder,
    });
}

function fromUtf32ToUtf8(sourceOrder: SourceByteOrder): Converter<Uint32Array, Uint8Array> {
  return (dest, source, options = {}) =>
    transcode({ ...options, from: 'utf32', source, sourceOrder, to: 'utf8', dest });
}

function fromUtf32ToUtf16(sourceOrder: SourceByteOrder): Converter<Uint32Array, Uint16Array> {
  const destOrder = sourceOrder === 'detect' ? 'native' : sourceOrder;
  return (dest, source, options = {}) =>
    transcode({
      ...options,
      from: 'utf32',
      source,
      sourceOrder,
      to: 'utf16',
      dest,
      destOrder,
    });
}

function measuring<S, D>(convert: Converter<S, D>): Measurer<S> {
  return (source, options) => convert(null, source, options);
}

// ============================================================
// UTF-8 SOURCE
// ============================================================

export const utf8ToUtf16Ne = fromUtf8ToUtf16('native');
export const utf8ToUtf16Le = fromUtf8ToUtf16('le');
export const utf8ToUtf16Be = fromUtf8ToUtf16('be');
export const utf8ToUtf16 = utf8ToUtf16Ne;

export const utf8ToUtf32Ne = fromUtf8ToUtf32('native');
export const utf8ToUtf32Le = fromUtf8ToUtf32('le');
export const utf8ToUtf32Be = fromUtf8ToUtf32('be');
export const utf8ToUtf32 = utf8ToUtf32Ne;

// ============================================================
// UTF-16 SOURCE
// ============================================================

export const utf16NeToUtf8 = fromUtf16ToUtf8('native');
export const utf16LeToUtf8 = fromUtf16ToUtf8('le');
export const utf16BeToUtf8 = fromUtf16ToUtf8('be');
export const utf16ToUtf8 = fromUtf16ToUtf8('detect');

export const utf16NeToUtf32Ne = fromUtf16ToUtf32('native');
export const utf16LeToUtf32Le = fromUtf16ToUtf32('le');
export const utf16BeToUtf32Be = fromUtf16ToUtf32('be');
export const utf16ToUtf32 = fromUtf16ToUtf32('detect');

// ============================================================
// UTF-32 SOURCE
// ============================================================

export const utf32NeToUtf8 = fromUtf32ToUtf8('native');
export const utf32LeToUtf8 = fromUtf32ToUtf8('le');
export const utf32BeToUtf8 = fromUtf32ToUtf8('be');
export const utf32ToUtf8 = fromUtf32ToUtf8('detect');

export const utf32NeToUtf16Ne = fromUtf32ToUtf16('native');
export const utf32LeToUtf16Le = fromUtf32ToUtf16('le');
export const utf32BeToUtf16Be = fromUtf32ToUtf16('be');
export const utf32ToUtf16 = fromUtf32ToUtf16('detect');

// ============================================================
// MEASUREMENT
// ============================================================

export const measureUtf8ToUtf16Ne = measuring(utf8ToUtf16Ne);
export const measureUtf8ToUtf16Le = measuring(utf8ToUtf16Le);
export const measureUtf8ToUtf16Be = measuring(utf8ToUtf16Be);
export const measureUtf8ToUtf16 = measuring(utf8ToUtf16);
export const measureUtf8ToUtf32Ne = measuring(utf8ToUtf32Ne);
export const measureUtf8ToUtf32Le = measuring(utf8ToUtf32Le);
export const measureUtf8ToUtf32Be = measuring(utf8ToUtf32Be);
export const measureUtf8ToUtf32 = measuring(utf8ToUtf32);
export const measureUtf16NeToUtf8 = measuring(utf16NeToUtf8);
export const measureUtf16LeToUtf8 = measuring(utf16LeToUtf8);
export const measureUtf16BeToUtf8 = measuring(utf16BeToUtf8);
export const measureUtf16ToUtf8 = measuring(utf16ToUtf8);
export const measureUtf16NeToUtf32Ne = measuring(utf16NeToUtf32Ne);
export const measureUtf16LeToUtf32Le = measuring(utf16LeToUtf32Le);
export const measureUtf16BeToUtf32Be = measuring(utf16BeToUtf32Be);
export const measureUtf16ToUtf32 = measuring(utf16ToUtf32);
export const measureUtf32NeToUtf8 = measuring(utf32NeToUtf8);
export const measureUtf32LeToUtf8 = measuring(utf32LeToUtf8);
export const measureUtf32BeToUtf8 = measuring(utf32BeToUtf8);
export const measureUtf32ToUtf8 = measuring(utf32ToUtf8);
export const measureUtf32NeToUtf16Ne = measuring(utf32NeToUtf16Ne);
export const measureUtf32LeToUtf16Le = measuring(utf32LeToUtf16Le);
export const measureUtf32BeToUtf16Be = measuring(utf32BeToUtf16Be);
export const measureUtf32ToUtf16 = measuring(utf32ToUtf16);
