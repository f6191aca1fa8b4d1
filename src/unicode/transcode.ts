/**
 * Transcoding Engine
 * Generic decode-then-encode loop behind every named conversion
 */

import { REPLACEMENT_CODE_POINT } from './code-point.js';
import {
  createUtf16Decoder,
  createUtf32Decoder,
  createUtf8Decoder,
  type DecodeFn,
} from './decoders.js';
import {
  createUtf16Sink,
  createUtf32Sink,
  createUtf8Sink,
  type UnitSink,
} from './encoders.js';
import { hostByteOrder, needsSwap, type ConcreteByteOrder } from './endian.js';
import { utf16BomOrder, utf32BomOrder, utf8HasBom } from './bom.js';
import {
  NULL_TERMINATED,
  TRANSCODE_FLAGS,
  TRANSCODE_STATUS,
  type ByteOrder,
  type SourceByteOrder,
  type TranscodeOptions,
  type TranscodeResult,
  type TranscodeStatus,
  type UnitArray,
} from './types.js';

// ============================================================
// REQUEST SHAPE
// ============================================================

export type SourceSpec =
  | { readonly from: 'utf8'; readonly source: Uint8Array | null }
  | {
      readonly from: 'utf16';
      readonly source: Uint16Array | null;
      readonly sourceOrder?: SourceByteOrder | undefined;
    }
  | {
      readonly from: 'utf32';
      readonly source: Uint32Array | null;
      readonly sourceOrder?: SourceByteOrder | undefined;
    };

export type DestSpec =
  | { readonly to: 'utf8'; readonly dest: Uint8Array | null }
  | {
      readonly to: 'utf16';
      readonly dest: Uint16Array | null;
      readonly destOrder?: ByteOrder | undefined;
    }
  | {
      readonly to: 'utf32';
      readonly dest: Uint32Array | null;
      readonly destOrder?: ByteOrder | undefined;
    };

/**
 * A full conversion request.
 * A null `dest` selects measure mode; `sourceOrder` defaults to 'detect'
 * and `destOrder` to 'native'.
 */
export type TranscodeRequest = SourceSpec & DestSpec & TranscodeOptions;

// ============================================================
// SOURCE PREPARATION
// ============================================================

interface PreparedSource {
  readonly decode: DecodeFn;
  /** First unit after any byte-order mark */
  readonly start: number;
  readonly end: number;
  readonly hasBom: boolean;
}

function result(
  status: TranscodeStatus,
  length: number,
  processed: number
): TranscodeResult {
  return { status, length, processed };
}

/**
 * Resolve the exclusive end of the source.
 * Returns null when an explicit length does not fit the view.
 */
function resolveEnd(source: UnitArray, length: number | undefined): number | null {
  if (length === undefined) {
    return source.length;
  }
  if (length === NULL_TERMINATED) {
    const zero = source.indexOf(0);
    return zero === -1 ? source.length : zero;
  }
  if (!Number.isInteger(length) || length < 0 || length > source.length) {
    return null;
  }
  return length;
}

/**
 * Choose the byte order a 16/32-bit source is read in.
 * With 'detect', a BOM decides; explicit orders ignore the BOM's pattern.
 */
function sourceOrderFor(
  requested: SourceByteOrder,
  bomOrder: ConcreteByteOrder | null
): ConcreteByteOrder {
  if (requested === 'detect') {
    return bomOrder ?? hostByteOrder();
  }
  return requested === 'native' ? hostByteOrder() : requested;
}

function prepareSource(request: TranscodeRequest, end: number): PreparedSource {
  switch (request.from) {
    case 'utf8': {
      const bytes = request.source ?? new Uint8Array(0);
      const hasBom = utf8HasBom(bytes, end);
      return { decode: createUtf8Decoder(bytes), start: hasBom ? 3 : 0, end, hasBom };
    }
    case 'utf16': {
      const units = request.source ?? new Uint16Array(0);
      const bomOrder = end >= 1 ? utf16BomOrder(units[0]) : null;
      const order = sourceOrderFor(request.sourceOrder ?? 'detect', bomOrder);
      return {
        decode: createUtf16Decoder(units, needsSwap(order)),
        start: bomOrder === null ? 0 : 1,
        end,
        hasBom: bomOrder !== null,
      };
    }
    case 'utf32': {
      const units = request.source ?? new Uint32Array(0);
      const bomOrder = end >= 1 ? utf32BomOrder(units[0]) : null;
      const order = sourceOrderFor(request.sourceOrder ?? 'detect', bomOrder);
      return {
        decode: createUtf32Decoder(units, needsSwap(order)),
        start: bomOrder === null ? 0 : 1,
        end,
        hasBom: bomOrder !== null,
      };
    }
  }
}

function createSink(request: TranscodeRequest): UnitSink {
  switch (request.to) {
    case 'utf8':
      return createUtf8Sink(request.dest);
    case 'utf16':
      return createUtf16Sink(request.dest, needsSwap(request.destOrder ?? 'native'));
    case 'utf32':
      return createUtf32Sink(request.dest, needsSwap(request.destOrder ?? 'native'));
  }
}

// ============================================================
// ENGINE
// ============================================================

/**
 * Convert between any two encodings.
 *
 * In measure mode (`dest` null) the returned length is the number of
 * destination units required, terminator excluded. In materialize mode the
 * output is zero-terminated when a slot remains after the last unit, on
 * success and on `out-of-space`.
 *
 * @example
 * const src = new TextEncoder().encode('hé');
 * const { length } = transcode({ from: 'utf8', source: src, to: 'utf16', dest: null });
 * const out = new Uint16Array(length + 1);
 * transcode({ from: 'utf8', source: src, to: 'utf16', dest: out });
 * // out = [0x68, 0xe9, 0]
 */
export function transcode(request: TranscodeRequest): TranscodeResult {
  const source = request.source;
  if (source === null) {
    return result(TRANSCODE_STATUS.INVALID_ARGUMENT, 0, 0);
  }

  const end = resolveEnd(source, request.length);
  if (end === null) {
    return result(TRANSCODE_STATUS.INVALID_ARGUMENT, 0, 0);
  }

  const flags = request.flags ?? TRANSCODE_FLAGS.NONE;
  const strict = (flags & TRANSCODE_FLAGS.ERROR_ON_INVALID_CODE_POINT) !== 0;
  const prepared = prepareSource(request, end);

  if (prepared.hasBom && (flags & TRANSCODE_FLAGS.FORBID_BOM) !== 0) {
    return result(TRANSCODE_STATUS.BOM_REJECTED, 0, 0);
  }

  const sink = createSink(request);
  let pos = prepared.start;
  let written = 0;
  let status: TranscodeStatus = TRANSCODE_STATUS.SUCCESS;

  while (pos < end) {
    const step = prepared.decode(pos, end);

    if (step.kind === 'truncated') {
      return result(TRANSCODE_STATUS.INVALID_ARGUMENT, written, pos);
    }
    if (step.kind === 'invalid' && strict) {
      return result(TRANSCODE_STATUS.INVALID_CODE_POINT, written, pos);
    }

    const cp = step.kind === 'code-point' ? step.codePoint : REPLACEMENT_CODE_POINT;
    const units = sink.unitsFor(cp);

    if (sink.capacity !== null && written + units > sink.capacity) {
      status = TRANSCODE_STATUS.OUT_OF_SPACE;
      break;
    }

    sink.write(cp, written);
    written += units;
    pos += step.size;
  }

  if (sink.capacity !== null && written < sink.capacity) {
    sink.terminate(written);
  }

  return result(status, written, pos);
}

/** Measure-mode shorthand: the request's destination is ignored */
export function measure(request: TranscodeRequest): TranscodeResult {
  return transcode({ ...request, dest: null });
}
