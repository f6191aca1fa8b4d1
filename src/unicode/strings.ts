/**
 * String Conveniences
 * JavaScript string <-> encoded unit arrays via measure-then-materialize
 */

import { TranscodeError } from '../error-classes.js';
import {
  utf16NeToUtf8,
  utf8ToUtf16Ne,
  utf32ToUtf16,
} from './conversions.js';
import { transcode } from './transcode.js';
import {
  TRANSCODE_STATUS,
  type ByteOrder,
  type Encoding,
  type SourceByteOrder,
  type TranscodeOptions,
  type TranscodeResult,
} from './types.js';

const ERROR_IDS = {
  'invalid-argument': 'TEXT-U001',
  'invalid-code-point': 'TEXT-U002',
  'bom-rejected': 'TEXT-U003',
  'out-of-space': 'TEXT-U004',
} as const;

/**
 * Convert a failed result into a TranscodeError.
 * Returns null for a successful result.
 */
export function toTranscodeError(
  outcome: TranscodeResult,
  from: Encoding,
  to: Encoding,
  capacity?: number
): TranscodeError | null {
  if (outcome.status === TRANSCODE_STATUS.SUCCESS) {
    return null;
  }
  return new TranscodeError(ERROR_IDS[outcome.status], {
    from,
    to,
    processed: outcome.processed,
    length: outcome.length,
    capacity,
  });
}

function check(outcome: TranscodeResult, from: Encoding, to: Encoding): void {
  const error = toTranscodeError(outcome, from, to);
  if (error) throw error;
}

const CHUNK = 0x2000;

function unitsToString(units: Uint16Array): string {
  let text = '';
  for (let i = 0; i < units.length; i += CHUNK) {
    text += String.fromCharCode(...units.subarray(i, i + CHUNK));
  }
  return text;
}

function stringUnits(text: string): Uint16Array {
  const units = new Uint16Array(text.length);
  for (let i = 0; i < text.length; i++) {
    units[i] = text.charCodeAt(i);
  }
  return units;
}

// ============================================================
// UTF-8
// ============================================================

/**
 * Encode a string as UTF-8.
 * Lone surrogates become U+FFFD; a trailing lone high surrogate throws.
 *
 * @throws TranscodeError
 */
export function encodeUtf8(text: string, options: TranscodeOptions = {}): Uint8Array {
  const source = stringUnits(text);
  const measured = utf16NeToUtf8(null, source, options);
  check(measured, 'utf16', 'utf8');

  const dest = new Uint8Array(measured.length);
  check(utf16NeToUtf8(dest, source, options), 'utf16', 'utf8');
  return dest;
}

/**
 * Decode UTF-8 bytes into a string; a leading BOM is skipped.
 *
 * @throws TranscodeError
 */
export function decodeUtf8(bytes: Uint8Array, options: TranscodeOptions = {}): string {
  const measured = utf8ToUtf16Ne(null, bytes, options);
  check(measured, 'utf8', 'utf16');

  const dest = new Uint16Array(measured.length);
  check(utf8ToUtf16Ne(dest, bytes, options), 'utf8', 'utf16');
  return unitsToString(dest);
}

// ============================================================
// UTF-16
// ============================================================

/** Code units of a string laid out in `order` */
export function stringToUtf16(text: string, order: ByteOrder = 'native'): Uint16Array {
  const source = stringUnits(text);
  if (order === 'native') {
    return source;
  }
  const dest = new Uint16Array(source.length);
  const outcome = transcode({
    from: 'utf16',
    source,
    sourceOrder: 'native',
    to: 'utf16',
    dest,
    destOrder: order,
  });
  check(outcome, 'utf16', 'utf16');
  return dest;
}

/**
 * @throws TranscodeError
 */
export function utf16ToString(
  units: Uint16Array,
  order: SourceByteOrder = 'detect',
  options: TranscodeOptions = {}
): string {
  const request = { ...options, from: 'utf16', source: units, sourceOrder: order, to: 'utf16' } as const;
  const measured = transcode({ ...request, dest: null });
  check(measured, 'utf16', 'utf16');

  const dest = new Uint16Array(measured.length);
  check(transcode({ ...request, dest }), 'utf16', 'utf16');
  return unitsToString(dest);
}

// ============================================================
// UTF-32
// ============================================================

/**
 * @throws TranscodeError
 */
export function stringToUtf32(text: string, order: ByteOrder = 'native'): Uint32Array {
  const source = stringUnits(text);
  const request = { from: 'utf16', source, sourceOrder: 'native', to: 'utf32', destOrder: order } as const;
  const measured = transcode({ ...request, dest: null });
  check(measured, 'utf16', 'utf32');

  const dest = new Uint32Array(measured.length);
  check(transcode({ ...request, dest }), 'utf16', 'utf32');
  return dest;
}

/**
 * @throws TranscodeError
 */
export function utf32ToString(units: Uint32Array, options: TranscodeOptions = {}): string {
  const measured = utf32ToUtf16(null, units, options);
  check(measured, 'utf32', 'utf16');

  const dest = new Uint16Array(measured.length);
  check(utf32ToUtf16(dest, units, options), 'utf32', 'utf16');
  return unitsToString(dest);
}
