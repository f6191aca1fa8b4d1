/**
 * Byte-Level Transcoding
 * Converts raw file bytes between wire encodings with an explicit byte order
 */

import { TranscodeError } from '../error-classes.js';
import { toTranscodeError } from './strings.js';
import { transcode, type DestSpec, type SourceSpec } from './transcode.js';
import type { Encoding, TranscodeOptions, UnitArray } from './types.js';

export const WIRE_ENCODINGS = ['utf8', 'utf16le', 'utf16be', 'utf32le', 'utf32be'] as const;

/** An encoding plus the byte order its units are stored in */
export type WireEncoding = (typeof WIRE_ENCODINGS)[number];

export function isWireEncoding(value: string): value is WireEncoding {
  return WIRE_ENCODINGS.some((encoding) => encoding === value);
}

function baseEncoding(encoding: WireEncoding): Encoding {
  switch (encoding) {
    case 'utf8':
      return 'utf8';
    case 'utf16le':
    case 'utf16be':
      return 'utf16';
    case 'utf32le':
    case 'utf32be':
      return 'utf32';
  }
}

function unitBytes(encoding: WireEncoding): 1 | 2 | 4 {
  switch (baseEncoding(encoding)) {
    case 'utf8':
      return 1;
    case 'utf16':
      return 2;
    case 'utf32':
      return 4;
  }
}

function sourceSpec(bytes: Uint8Array, encoding: WireEncoding): SourceSpec {
  // slice() gives an aligned buffer starting at offset 0
  const copy = bytes.slice();
  switch (encoding) {
    case 'utf8':
      return { from: 'utf8', source: copy };
    case 'utf16le':
    case 'utf16be':
      return {
        from: 'utf16',
        source: new Uint16Array(copy.buffer, 0, copy.length / 2),
        sourceOrder: encoding === 'utf16le' ? 'le' : 'be',
      };
    case 'utf32le':
    case 'utf32be':
      return {
        from: 'utf32',
        source: new Uint32Array(copy.buffer, 0, copy.length / 4),
        sourceOrder: encoding === 'utf32le' ? 'le' : 'be',
      };
  }
}

interface PreparedDest {
  readonly target: DestSpec;
  readonly units: UnitArray | null;
}

function destSpec(encoding: WireEncoding, length: number | null): PreparedDest {
  switch (encoding) {
    case 'utf8': {
      const units = length === null ? null : new Uint8Array(length);
      return { target: { to: 'utf8', dest: units }, units };
    }
    case 'utf16le':
    case 'utf16be': {
      const units = length === null ? null : new Uint16Array(length);
      const destOrder = encoding === 'utf16le' ? 'le' : 'be';
      return { target: { to: 'utf16', dest: units, destOrder }, units };
    }
    case 'utf32le':
    case 'utf32be': {
      const units = length === null ? null : new Uint32Array(length);
      const destOrder = encoding === 'utf32le' ? 'le' : 'be';
      return { target: { to: 'utf32', dest: units, destOrder }, units };
    }
  }
}

/**
 * Re-encode `bytes` from one wire encoding to another.
 * A byte-order mark in the source is consumed and not re-emitted.
 *
 * @throws TranscodeError (TEXT-U001) when the byte count is not a multiple
 * of the source unit size, or for any failed conversion status
 *
 * @example
 * transcodeBytes(new Uint8Array([0x68, 0x69]), 'utf8', 'utf16be')
 * // Uint8Array [0x00, 0x68, 0x00, 0x69]
 */
export function transcodeBytes(
  bytes: Uint8Array,
  from: WireEncoding,
  to: WireEncoding,
  options: TranscodeOptions = {}
): Uint8Array {
  const fromBase = baseEncoding(from);
  const toBase = baseEncoding(to);
  if (bytes.length % unitBytes(from) !== 0) {
    throw new TranscodeError('TEXT-U001', { from: fromBase, to: toBase });
  }

  const source = sourceSpec(bytes, from);
  const measured = transcode({ ...source, ...destSpec(to, null).target, ...options });
  const measureError = toTranscodeError(measured, fromBase, toBase);
  if (measureError) throw measureError;

  const dest = destSpec(to, measured.length);
  const outcome = transcode({ ...source, ...dest.target, ...options });
  const error = toTranscodeError(outcome, fromBase, toBase, measured.length);
  if (error) throw error;

  if (dest.units === null) {
    return new Uint8Array(0);
  }
  return new Uint8Array(dest.units.buffer, dest.units.byteOffset, dest.units.byteLength);
}
