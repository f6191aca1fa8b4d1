/**
 * Encoders
 * Destination sinks that measure or write one code point at a time
 */

import {
  encodeUtf16CodePoint,
  encodeUtf8CodePoint,
  utf16EncodedLength,
  utf8EncodedLength,
} from './code-point.js';
import { swap16, swap32 } from './endian.js';

/**
 * Destination of a conversion.
 * `capacity` is null in measure mode, where `write` is never called.
 */
export interface UnitSink {
  readonly capacity: number | null;
  unitsFor(cp: number): number;
  write(cp: number, at: number): void;
  terminate(at: number): void;
}

export function createUtf8Sink(dest: Uint8Array | null): UnitSink {
  return {
    capacity: dest === null ? null : dest.length,
    unitsFor: utf8EncodedLength,
    write(cp, at) {
      if (dest !== null) encodeUtf8CodePoint(cp, dest, at);
    },
    terminate(at) {
      if (dest !== null) dest[at] = 0;
    },
  };
}

export function createUtf16Sink(dest: Uint16Array | null, swap: boolean): UnitSink {
  return {
    capacity: dest === null ? null : dest.length,
    unitsFor: utf16EncodedLength,
    write(cp, at) {
      if (dest === null) return;
      const units = encodeUtf16CodePoint(cp);
      for (let i = 0; i < units.length; i++) {
        const unit = units[i];
        dest[at + i] = swap ? swap16(unit) : unit;
      }
    },
    terminate(at) {
      if (dest !== null) dest[at] = 0;
    },
  };
}

export function createUtf32Sink(dest: Uint32Array | null, swap: boolean): UnitSink {
  return {
    capacity: dest === null ? null : dest.length,
    unitsFor: () => 1,
    write(cp, at) {
      if (dest !== null) dest[at] = swap ? swap32(cp) : cp;
    },
    terminate(at) {
      if (dest !== null) dest[at] = 0;
    },
  };
}
