/**
 * String and Byte Conversion Tests
 * encodeUtf8/decodeUtf8, UTF-16/32 string helpers and transcodeBytes
 */

import { describe, expect, it } from 'vitest';
import { TranscodeError } from '../../src/error-classes.js';
import {
  TRANSCODE_FLAGS,
  decodeUtf8,
  encodeUtf8,
  isWireEncoding,
  stringToUtf16,
  stringToUtf32,
  transcodeBytes,
  utf16ToString,
  utf32ToString,
} from '../../src/unicode/index.js';

describe('string conversions', () => {
  it('encodes a string as UTF-8', () => {
    expect(Array.from(encodeUtf8('aé€'))).toEqual([0x61, 0xc3, 0xa9, 0xe2, 0x82, 0xac]);
  });

  it('encodes a lone surrogate as U+FFFD', () => {
    expect(Array.from(encodeUtf8('\udc00'))).toEqual([0xef, 0xbf, 0xbd]);
  });

  it('decodes UTF-8 and skips a leading BOM', () => {
    expect(decodeUtf8(new Uint8Array([0xef, 0xbb, 0xbf, 0x6f, 0x6b]))).toBe('ok');
  });

  it('throws TEXT-U002 for malformed input in strict mode', () => {
    const strict = { flags: TRANSCODE_FLAGS.ERROR_ON_INVALID_CODE_POINT };
    expect(() => decodeUtf8(new Uint8Array([0x61, 0xff]), strict)).toThrow(TranscodeError);
    try {
      decodeUtf8(new Uint8Array([0x61, 0xff]), strict);
    } catch (err) {
      expect(err).toBeInstanceOf(TranscodeError);
      if (err instanceof TranscodeError) {
        expect(err.errorId).toBe('TEXT-U002');
        expect(err.message).toBe('Invalid code point in utf8 input at unit 1');
      }
    }
  });

  it('throws TEXT-U003 when a forbidden BOM is present', () => {
    const bytes = new Uint8Array([0xef, 0xbb, 0xbf]);
    expect(() => decodeUtf8(bytes, { flags: TRANSCODE_FLAGS.FORBID_BOM })).toThrow(
      'Byte-order mark found in utf8 input'
    );
  });

  it('splits astral characters into UTF-32 code points', () => {
    expect(Array.from(stringToUtf32('a😀'))).toEqual([0x61, 0x1f600]);
    expect(utf32ToString(new Uint32Array([0x61, 0x1f600]))).toBe('a😀');
  });

  it('reads UTF-16 stored in an explicit order', () => {
    const units = stringToUtf16('hé', 'be');
    const bytes = new Uint8Array(units.buffer);
    expect(Array.from(bytes)).toEqual([0x00, 0x68, 0x00, 0xe9]);
    expect(utf16ToString(units, 'be')).toBe('hé');
  });
});

describe('transcodeBytes', () => {
  it('converts UTF-8 to big-endian UTF-16', () => {
    const out = transcodeBytes(new Uint8Array([0x68, 0x69]), 'utf8', 'utf16be');
    expect(Array.from(out)).toEqual([0x00, 0x68, 0x00, 0x69]);
  });

  it('converts little-endian UTF-16 to UTF-8', () => {
    const out = transcodeBytes(new Uint8Array([0x68, 0x00, 0x69, 0x00]), 'utf16le', 'utf8');
    expect(Array.from(out)).toEqual([0x68, 0x69]);
  });

  it('drops a source BOM', () => {
    const out = transcodeBytes(new Uint8Array([0xfe, 0xff, 0x00, 0x68]), 'utf16be', 'utf8');
    expect(Array.from(out)).toEqual([0x68]);
  });

  it('writes astral code points as big-endian UTF-32', () => {
    const out = transcodeBytes(new Uint8Array([0xf0, 0x9f, 0x98, 0x80]), 'utf8', 'utf32be');
    expect(Array.from(out)).toEqual([0x00, 0x01, 0xf6, 0x00]);
  });

  it('accepts an unaligned view', () => {
    const backing = new Uint8Array([0xaa, 0x41, 0x00]);
    const out = transcodeBytes(backing.subarray(1), 'utf16le', 'utf8');
    expect(Array.from(out)).toEqual([0x41]);
  });

  it('returns an empty array for empty input', () => {
    expect(transcodeBytes(new Uint8Array(0), 'utf8', 'utf32le').length).toBe(0);
  });

  it('throws TEXT-U001 for a partial code unit', () => {
    expect(() => transcodeBytes(new Uint8Array([0x68]), 'utf16le', 'utf8')).toThrow(
      'Invalid argument while transcoding utf16 to utf8'
    );
  });

  it('applies strict flags', () => {
    expect(() =>
      transcodeBytes(new Uint8Array([0xff]), 'utf8', 'utf16le', {
        flags: TRANSCODE_FLAGS.ERROR_ON_INVALID_CODE_POINT,
      })
    ).toThrow(TranscodeError);
  });

  it('recognizes wire encoding names', () => {
    expect(isWireEncoding('utf32le')).toBe(true);
    expect(isWireEncoding('latin1')).toBe(false);
  });
});
