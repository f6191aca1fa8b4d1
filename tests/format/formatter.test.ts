/**
 * Formatter Tests
 * Conversions, flags, argument errors and buffered output
 */

import { describe, expect, it } from 'vitest';
import { FormatError } from '../../src/error-classes.js';
import {
  FORMAT_CHUNK_SIZE,
  format,
  formatChunks,
  formatToBuffer,
  formatWith,
  parseDirective,
  type CountRef,
} from '../../src/format/index.js';

const EUROPEAN = { thousandsSeparator: '.', decimalSeparator: ',' };

describe('format', () => {
  describe('integers', () => {
    it.each([
      ['%d', 42, '42'],
      ['%i', -7, '-7'],
      ['%5d', 42, '   42'],
      ['%-5d|', 42, '42   |'],
      ['%05d', -42, '-0042'],
      ['%+d', 5, '+5'],
      ['% d', 5, ' 5'],
      ['%.3d', 7, '007'],
      ["%'d", 1234567, '1,234,567'],
      ['%d', 3.9, '3'],
      ['%d', 2147483648, '-2147483648'],
      ['%u', -1, '4294967295'],
      ['%hd', 7, '7'],
    ])('%s of %s is %s', (fmt, value, expected) => {
      expect(format(fmt, value)).toBe(expected);
    });

    it('formats 64-bit values from bigints', () => {
      expect(format('%lld', 2n ** 63n)).toBe('-9223372036854775808');
      expect(format('%llu', 2n ** 64n - 1n)).toBe('18446744073709551615');
      expect(format('%I64d', 2n ** 40n)).toBe('1099511627776');
    });

    it('takes width from the argument list', () => {
      expect(format('[%*d]', 5, 42)).toBe('[   42]');
      expect(format('[%*d]', -5, 42)).toBe('[42   ]');
      expect(format('[%.*d]', 3, 4)).toBe('[004]');
    });
  });

  describe('radix conversions', () => {
    it.each([
      ['%x', 255, 'ff'],
      ['%X', 255, 'FF'],
      ['%#x', 255, '0xff'],
      ['%#X', 255, '0XFF'],
      ['%#x', 0, '0'],
      ['%.0x', 0, ''],
      ['%o', 8, '10'],
      ['%#o', 8, '010'],
      ['%b', 5, '101'],
      ['%#B', 5, '0B101'],
      ['%x', -1, 'ffffffff'],
      ['%lx', -1, 'ffffffffffffffff'],
      ["%'x", 0x12345678, '1234,5678'],
      ['%#06x', 255, '0x00ff'],
    ])('%s of %s is %s', (fmt, value, expected) => {
      expect(format(fmt, value)).toBe(expected);
    });

    it('prints pointers as 16 hex digits', () => {
      expect(format('%p', 255)).toBe('00000000000000ff');
    });
  });

  describe('metric suffixes', () => {
    it('scales by 1000 with a single $', () => {
      expect(format('%$d', 1200)).toBe('1.2 k');
      expect(format('%$d', 2500000)).toBe('2.5 M');
    });

    it('keeps the separating space for unscaled values', () => {
      expect(format('%$d', 500)).toBe('500 ');
    });

    it('scales by 1024 with binary suffixes', () => {
      expect(format('%$$d', 2048)).toBe('2.0 Ki');
      expect(format('%$$$d', 2048)).toBe('2.0 K');
    });

    it('drops the space with _', () => {
      expect(format('%_$d', 1500)).toBe('1.5k');
    });

    it('honors an explicit precision', () => {
      expect(format('%$.2f', 1234)).toBe('1.23 k');
    });
  });

  describe('floating point', () => {
    it.each([
      ['%f', 3.14159, '3.141590'],
      ['%.1f', 0.26, '0.3'],
      ['%8.2f', -1.5, '   -1.50'],
      ['%e', 1.5, '1.500000e+00'],
      ['%E', 12345.678, '1.234568E+04'],
      ['%.2e', 0, '0.00e+00'],
      ['%g', 0.0001, '0.0001'],
      ['%g', 100, '100'],
      ['%g', 1234567, '1.23457e+06'],
      ['%g', 0.00001, '1e-05'],
      ['%G', 1e-10, '1E-10'],
      ['%a', 1, '0x1.000000p+0'],
      ['%a', 0.5, '0x1.000000p-1'],
      ['%A', 255, '0x1.FE0000P+7'],
      ['%.0a', 1, '0x1p+0'],
    ])('%s of %s is %s', (fmt, value, expected) => {
      expect(format(fmt, value)).toBe(expected);
    });

    it('prints non-finite values as words', () => {
      expect(format('%f', Number.NaN)).toBe('NaN');
      expect(format('%f', -Infinity)).toBe('-Inf');
      expect(format('%+e', Infinity)).toBe('+Inf');
    });

    it('keeps the sign of negative zero', () => {
      expect(format('%.1f', -0)).toBe('-0.0');
    });

    it('groups and localizes with a custom configuration', () => {
      expect(formatWith(EUROPEAN, "%'.2f", [1234.5])).toBe('1.234,50');
      expect(format("%'.2f", 1234.5)).toBe('1,234.50');
    });
  });

  describe('strings and characters', () => {
    it('formats strings with width and precision', () => {
      expect(format('[%5s]', 'ab')).toBe('[   ab]');
      expect(format('[%-5s]', 'ab')).toBe('[ab   ]');
      expect(format('[%.2s]', 'hello')).toBe('[he]');
      expect(format('[%05s]', 'ab')).toBe('[000ab]');
    });

    it('prints null strings as null', () => {
      expect(format('%s', null)).toBe('null');
    });

    it('accepts code points and strings for %c', () => {
      expect(format('%c%c', 65, 'é')).toBe('Aé');
    });

    it('prints %% and unknown conversions literally', () => {
      expect(format('100%% %q')).toBe('100% q');
    });

    it('stops at a dangling percent sign', () => {
      expect(format('abc%')).toBe('abc');
    });

    it('stores the output position for %n', () => {
      const ref: CountRef = { value: -1 };
      expect(format('ab%ncd', ref)).toBe('abcd');
      expect(ref.value).toBe(2);
    });
  });

  describe('errors', () => {
    it('throws TEXT-F001 for a mismatched argument', () => {
      expect(() => format('%d', 'x')).toThrow(FormatError);
      expect(() => format('%d', 'x')).toThrow(
        'Conversion %d cannot format argument of type string'
      );
      expect(() => format('%s', 5)).toThrow('Conversion %s cannot format argument of type number');
      expect(() => format('%n', 5)).toThrow('Conversion %n cannot format argument of type number');
    });

    it('throws TEXT-F002 when arguments run out', () => {
      expect(() => format('%d %d', 1)).toThrow('Missing argument 2 for format string');
    });
  });
});

describe('parseDirective', () => {
  it('reads flags, width, precision and length', () => {
    const directive = parseDirective("x%-'08.3lld", 1);
    expect(directive.flags.leftJustify).toBe(true);
    expect(directive.flags.group).toBe(true);
    expect(directive.flags.zeroPad).toBe(true);
    expect(directive.width).toBe(8);
    expect(directive.precision).toBe(3);
    expect(directive.wide).toBe(true);
    expect(directive.conversion).toBe('d');
    expect(directive.end).toBe(11);
  });

  it('ends the flag run at 0', () => {
    const directive = parseDirective('%0-5d', 0);
    expect(directive.flags.zeroPad).toBe(true);
    expect(directive.flags.leftJustify).toBe(false);
    expect(directive.conversion).toBe('-');
  });

  it('treats I32 as a 32-bit modifier', () => {
    expect(parseDirective('%I32d', 0).wide).toBe(false);
    expect(parseDirective('%I64d', 0).wide).toBe(true);
  });
});

describe('formatToBuffer', () => {
  it('writes a terminated string when it fits', () => {
    const dest = new Uint8Array(8).fill(0xff);
    expect(formatToBuffer(dest, '%d-%d', [1, 2])).toEqual({ length: 3, truncated: false });
    expect(Array.from(dest.subarray(0, 4))).toEqual([0x31, 0x2d, 0x32, 0]);
  });

  it('truncates and keeps room for the terminator', () => {
    const dest = new Uint8Array(6);
    expect(formatToBuffer(dest, 'hello %s', ['world'])).toEqual({
      length: 11,
      truncated: true,
    });
    expect(new TextDecoder().decode(dest.subarray(0, 5))).toBe('hello');
    expect(dest[5]).toBe(0);
  });

  it('never splits a multi-byte character', () => {
    const dest = new Uint8Array(3);
    expect(formatToBuffer(dest, 'a%s', ['é'])).toEqual({ length: 3, truncated: true });
    expect(Array.from(dest)).toEqual([0x61, 0, 0]);
  });

  it('reports the full length for an empty buffer', () => {
    expect(formatToBuffer(new Uint8Array(0), 'abc', [])).toEqual({ length: 3, truncated: true });
  });
});

describe('formatChunks', () => {
  const long = 'x'.repeat(1000);

  it('delivers fixed-size chunks and a shorter remainder', () => {
    const sizes: number[] = [];
    const emitted = formatChunks((chunk) => {
      sizes.push(chunk.length);
    }, '%s', [long]);
    expect(sizes).toEqual([FORMAT_CHUNK_SIZE, 1000 - FORMAT_CHUNK_SIZE]);
    expect(emitted).toBe(1000);
  });

  it('stops when the callback returns false', () => {
    const chunks: string[] = [];
    const emitted = formatChunks((chunk) => {
      chunks.push(chunk);
      return false;
    }, '%s%s', [long, long]);
    expect(chunks).toHaveLength(1);
    expect(emitted).toBe(FORMAT_CHUNK_SIZE);
  });

  it('delivers short output in a single call', () => {
    const chunks: string[] = [];
    formatChunks((chunk) => {
      chunks.push(chunk);
    }, 'n=%d', [3]);
    expect(chunks).toEqual(['n=3']);
  });
});
