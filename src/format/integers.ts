/**
 * Integer Conversions
 * %d %i %u %x %X %o %b %B %p over 32- or 64-bit values
 */

import type { DirectiveFlags } from './directive.js';
import { groupDigits, leadSign, padDigits, type Rendered } from './layout.js';
import type { FormatConfig } from './types.js';

export type Radix = 2 | 8 | 16;

/** Digits per separator group under the "'" flag */
const GROUP_SIZES: Readonly<Record<Radix | 10, number>> = {
  2: 8,
  8: 3,
  10: 3,
  16: 4,
};

/**
 * Wrap a numeric argument to the directive's integer width.
 * Fractions truncate toward zero.
 */
export function toFixedWidth(value: number | bigint, wide: boolean, signed: boolean): bigint {
  const big = typeof value === 'bigint' ? value : BigInt(Math.trunc(value));
  const bits = wide ? 64 : 32;
  return signed ? BigInt.asIntN(bits, big) : BigInt.asUintN(bits, big);
}

/** %d %i %u; precision is a minimum digit count (-1 when unset) */
export function renderDecimal(
  value: bigint,
  flags: DirectiveFlags,
  precision: number,
  config: FormatConfig
): Rendered {
  const negative = value < 0n;
  const magnitude = negative ? -value : value;
  let digits = padDigits(magnitude.toString(), precision);
  if (flags.group) {
    digits = groupDigits(digits, GROUP_SIZES[10], config.thousandsSeparator);
  }
  return { lead: leadSign(negative, flags), body: digits, tail: '' };
}

function radixPrefix(radix: Radix, upper: boolean): string {
  switch (radix) {
    case 16:
      return upper ? '0X' : '0x';
    case 2:
      return upper ? '0B' : '0b';
    case 8:
      return '0';
  }
}

/**
 * %x %X %o %b %B; the value is already unsigned.
 * Zero drops the '#' prefix and prints nothing under precision 0.
 */
export function renderRadix(
  value: bigint,
  radix: Radix,
  upper: boolean,
  flags: DirectiveFlags,
  precision: number,
  config: FormatConfig
): Rendered {
  if (value === 0n && precision === 0) {
    return { lead: '', body: '', tail: '' };
  }

  let digits = padDigits(value.toString(radix), precision);
  if (upper) {
    digits = digits.toUpperCase();
  }
  if (flags.group) {
    digits = groupDigits(digits, GROUP_SIZES[radix], config.thousandsSeparator);
  }

  const lead = flags.alternate && value !== 0n ? radixPrefix(radix, upper) : '';
  return { lead, body: digits, tail: '' };
}

/** %p: 64-bit lowercase hex padded to 16 digits */
export function renderPointer(
  value: bigint,
  flags: DirectiveFlags,
  config: FormatConfig
): Rendered {
  return renderRadix(BigInt.asUintN(64, value), 16, false, flags, 16, config);
}
