/**
 * Floating-Point Conversions
 * %f %e %E %g %G %a %A and the metric-suffix scaling
 */

import type { DirectiveFlags } from './directive.js';
import { groupDigits, leadSign, type Rendered } from './layout.js';
import type { FormatConfig } from './types.js';

const DEFAULT_PRECISION = 6;
/** Largest fraction length Number.prototype.toFixed accepts */
const MAX_NATIVE_PRECISION = 100;
/** Hex digits a double's 52-bit fraction fills */
const HEX_FRACTION_DIGITS = 13;
const MAX_METRIC_STEPS = 4;
const MASK_64 = (1n << 64n) - 1n;

export interface FloatOptions {
  readonly flags: DirectiveFlags;
  /** -1 when no precision was written */
  readonly precision: number;
  readonly upper: boolean;
  readonly config: FormatConfig;
}

// ============================================================
// SHARED
// ============================================================

function isNegative(value: number): boolean {
  return value < 0 || Object.is(value, -0);
}

/** NaN and infinities print as words, no digits */
function special(value: number, flags: DirectiveFlags): Rendered | null {
  if (Number.isNaN(value)) {
    return { lead: leadSign(false, flags), body: 'NaN', tail: '' };
  }
  if (!Number.isFinite(value)) {
    return { lead: leadSign(value < 0, flags), body: 'Inf', tail: '' };
  }
  return null;
}

/** Non-negative magnitude as plain decimal with `precision` fraction digits */
function fixedDigits(magnitude: number, precision: number): string {
  const native = Math.min(precision, MAX_NATIVE_PRECISION);
  const extra = '0'.repeat(precision - native);
  if (magnitude < 1e21) {
    return magnitude.toFixed(native) + extra;
  }
  // toFixed switches to exponent notation from 1e21
  const whole = BigInt(magnitude).toString();
  return precision > 0 ? `${whole}.${'0'.repeat(precision)}` : whole;
}

/** "123.45" -> grouped whole part plus configured decimal separator */
function localize(text: string, flags: DirectiveFlags, config: FormatConfig): string {
  const dot = text.indexOf('.');
  const whole = dot === -1 ? text : text.slice(0, dot);
  const grouped = flags.group
    ? groupDigits(whole, 3, config.thousandsSeparator)
    : whole;
  return dot === -1 ? grouped : `${grouped}${config.decimalSeparator}${text.slice(dot + 1)}`;
}

function trimFractionZeros(text: string): string {
  if (!text.includes('.')) {
    return text;
  }
  return text.replace(/0+$/, '').replace(/\.$/, '');
}

/** "1.5e+3" -> { mantissa: '1.5', exponent: 3 } */
function splitExponential(text: string): { mantissa: string; exponent: number } {
  const marker = text.indexOf('e');
  return {
    mantissa: text.slice(0, marker),
    exponent: Number(text.slice(marker + 1)),
  };
}

function exponentTail(letter: string, exponent: number, minDigits: number): string {
  const sign = exponent < 0 ? '-' : '+';
  return `${letter}${sign}${String(Math.abs(exponent)).padStart(minDigits, '0')}`;
}

// ============================================================
// METRIC SUFFIX
// ============================================================

interface Scaled {
  readonly magnitude: number;
  readonly steps: number;
}

function scaleMetric(magnitude: number, flags: DirectiveFlags): Scaled {
  if (flags.metric === 0) {
    return { magnitude, steps: 0 };
  }
  const divisor = flags.metric >= 2 ? 1024 : 1000;
  let scaled = magnitude;
  let steps = 0;
  while (steps < MAX_METRIC_STEPS && scaled >= divisor) {
    scaled /= divisor;
    steps++;
  }
  return { magnitude: scaled, steps };
}

/**
 * `$` picks k M G T over 1000, `$$` picks Ki Mi Gi Ti over 1024 and
 * `$$$` drops the 'i'. A space precedes the suffix unless '_' is set,
 * even when no scaling happened.
 */
function metricTail(flags: DirectiveFlags, steps: number): string {
  if (flags.metric === 0) {
    return '';
  }
  let tail = flags.metricNoSpace ? '' : ' ';
  if (steps > 0) {
    tail += (flags.metric >= 2 ? '_KMGT' : '_kMGT').charAt(steps);
    if (flags.metric === 2) {
      tail += 'i';
    }
  }
  return tail;
}

// ============================================================
// CONVERSIONS
// ============================================================

/** %f; also the target of metric-scaled integers */
export function renderFixed(value: number, options: FloatOptions): Rendered {
  const { flags, config } = options;
  const word = special(value, flags);
  if (word) return word;

  const scaled = scaleMetric(Math.abs(value), flags);
  const precision = options.precision < 0 ? DEFAULT_PRECISION : options.precision;
  return {
    lead: leadSign(isNegative(value), flags),
    body: localize(fixedDigits(scaled.magnitude, precision), flags, config),
    tail: metricTail(flags, scaled.steps),
  };
}

/** %e %E: at least two exponent digits */
export function renderExponent(value: number, options: FloatOptions): Rendered {
  const { flags, config } = options;
  const word = special(value, flags);
  if (word) return word;

  const precision = options.precision < 0 ? DEFAULT_PRECISION : options.precision;
  const native = Math.min(precision, MAX_NATIVE_PRECISION);
  const { mantissa, exponent } = splitExponential(Math.abs(value).toExponential(native));
  return {
    lead: leadSign(isNegative(value), flags),
    body: localize(mantissa + '0'.repeat(precision - native), flags, config),
    tail: exponentTail(options.upper ? 'E' : 'e', exponent, 2),
  };
}

/**
 * %g %G: exponent form when the decimal exponent is below -4 or at least
 * the precision, fixed form otherwise; trailing fraction zeros are dropped.
 */
export function renderGeneral(value: number, options: FloatOptions): Rendered {
  const { flags, config } = options;
  const word = special(value, flags);
  if (word) return word;

  let significant = options.precision < 0 ? DEFAULT_PRECISION : options.precision;
  if (significant === 0) significant = 1;
  significant = Math.min(significant, MAX_NATIVE_PRECISION);

  const magnitude = Math.abs(value);
  const lead = leadSign(isNegative(value), flags);
  const { mantissa, exponent } = splitExponential(magnitude.toExponential(significant - 1));

  if (exponent < -4 || exponent >= significant) {
    return {
      lead,
      body: localize(trimFractionZeros(mantissa), flags, config),
      tail: exponentTail(options.upper ? 'E' : 'e', exponent, 2),
    };
  }

  const fractionDigits = Math.min(significant - 1 - exponent, MAX_NATIVE_PRECISION);
  const fixed = trimFractionZeros(magnitude.toFixed(fractionDigits));
  return { lead, body: localize(fixed, flags, config), tail: '' };
}

/**
 * %a %A: hexadecimal significand, binary exponent.
 * Precision defaults to 6 hex digits and rounds half up.
 */
export function renderHexFloat(value: number, options: FloatOptions): Rendered {
  const { flags, config, upper } = options;
  const word = special(value, flags);
  if (word) return word;

  const precision = options.precision < 0 ? DEFAULT_PRECISION : options.precision;
  const view = new DataView(new ArrayBuffer(8));
  view.setFloat64(0, value);
  const bits = view.getBigUint64(0);

  let exponent = Number((bits >> 52n) & 0x7ffn) - 1023;
  let significand = bits & ((1n << 52n) - 1n);
  if (exponent === -1023) {
    exponent = significand === 0n ? 0 : -1022;
  } else {
    significand |= 1n << 52n;
  }

  // leading digit in bits 60..63, fraction digits below it
  significand <<= 8n;
  if (precision < 15) {
    significand += (8n << 56n) >> BigInt(precision * 4);
  }

  const digitAt = (n: bigint): string => {
    const digit = Number((n >> 60n) & 15n).toString(16);
    return upper ? digit.toUpperCase() : digit;
  };

  const leading = digitAt(significand);
  significand = (significand << 4n) & MASK_64;

  const written = Math.min(precision, HEX_FRACTION_DIGITS);
  let fraction = '';
  for (let i = 0; i < written; i++) {
    fraction += digitAt(significand);
    significand = (significand << 4n) & MASK_64;
  }
  fraction += '0'.repeat(precision - written);

  return {
    lead: `${leadSign(isNegative(value), flags)}0x`,
    body: precision > 0 ? `${leading}${config.decimalSeparator}${fraction}` : leading,
    tail: exponentTail(upper ? 'P' : 'p', exponent, 1),
  };
}
