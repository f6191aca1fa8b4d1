/**
 * ASCII Helpers
 * Comparison, case mapping and integer conversion over ASCII text.
 * Characters outside A-Z / a-z are compared and copied unchanged.
 */

// ============================================================
// CASE
// ============================================================

const CH_UPPER_A = 0x41;
const CH_UPPER_Z = 0x5a;
const CH_LOWER_A = 0x61;
const CH_LOWER_Z = 0x7a;
const CASE_OFFSET = CH_LOWER_A - CH_UPPER_A;

function lowerCode(code: number): number {
  return code >= CH_UPPER_A && code <= CH_UPPER_Z ? code + CASE_OFFSET : code;
}

function upperCode(code: number): number {
  return code >= CH_LOWER_A && code <= CH_LOWER_Z ? code - CASE_OFFSET : code;
}

function mapCodes(text: string, map: (code: number) => number): string {
  let out = '';
  for (let i = 0; i < text.length; i++) {
    out += String.fromCharCode(map(text.charCodeAt(i)));
  }
  return out;
}

export function asciiToLower(text: string): string {
  return mapCodes(text, lowerCode);
}

export function asciiToUpper(text: string): string {
  return mapCodes(text, upperCode);
}

// ============================================================
// COMPARISON
// ============================================================

/** Code at index, 0 past the end */
function codeAt(text: string, index: number): number {
  return index < text.length ? text.charCodeAt(index) : 0;
}

function compare(
  a: string,
  b: string,
  limit: number,
  fold: (code: number) => number
): number {
  for (let i = 0; i < limit; i++) {
    const ca = fold(codeAt(a, i));
    const cb = fold(codeAt(b, i));
    if (ca !== cb) {
      return ca - cb;
    }
    if (ca === 0) {
      return 0;
    }
  }
  return 0;
}

const identity = (code: number): number => code;

/** Negative, zero or positive as `a` sorts before, equal to or after `b` */
export function strcmp(a: string, b: string): number {
  return compare(a, b, Math.max(a.length, b.length) + 1, identity);
}

/** strcmp over at most `count` characters */
export function strncmp(a: string, b: string, count: number): number {
  return compare(a, b, count, identity);
}

/** strcmp ignoring ASCII case */
export function stricmp(a: string, b: string): number {
  return compare(a, b, Math.max(a.length, b.length) + 1, lowerCode);
}

export function strnicmp(a: string, b: string, count: number): number {
  return compare(a, b, count, lowerCode);
}

// ============================================================
// SEARCH
// ============================================================

export function beginsWith(text: string, prefix: string): boolean {
  return text.startsWith(prefix);
}

export function endsWith(text: string, suffix: string): boolean {
  return text.endsWith(suffix);
}

/** Index of the first occurrence of `other`, or -1 */
export function findSubstring(text: string, other: string): number {
  return text.indexOf(other);
}

/** True for a non-empty run of 0-9 */
export function isAllDigits(text: string): boolean {
  return /^[0-9]+$/.test(text);
}

// ============================================================
// INTEGER CONVERSION
// ============================================================

export interface ParsedInteger {
  readonly value: number;
  /** Characters consumed, sign and prefix included */
  readonly consumed: number;
}

function digitValue(code: number): number {
  if (code >= 0x30 && code <= 0x39) return code - 0x30;
  const lower = lowerCode(code);
  if (lower >= CH_LOWER_A && lower <= CH_LOWER_Z) return lower - CH_LOWER_A + 10;
  return Number.POSITIVE_INFINITY;
}

/** Radix from a `0x`, `0b` or leading-`0` prefix, and the prefix length */
function detectRadix(text: string, start: number): { radix: number; prefix: number } {
  if (text.charAt(start) !== '0') {
    return { radix: 10, prefix: 0 };
  }
  const marker = text.charAt(start + 1);
  if ((marker === 'x' || marker === 'X') && digitValue(codeAt(text, start + 2)) < 16) {
    return { radix: 16, prefix: 2 };
  }
  if ((marker === 'b' || marker === 'B') && digitValue(codeAt(text, start + 2)) < 2) {
    return { radix: 2, prefix: 2 };
  }
  if (digitValue(codeAt(text, start + 1)) < 8) {
    return { radix: 8, prefix: 1 };
  }
  return { radix: 10, prefix: 0 };
}

function parseDigits(text: string, start: number): ParsedInteger | null {
  const { radix, prefix } = detectRadix(text, start);
  let pos = start + prefix;
  let value = 0;
  while (pos < text.length && digitValue(text.charCodeAt(pos)) < radix) {
    value = value * radix + digitValue(text.charCodeAt(pos));
    pos++;
  }
  if (pos === start + prefix) {
    return null;
  }
  return { value, consumed: pos };
}

/**
 * Parse a leading unsigned integer. `0x` selects hex, `0b` binary and a
 * leading `0` octal; parsing stops at the first character outside the radix.
 *
 * @example
 * parseUnsigned('0x1fz') // { value: 31, consumed: 4 }
 * parseUnsigned('z')     // null
 */
export function parseUnsigned(text: string): ParsedInteger | null {
  return parseDigits(text, 0);
}

/** parseUnsigned with an optional leading '+' or '-' */
export function parseInteger(text: string): ParsedInteger | null {
  const sign = text.charAt(0);
  if (sign !== '-' && sign !== '+') {
    return parseDigits(text, 0);
  }
  const parsed = parseDigits(text, 1);
  if (!parsed) {
    return null;
  }
  return { value: sign === '-' ? -parsed.value : parsed.value, consumed: parsed.consumed };
}

/**
 * Render an integer in `radix` (2-36) with lowercase digits.
 * Only radix 10 carries a minus sign; other radices print the magnitude.
 *
 * @throws RangeError for a radix outside 2-36 or a non-integer value
 */
export function intToString(value: number, radix = 10): string {
  if (!Number.isInteger(radix) || radix < 2 || radix > 36) {
    throw new RangeError(`radix must be between 2 and 36, got ${radix}`);
  }
  if (!Number.isSafeInteger(value)) {
    throw new RangeError(`value must be a safe integer, got ${value}`);
  }
  const magnitude = Math.abs(value).toString(radix);
  return value < 0 && radix === 10 ? `-${magnitude}` : magnitude;
}
