/**
 * Field Layout
 * Sign leads, digit grouping and width padding for rendered fields
 */

import type { DirectiveFlags } from './directive.js';

/** A converted value before width padding */
export interface Rendered {
  /** Sign and radix prefix, kept ahead of zero padding */
  readonly lead: string;
  readonly body: string;
  /** Exponent or metric suffix */
  readonly tail: string;
}

export function leadSign(negative: boolean, flags: DirectiveFlags): string {
  if (negative) return '-';
  if (flags.plus) return '+';
  if (flags.space) return ' ';
  return '';
}

/**
 * Insert `separator` between groups of `size` digits, counted from the right.
 *
 * @example
 * groupDigits('1234567', 3, ',') // '1,234,567'
 */
export function groupDigits(digits: string, size: number, separator: string): string {
  if (digits.length <= size) {
    return digits;
  }
  const groups: string[] = [];
  let end = digits.length;
  while (end > 0) {
    const start = Math.max(0, end - size);
    groups.unshift(digits.slice(start, end));
    end = start;
  }
  return groups.join(separator);
}

/** Left-pad digits with zeros up to `minDigits` */
export function padDigits(digits: string, minDigits: number): string {
  return digits.length < minDigits ? digits.padStart(minDigits, '0') : digits;
}

/**
 * Pad a field to `width`.
 * Zero padding goes between the lead and the body; left-justification wins
 * over zero padding.
 */
export function layoutField(field: Rendered, width: number, flags: DirectiveFlags): string {
  const content = field.lead + field.body + field.tail;
  const padding = Math.max(0, width - content.length);
  if (padding === 0) {
    return content;
  }
  if (flags.leftJustify) {
    return content + ' '.repeat(padding);
  }
  if (flags.zeroPad) {
    return field.lead + '0'.repeat(padding) + field.body + field.tail;
  }
  return ' '.repeat(padding) + content;
}
