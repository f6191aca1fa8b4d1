/**
 * Directive Parsing
 * Reads flags, width, precision and length modifiers after a '%'
 */

// ============================================================
// TYPES
// ============================================================

export interface DirectiveFlags {
  leftJustify: boolean;
  plus: boolean;
  space: boolean;
  /** '#': radix prefixes */
  alternate: boolean;
  zeroPad: boolean;
  /** "'": digit grouping */
  group: boolean;
  /** Number of '$' flags seen (0-3) */
  metric: number;
  /** '_': no space before the metric suffix */
  metricNoSpace: boolean;
}

/** Width or precision written as '*', resolved from the argument list */
export const FROM_ARGUMENT = 'argument';

export type DirectiveSize = number | typeof FROM_ARGUMENT;

export interface Directive {
  readonly flags: DirectiveFlags;
  readonly width: DirectiveSize;
  /** -1 when no precision was written */
  readonly precision: DirectiveSize;
  /** True for 64-bit length modifiers (l, ll, j, z, t, I, I64) */
  readonly wide: boolean;
  /** Conversion character, or '' when the format ends mid-directive */
  readonly conversion: string;
  /** Index just past the directive */
  readonly end: number;
}

// ============================================================
// PARSING
// ============================================================

function emptyFlags(): DirectiveFlags {
  return {
    leftJustify: false,
    plus: false,
    space: false,
    alternate: false,
    zeroPad: false,
    group: false,
    metric: 0,
    metricNoSpace: false,
  };
}

function isDigitChar(char: string): boolean {
  return char >= '0' && char <= '9';
}

/** Reads flags; a '0' ends the flag run and the rest is width */
function readFlags(fmt: string, start: number, flags: DirectiveFlags): number {
  let pos = start;
  for (;;) {
    switch (fmt.charAt(pos)) {
      case '-':
        flags.leftJustify = true;
        break;
      case '+':
        flags.plus = true;
        break;
      case ' ':
        flags.space = true;
        break;
      case '#':
        flags.alternate = true;
        break;
      case "'":
        flags.group = true;
        break;
      case '$':
        flags.metric = Math.min(flags.metric + 1, 3);
        break;
      case '_':
        flags.metricNoSpace = true;
        break;
      case '0':
        flags.zeroPad = true;
        return pos + 1;
      default:
        return pos;
    }
    pos++;
  }
}

function readSize(fmt: string, start: number): { size: DirectiveSize; end: number } {
  if (fmt.charAt(start) === '*') {
    return { size: FROM_ARGUMENT, end: start + 1 };
  }
  let pos = start;
  let size = 0;
  while (isDigitChar(fmt.charAt(pos))) {
    size = size * 10 + (fmt.charCodeAt(pos) - 0x30);
    pos++;
  }
  return { size, end: pos };
}

/** Skips a length modifier and reports whether it selects 64-bit integers */
function readLength(fmt: string, start: number): { wide: boolean; end: number } {
  switch (fmt.charAt(start)) {
    case 'h':
      return { wide: false, end: fmt.charAt(start + 1) === 'h' ? start + 2 : start + 1 };
    case 'l':
      return { wide: true, end: fmt.charAt(start + 1) === 'l' ? start + 2 : start + 1 };
    case 'j':
    case 'z':
    case 't':
      return { wide: true, end: start + 1 };
    case 'I':
      if (fmt.startsWith('64', start + 1)) {
        return { wide: true, end: start + 3 };
      }
      if (fmt.startsWith('32', start + 1)) {
        return { wide: false, end: start + 3 };
      }
      return { wide: true, end: start + 1 };
    default:
      return { wide: false, end: start };
  }
}

/**
 * Parse the directive whose '%' sits at `percent`.
 *
 * @example
 * parseDirective("%-'08.3lld", 0)
 * // { flags: { leftJustify, group, zeroPad }, width: 8, precision: 3, wide: true, conversion: 'd', end: 10 }
 */
export function parseDirective(fmt: string, percent: number): Directive {
  const flags = emptyFlags();
  let pos = readFlags(fmt, percent + 1, flags);

  const width = readSize(fmt, pos);
  pos = width.end;

  let precision: DirectiveSize = -1;
  if (fmt.charAt(pos) === '.') {
    const read = readSize(fmt, pos + 1);
    precision = read.size;
    pos = read.end;
  }

  const length = readLength(fmt, pos);
  pos = length.end;

  const conversion = fmt.charAt(pos);
  return {
    flags,
    width: width.size,
    precision,
    wide: length.wide,
    conversion,
    end: conversion === '' ? pos : pos + 1,
  };
}
