/**
 * Formatter
 * printf-style rendering to strings, byte buffers and chunk callbacks
 */

import { FormatError } from '../error-classes.js';
import { isUtf8Continuation } from '../unicode/code-point.js';
import { encodeUtf8 } from '../unicode/strings.js';
import {
  FROM_ARGUMENT,
  parseDirective,
  type Directive,
  type DirectiveFlags,
  type DirectiveSize,
} from './directive.js';
import {
  renderExponent,
  renderFixed,
  renderGeneral,
  renderHexFloat,
  type FloatOptions,
} from './floats.js';
import { renderDecimal, renderPointer, renderRadix, toFixedWidth } from './integers.js';
import { layoutField, type Rendered } from './layout.js';
import {
  DEFAULT_FORMAT_CONFIG,
  FORMAT_CHUNK_SIZE,
  type BufferFormatResult,
  type ChunkCallback,
  type CountRef,
  type FormatArg,
  type FormatConfig,
} from './types.js';

// ============================================================
// ARGUMENTS
// ============================================================

function describeArg(arg: FormatArg): string {
  if (arg === null) return 'null';
  return typeof arg;
}

function isCountRef(arg: FormatArg): arg is CountRef {
  return typeof arg === 'object' && arg !== null && typeof arg.value === 'number';
}

/** Sequential reader over the argument list */
class ArgumentCursor {
  private index = 0;

  constructor(private readonly args: readonly FormatArg[]) {}

  next(): FormatArg {
    if (this.index >= this.args.length) {
      throw new FormatError('TEXT-F002', { index: this.index + 1 });
    }
    const arg = this.args[this.index];
    this.index++;
    return arg;
  }

  numeric(conversion: string): number | bigint {
    const arg = this.next();
    if (typeof arg === 'bigint') return arg;
    if (typeof arg === 'number' && Number.isFinite(arg)) return arg;
    throw new FormatError('TEXT-F001', { conversion, type: describeArg(arg) });
  }

  float(conversion: string): number {
    const arg = this.next();
    if (typeof arg === 'number') return arg;
    if (typeof arg === 'bigint') return Number(arg);
    throw new FormatError('TEXT-F001', { conversion, type: describeArg(arg) });
  }

  /** `*` width or precision */
  size(): number {
    const arg = this.numeric('*');
    return Number(arg);
  }
}

// ============================================================
// OUTPUT
// ============================================================

/** Buffers output into fixed-size chunks for a callback */
class ChunkWriter {
  private pending = '';
  private stopped = false;
  private delivered = 0;

  constructor(
    private readonly callback: ChunkCallback,
    private readonly chunkSize: number
  ) {}

  /** Returns false once the callback has asked to stop */
  write(text: string): boolean {
    this.pending += text;
    while (!this.stopped && this.pending.length >= this.chunkSize) {
      this.deliver(this.pending.slice(0, this.chunkSize));
      this.pending = this.pending.slice(this.chunkSize);
    }
    return !this.stopped;
  }

  /** Characters handed to the callback */
  get emitted(): number {
    return this.delivered;
  }

  /** Characters accepted so far, delivered or pending */
  get position(): number {
    return this.delivered + this.pending.length;
  }

  flush(): void {
    if (!this.stopped && this.pending.length > 0) {
      this.deliver(this.pending);
      this.pending = '';
    }
  }

  private deliver(chunk: string): void {
    this.delivered += chunk.length;
    if (this.callback(chunk) === false) {
      this.stopped = true;
    }
  }
}

// ============================================================
// CONVERSION
// ============================================================

interface ResolvedDirective {
  readonly directive: Directive;
  readonly flags: DirectiveFlags;
  readonly width: number;
  readonly precision: number;
}

function resolveSizes(directive: Directive, args: ArgumentCursor): ResolvedDirective {
  const flags = { ...directive.flags };
  let width = resolveSize(directive.width, args);
  if (width < 0) {
    flags.leftJustify = true;
    width = -width;
  }
  const precision = resolveSize(directive.precision, args);
  return { directive, flags, width, precision: precision < 0 ? -1 : precision };
}

function resolveSize(size: DirectiveSize, args: ArgumentCursor): number {
  return size === FROM_ARGUMENT ? Math.trunc(args.size()) : size;
}

function floatOptions(resolved: ResolvedDirective, config: FormatConfig): FloatOptions {
  const conversion = resolved.directive.conversion;
  return {
    flags: resolved.flags,
    precision: resolved.precision,
    upper: conversion === conversion.toUpperCase(),
    config,
  };
}

function renderString(arg: FormatArg, precision: number): Rendered {
  if (arg !== null && typeof arg !== 'string') {
    throw new FormatError('TEXT-F001', { conversion: 's', type: describeArg(arg) });
  }
  const text = arg ?? 'null';
  return { lead: '', body: precision >= 0 ? text.slice(0, precision) : text, tail: '' };
}

function renderChar(arg: FormatArg): Rendered {
  if (typeof arg === 'string' && arg.length > 0) {
    return { lead: '', body: String.fromCodePoint(arg.codePointAt(0) ?? 0), tail: '' };
  }
  if (typeof arg === 'number' && Number.isInteger(arg) && arg >= 0 && arg <= 0x10ffff) {
    return { lead: '', body: String.fromCodePoint(arg), tail: '' };
  }
  throw new FormatError('TEXT-F001', { conversion: 'c', type: describeArg(arg) });
}

/** %d %i %u, scaled to a float when a '$' flag is present */
function renderInteger(
  resolved: ResolvedDirective,
  args: ArgumentCursor,
  config: FormatConfig
): Rendered {
  const { directive, flags, precision } = resolved;
  const signed = directive.conversion !== 'u';
  const value = toFixedWidth(args.numeric(directive.conversion), directive.wide, signed);

  if (flags.metric > 0) {
    const negative = value < 0n;
    const magnitude = negative ? -value : value;
    let metricPrecision = precision;
    if (magnitude < 1024n) {
      metricPrecision = 0;
    } else if (precision < 0) {
      metricPrecision = 1;
    }
    const scaled = Number(magnitude);
    return renderFixed(negative ? -scaled : scaled, {
      flags,
      precision: metricPrecision,
      upper: false,
      config,
    });
  }

  return renderDecimal(value, flags, precision, config);
}

/**
 * Render one directive. Returns null for %n, which writes to its argument
 * instead of producing output.
 */
function renderDirective(
  resolved: ResolvedDirective,
  args: ArgumentCursor,
  config: FormatConfig,
  position: number
): Rendered | null {
  const { directive, flags, precision } = resolved;
  const conversion = directive.conversion;

  switch (conversion) {
    case 's':
      return renderString(args.next(), precision);
    case 'c':
      return renderChar(args.next());
    case 'n': {
      const ref = args.next();
      if (!isCountRef(ref)) {
        throw new FormatError('TEXT-F001', { conversion, type: describeArg(ref) });
      }
      ref.value = position;
      return null;
    }
    case 'd':
    case 'i':
    case 'u':
      return renderInteger(resolved, args, config);
    case 'x':
    case 'X':
      return renderRadix(
        toFixedWidth(args.numeric(conversion), directive.wide, false),
        16,
        conversion === 'X',
        flags,
        precision,
        config
      );
    case 'o':
      return renderRadix(
        toFixedWidth(args.numeric(conversion), directive.wide, false),
        8,
        false,
        flags,
        precision,
        config
      );
    case 'b':
    case 'B':
      return renderRadix(
        toFixedWidth(args.numeric(conversion), directive.wide, false),
        2,
        conversion === 'B',
        flags,
        precision,
        config
      );
    case 'p':
      flags.zeroPad = false;
      return renderPointer(toFixedWidth(args.numeric(conversion), true, false), flags, config);
    case 'f':
      return renderFixed(args.float(conversion), floatOptions(resolved, config));
    case 'e':
    case 'E':
      return renderExponent(args.float(conversion), floatOptions(resolved, config));
    case 'g':
    case 'G':
      return renderGeneral(args.float(conversion), floatOptions(resolved, config));
    case 'a':
    case 'A':
      return renderHexFloat(args.float(conversion), floatOptions(resolved, config));
    default:
      // '%%' and unknown conversions print the character itself
      return { lead: '', body: conversion, tail: '' };
  }
}

/**
 * Walk the format string, handing literal runs and fields to the writer.
 * Stops early once the writer refuses more output.
 */
function run(
  fmt: string,
  args: readonly FormatArg[],
  config: FormatConfig,
  writer: ChunkWriter
): void {
  const cursor = new ArgumentCursor(args);
  let pos = 0;

  while (pos < fmt.length) {
    const percent = fmt.indexOf('%', pos);
    if (percent === -1) {
      writer.write(fmt.slice(pos));
      return;
    }
    if (percent > pos && !writer.write(fmt.slice(pos, percent))) {
      return;
    }

    const directive = parseDirective(fmt, percent);
    if (directive.conversion === '') {
      return;
    }

    const resolved = resolveSizes(directive, cursor);
    const field = renderDirective(resolved, cursor, config, writer.position);
    if (field && !writer.write(layoutField(field, resolved.width, resolved.flags))) {
      return;
    }
    pos = directive.end;
  }
}

// ============================================================
// PUBLIC API
// ============================================================

/**
 * Render with explicit separators.
 *
 * @throws FormatError (TEXT-F001) when an argument does not fit its conversion
 * @throws FormatError (TEXT-F002) when arguments run out
 *
 * @example
 * formatWith({ thousandsSeparator: '.', decimalSeparator: ',' }, "%'.2f", [1234.5])
 * // '1.234,50'
 */
export function formatWith(
  config: FormatConfig,
  fmt: string,
  args: readonly FormatArg[]
): string {
  const parts: string[] = [];
  const writer = new ChunkWriter((chunk) => {
    parts.push(chunk);
  }, FORMAT_CHUNK_SIZE);
  run(fmt, args, config, writer);
  writer.flush();
  return parts.join('');
}

/**
 * Render with the default separators.
 *
 * @example
 * format("%'d items, %$d", 1234567, 1200) // '1,234,567 items, 1.2 k'
 */
export function format(fmt: string, ...args: FormatArg[]): string {
  return formatWith(DEFAULT_FORMAT_CONFIG, fmt, args);
}

/**
 * Render as UTF-8 into `dest`, always leaving room for a zero terminator.
 * Output that does not fit is cut at a code point boundary.
 */
export function formatToBuffer(
  dest: Uint8Array,
  fmt: string,
  args: readonly FormatArg[],
  config: FormatConfig = DEFAULT_FORMAT_CONFIG
): BufferFormatResult {
  const bytes = encodeUtf8(formatWith(config, fmt, args));
  if (dest.length === 0) {
    return { length: bytes.length, truncated: bytes.length > 0 };
  }

  let count = Math.min(bytes.length, dest.length - 1);
  if (count < bytes.length) {
    while (count > 0 && isUtf8Continuation(bytes[count])) {
      count--;
    }
  }
  dest.set(bytes.subarray(0, count));
  dest[count] = 0;
  return { length: bytes.length, truncated: count < bytes.length };
}

/**
 * Stream output to `callback` in FORMAT_CHUNK_SIZE pieces; the last piece
 * may be shorter. Returning false from the callback stops formatting.
 *
 * @returns characters delivered to the callback
 */
export function formatChunks(
  callback: ChunkCallback,
  fmt: string,
  args: readonly FormatArg[],
  config: FormatConfig = DEFAULT_FORMAT_CONFIG
): number {
  const writer = new ChunkWriter(callback, FORMAT_CHUNK_SIZE);
  run(fmt, args, config, writer);
  writer.flush();
  return writer.emitted;
}
