/**
 * Dynamic String
 * Growable UTF-8 byte string tracking length and capacity.
 *
 * Every mutation returns a Result. A failed mutation leaves the content
 * untouched, and chaining with `andThen` stops at the first failure.
 */

import { TextDecoder } from 'node:util';
import { err, ok, type Result } from 'neverthrow';
import { StringError, type StringErrorKind } from '../error-classes.js';
import { formatWith } from '../format/formatter.js';
import { DEFAULT_FORMAT_CONFIG, type FormatArg, type FormatConfig } from '../format/types.js';
import { encodeUtf8 } from '../unicode/strings.js';
import { ltrimOffset, rtrimOffset } from '../unicode/whitespace.js';

// ============================================================
// TYPES
// ============================================================

export type StringResult = Result<DynamicString, StringError>;

/** Content accepted by mutations: text is encoded as UTF-8 */
export type StringInput = string | Uint8Array | DynamicString;

export interface DynamicStringOptions {
  /** Largest capacity growth may reach; defaults to Number.MAX_SAFE_INTEGER */
  readonly maxCapacity?: number | undefined;
  /** Separators for the *Formatted operations */
  readonly formatConfig?: FormatConfig | undefined;
}

export const STRING_STATUS = {
  SUCCESS: 'success',
  OUT_OF_MEMORY: 'out-of-memory',
  INVALID_ARGUMENT: 'invalid-argument',
} as const;

export type StringStatus = 'success' | StringErrorKind;

const TEXT_DECODER = new TextDecoder('utf-8', { ignoreBOM: true });

// ============================================================
// HELPERS
// ============================================================

function isSize(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0;
}

function invalid(reason: string): StringError {
  return new StringError('TEXT-S002', { reason });
}

function toBytes(input: StringInput): Uint8Array {
  if (typeof input === 'string') {
    return encodeUtf8(input);
  }
  if (input instanceof DynamicString) {
    return input.bytes();
  }
  return input;
}

function indexOfBytes(haystack: Uint8Array, needle: Uint8Array, from: number): number {
  outer: for (let i = from; i + needle.length <= haystack.length; i++) {
    for (let j = 0; j < needle.length; j++) {
      if (haystack[i + j] !== needle[j]) continue outer;
    }
    return i;
  }
  return -1;
}

// ============================================================
// DYNAMIC STRING
// ============================================================

export class DynamicString {
  private buffer: Uint8Array;
  private size = 0;
  readonly maxCapacity: number;
  readonly formatConfig: FormatConfig;

  private constructor(capacity: number, maxCapacity: number, formatConfig: FormatConfig) {
    this.buffer = new Uint8Array(capacity);
    this.maxCapacity = maxCapacity;
    this.formatConfig = formatConfig;
  }

  /** Empty string with room for `capacity` bytes */
  static withCapacity(capacity: number, options: DynamicStringOptions = {}): StringResult {
    const maxCapacity = options.maxCapacity ?? Number.MAX_SAFE_INTEGER;
    if (!isSize(capacity)) {
      return err(invalid(`capacity must be a non-negative integer, got ${capacity}`));
    }
    if (!isSize(maxCapacity)) {
      return err(invalid(`maxCapacity must be a non-negative integer, got ${maxCapacity}`));
    }
    if (capacity > maxCapacity) {
      return err(new StringError('TEXT-S001', { required: capacity, maxCapacity }));
    }
    return ok(
      new DynamicString(capacity, maxCapacity, options.formatConfig ?? DEFAULT_FORMAT_CONFIG)
    );
  }

  // ============================================================
  // QUERIES
  // ============================================================

  /** Content length in bytes */
  get length(): number {
    return this.size;
  }

  /** Bytes the content may occupy before growing */
  get capacity(): number {
    return this.buffer.length;
  }

  /** Copy of the content bytes */
  bytes(): Uint8Array {
    return this.buffer.slice(0, this.size);
  }

  /** Content decoded as UTF-8; malformed bytes read as U+FFFD */
  toString(): string {
    return TEXT_DECODER.decode(this.buffer.subarray(0, this.size));
  }

  // ============================================================
  // MUTATIONS
  // ============================================================

  set(input: StringInput): StringResult {
    return this.splice(0, this.size, toBytes(input));
  }

  setFormatted(fmt: string, ...args: FormatArg[]): StringResult {
    return this.set(formatWith(this.formatConfig, fmt, args));
  }

  append(input: StringInput): StringResult {
    return this.splice(this.size, 0, toBytes(input));
  }

  appendFormatted(fmt: string, ...args: FormatArg[]): StringResult {
    return this.append(formatWith(this.formatConfig, fmt, args));
  }

  prepend(input: StringInput): StringResult {
    return this.splice(0, 0, toBytes(input));
  }

  prependFormatted(fmt: string, ...args: FormatArg[]): StringResult {
    return this.prepend(formatWith(this.formatConfig, fmt, args));
  }

  /**
   * Remove bytes [begin, end). `end` is clamped to the length; a range that
   * starts past the end or runs backwards leaves the content unchanged.
   */
  removeRange(begin: number, end: number): StringResult {
    if (!isSize(begin) || !isSize(end)) {
      return err(invalid(`range ${begin}..${end} must use non-negative integers`));
    }
    if (begin > end || begin > this.size) {
      return ok(this);
    }
    return this.splice(begin, Math.min(end, this.size) - begin, new Uint8Array(0));
  }

  /**
   * Replace `count` bytes at `offset` with `input`.
   * A range reaching past the end leaves the content unchanged.
   */
  replace(offset: number, count: number, input: StringInput): StringResult {
    if (!isSize(offset) || !isSize(count)) {
      return err(invalid(`replace range ${offset}+${count} must use non-negative integers`));
    }
    if (offset + count > this.size) {
      return ok(this);
    }
    return this.splice(offset, count, toBytes(input));
  }

  /**
   * Replace every occurrence of `query`. Scanning resumes after each
   * inserted replacement, so replacements are never rescanned.
   * An empty query leaves the content unchanged.
   */
  replaceAll(query: StringInput, replacement: StringInput): StringResult {
    const needle = toBytes(query);
    if (needle.length === 0) {
      return ok(this);
    }
    const insert = toBytes(replacement);
    const content = this.buffer.subarray(0, this.size);

    const matches: number[] = [];
    for (let at = indexOfBytes(content, needle, 0); at !== -1; ) {
      matches.push(at);
      at = indexOfBytes(content, needle, at + needle.length);
    }
    if (matches.length === 0) {
      return ok(this);
    }

    const required = this.size + matches.length * (insert.length - needle.length);
    const next = new Uint8Array(required);
    let read = 0;
    let write = 0;
    for (const at of matches) {
      next.set(content.subarray(read, at), write);
      write += at - read;
      next.set(insert, write);
      write += insert.length;
      read = at + needle.length;
    }
    next.set(content.subarray(read), write);

    return this.splice(0, this.size, next);
  }

  /** Strip leading and trailing Unicode whitespace */
  trim(): StringResult {
    const content = this.buffer.subarray(0, this.size);
    const start = ltrimOffset(content, this.size);
    const end = rtrimOffset(content, this.size);
    if (end <= start) {
      return this.splice(0, this.size, new Uint8Array(0));
    }
    return this.splice(0, this.size, content.slice(start, end));
  }

  // ============================================================
  // STORAGE
  // ============================================================

  /**
   * Grow to exactly `required` bytes when the current capacity is short.
   * Returns the failure without touching the buffer.
   */
  private reserve(required: number): StringError | null {
    if (required <= this.buffer.length) {
      return null;
    }
    if (required > this.maxCapacity) {
      return new StringError('TEXT-S001', { required, maxCapacity: this.maxCapacity });
    }
    const grown = new Uint8Array(required);
    grown.set(this.buffer.subarray(0, this.size));
    this.buffer = grown;
    return null;
  }

  /** Replace `removed` bytes at `offset` with `insert` */
  private splice(offset: number, removed: number, insert: Uint8Array): StringResult {
    const tailStart = offset + removed;
    const required = this.size - removed + insert.length;

    // insert may view this buffer; copy before shifting the tail
    const inserted = insert.buffer === this.buffer.buffer ? insert.slice() : insert;

    const failure = this.reserve(required);
    if (failure) {
      return err(failure);
    }

    this.buffer.copyWithin(offset + inserted.length, tailStart, this.size);
    this.buffer.set(inserted, offset);
    this.size = required;
    return ok(this);
  }
}

// ============================================================
// CREATION
// ============================================================

/** String holding `text` with capacity equal to its byte length */
export function newString(text: StringInput = '', options: DynamicStringOptions = {}): StringResult {
  const bytes = toBytes(text);
  return DynamicString.withCapacity(bytes.length, options).andThen((str) => str.set(bytes));
}

export function newStringWithCapacity(
  capacity: number,
  options: DynamicStringOptions = {}
): StringResult {
  return DynamicString.withCapacity(capacity, options);
}

/** String holding the first `length` bytes of `bytes` */
export function newStringFromSpan(
  bytes: Uint8Array,
  length: number,
  options: DynamicStringOptions = {}
): StringResult {
  if (!isSize(length) || length > bytes.length) {
    return err(invalid(`span length ${length} exceeds ${bytes.length} bytes`));
  }
  return newString(bytes.subarray(0, length), options);
}

/** String holding formatted output; separators come from options.formatConfig */
export function newStringFormatted(
  options: DynamicStringOptions,
  fmt: string,
  ...args: FormatArg[]
): StringResult {
  const config = options.formatConfig ?? DEFAULT_FORMAT_CONFIG;
  return newString(formatWith(config, fmt, args), options);
}

// ============================================================
// STATUS
// ============================================================

/**
 * Status of the last operation in a chain.
 *
 * @example
 * lastResult(newString('ab').andThen(append('c'))) // 'success'
 */
export function lastResult(result: StringResult): StringStatus {
  return result.match(
    () => STRING_STATUS.SUCCESS,
    (error) => error.kind
  );
}
