/**
 * Formatter Types
 * Argument, configuration and output shapes shared by the format entry points
 */

// ============================================================
// ARGUMENTS
// ============================================================

/** Receives the number of characters written so far (`%n`) */
export interface CountRef {
  value: number;
}

/**
 * A single format argument.
 * Numbers and bigints feed numeric conversions, strings and null feed `%s`,
 * a CountRef feeds `%n`.
 */
export type FormatArg = number | bigint | string | null | CountRef;

// ============================================================
// CONFIGURATION
// ============================================================

/** Separators used by the `'` flag and by floating-point output */
export interface FormatConfig {
  readonly thousandsSeparator: string;
  readonly decimalSeparator: string;
}

export const DEFAULT_FORMAT_CONFIG: FormatConfig = {
  thousandsSeparator: ',',
  decimalSeparator: '.',
};

// ============================================================
// OUTPUT
// ============================================================

/** Characters per chunk handed to a ChunkCallback */
export const FORMAT_CHUNK_SIZE = 512;

/** Return false to stop formatting */
export type ChunkCallback = (chunk: string) => boolean | void;

export interface BufferFormatResult {
  /** Full UTF-8 byte length of the output, terminator excluded */
  readonly length: number;
  /** True when the destination could not hold the whole output */
  readonly truncated: boolean;
}
