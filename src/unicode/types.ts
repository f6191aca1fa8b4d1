/**
 * Transcoder Types
 * Status codes, flags and result shapes shared by every conversion
 */

// ============================================================
// FLAGS
// ============================================================

/** Bitmask options accepted by every conversion */
export const TRANSCODE_FLAGS = {
  NONE: 0,
  /** Fail with `bom-rejected` instead of skipping a leading byte-order mark */
  FORBID_BOM: 1 << 1,
  /** Fail with `invalid-code-point` instead of substituting U+FFFD */
  ERROR_ON_INVALID_CODE_POINT: 1 << 2,
} as const;

/** Source length sentinel: scan to the first zero unit */
export const NULL_TERMINATED = -1;

// ============================================================
// STATUS
// ============================================================

export const TRANSCODE_STATUS = {
  SUCCESS: 'success',
  INVALID_ARGUMENT: 'invalid-argument',
  INVALID_CODE_POINT: 'invalid-code-point',
  BOM_REJECTED: 'bom-rejected',
  OUT_OF_SPACE: 'out-of-space',
} as const;

export type TranscodeStatus =
  (typeof TRANSCODE_STATUS)[keyof typeof TRANSCODE_STATUS];

/**
 * Outcome of a measure or materialize call.
 * Counts are populated on failure too, so callers can resume or report.
 */
export interface TranscodeResult {
  readonly status: TranscodeStatus;
  /** Destination units produced (required units in measure mode), terminator excluded */
  readonly length: number;
  /** Source units consumed, including a skipped byte-order mark */
  readonly processed: number;
}

// ============================================================
// ENCODINGS AND BYTE ORDER
// ============================================================

export type Encoding = 'utf8' | 'utf16' | 'utf32';

/** Concrete byte order; 'native' resolves to the host order at call time */
export type ByteOrder = 'native' | 'le' | 'be';

/** Source byte order; 'detect' lets a leading BOM choose, else native */
export type SourceByteOrder = ByteOrder | 'detect';

export interface TranscodeOptions {
  /** Bitmask of TRANSCODE_FLAGS (default 0) */
  readonly flags?: number | undefined;
  /** Source units to read; omitted reads the whole view, NULL_TERMINATED scans for zero */
  readonly length?: number | undefined;
}

export type UnitArray = Uint8Array | Uint16Array | Uint32Array;
