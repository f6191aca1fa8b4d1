/**
 * Unicode Transcoder
 * Public API for UTF-8/16/32 conversion and Unicode text scanning
 */

export {
  TRANSCODE_FLAGS,
  TRANSCODE_STATUS,
  NULL_TERMINATED,
  type TranscodeStatus,
  type TranscodeResult,
  type TranscodeOptions,
  type Encoding,
  type ByteOrder,
  type SourceByteOrder,
  type UnitArray,
} from './types.js';
export {
  MAX_CODE_POINT,
  REPLACEMENT_CODE_POINT,
  isValidCodePoint,
  isSurrogate,
  isHighSurrogate,
  isLowSurrogate,
  isInvalidUtf8Octet,
  utf8EncodedLength,
  utf16EncodedLength,
  encodeUtf8CodePoint,
  encodeUtf16CodePoint,
  combineSurrogates,
} from './code-point.js';
export { decodeUtf8CodePoint, type DecodeStep } from './decoders.js';
export {
  hostByteOrder,
  swap16,
  swap32,
  swapUtf16Endian,
  swapUtf32Endian,
  type ConcreteByteOrder,
} from './endian.js';
export {
  utf8HasBom,
  utf16HasBom,
  utf16IsBomLe,
  utf16IsBomBe,
  utf32HasBom,
  utf32IsBomLe,
  utf32IsBomBe,
} from './bom.js';
export {
  transcode,
  measure,
  type DestSpec,
  type SourceSpec,
  type TranscodeRequest,
} from './transcode.js';
export * from './conversions.js';
export {
  NOT_FOUND,
  isUnicodeWhitespace,
  isUnicodeNewline,
  ltrimOffset,
  rtrimOffset,
  findNextWhitespace,
  findNextLine,
  countLineBreaks,
  isNullOrWhitespace,
  utf32IsNullOrWhitespace,
  type LineBreak,
} from './whitespace.js';
export {
  toTranscodeError,
  encodeUtf8,
  decodeUtf8,
  stringToUtf16,
  utf16ToString,
  stringToUtf32,
  utf32ToString,
} from './strings.js';
export {
  WIRE_ENCODINGS,
  isWireEncoding,
  transcodeBytes,
  type WireEncoding,
} from './bytes.js';
