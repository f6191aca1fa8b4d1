/**
 * Formatter public API
 */

export { format, formatWith, formatToBuffer, formatChunks } from './formatter.js';
export { parseDirective, type Directive, type DirectiveFlags } from './directive.js';
export {
  DEFAULT_FORMAT_CONFIG,
  FORMAT_CHUNK_SIZE,
  type BufferFormatResult,
  type ChunkCallback,
  type CountRef,
  type FormatArg,
  type FormatConfig,
} from './types.js';
