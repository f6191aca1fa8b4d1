/**
 * Dynamic string public API
 */

export {
  DynamicString,
  STRING_STATUS,
  lastResult,
  newString,
  newStringFormatted,
  newStringFromSpan,
  newStringWithCapacity,
  type DynamicStringOptions,
  type StringInput,
  type StringResult,
  type StringStatus,
} from './dynamic-string.js';
export * from './operations.js';
