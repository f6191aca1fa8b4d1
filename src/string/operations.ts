/**
 * Chainable Operations
 * Curried forms of the DynamicString mutations for Result pipelines.
 *
 * @example
 * newString('hello')
 *   .andThen(append(', world'))
 *   .andThen(replaceAll('l', 'L'))
 *   .map((str) => str.toString()) // Ok('heLLo, worLd')
 */

import type { FormatArg } from '../format/types.js';
import type { DynamicString, StringInput, StringResult } from './dynamic-string.js';

export type StringOperation = (str: DynamicString) => StringResult;

export const set =
  (input: StringInput): StringOperation =>
  (str) =>
    str.set(input);

export const setFormatted =
  (fmt: string, ...args: FormatArg[]): StringOperation =>
  (str) =>
    str.setFormatted(fmt, ...args);

export const append =
  (input: StringInput): StringOperation =>
  (str) =>
    str.append(input);

export const appendFormatted =
  (fmt: string, ...args: FormatArg[]): StringOperation =>
  (str) =>
    str.appendFormatted(fmt, ...args);

export const prepend =
  (input: StringInput): StringOperation =>
  (str) =>
    str.prepend(input);

export const prependFormatted =
  (fmt: string, ...args: FormatArg[]): StringOperation =>
  (str) =>
    str.prependFormatted(fmt, ...args);

export const removeRange =
  (begin: number, end: number): StringOperation =>
  (str) =>
    str.removeRange(begin, end);

export const replace =
  (offset: number, count: number, input: StringInput): StringOperation =>
  (str) =>
    str.replace(offset, count, input);

export const replaceAll =
  (query: StringInput, replacement: StringInput): StringOperation =>
  (str) =>
    str.replaceAll(query, replacement);

export const trim: StringOperation = (str) => str.trim();
