/**
 * Token Value Tests
 * transformToken, tokenValue and comment stripping
 */

import { describe, expect, it } from 'vitest';
import { LexerError } from '../../src/error-classes.js';
import {
  createLexer,
  nextToken,
  tokenValue,
  transformToken,
  type LexerOptions,
} from '../../src/lexer/index.js';
import { stripComments } from '../../src/strip-comments.js';

/** Value of the first token of `source` */
function firstValue(source: string, options?: LexerOptions): string {
  const state = createLexer(source, options);
  nextToken(state);
  return tokenValue(state);
}

describe('transformToken', () => {
  it('unquotes strings and collapses escapes', () => {
    expect(firstValue('"a\\nb"')).toBe('a\nb');
    expect(firstValue('"\\t\\r\\f\\0"')).toBe('\t\r\f\0');
    expect(firstValue("'it\\'s'")).toBe("it's");
  });

  it('consumes an escaped backslash before reading the next byte', () => {
    expect(firstValue('"\\\\n"')).toBe('\\n');
  });

  it('leaves numeric escapes as written', () => {
    expect(firstValue('"\\x41\\u00e9"')).toBe('\\x41\\u00e9');
  });

  it('strips comment markers', () => {
    expect(firstValue('// note')).toBe(' note');
    expect(firstValue('/* body */')).toBe(' body ');
    expect(firstValue('/* open')).toBe(' open');
    expect(firstValue('# hash', { lineCommentOpener: '#' })).toBe(' hash');
  });

  it('returns other tokens byte for byte', () => {
    expect(firstValue('name')).toBe('name');
    expect(firstValue('0x1Fu')).toBe('0x1Fu');
  });

  it('returns a dynamic string sized to the value', () => {
    const state = createLexer('"abc"');
    nextToken(state);
    const value = transformToken(state)._unsafeUnwrap();
    expect(value.length).toBe(3);
    expect(value.capacity).toBe(3);
  });

  it('fails with invalid-argument for an error token', () => {
    const state = createLexer('1e');
    nextToken(state);
    const result = transformToken(state);
    expect(result.isErr()).toBe(true);
    expect(result._unsafeUnwrapErr().kind).toBe('invalid-argument');
  });

  it('throws TEXT-L002 from tokenValue for an error token', () => {
    const state = createLexer('\n1e');
    nextToken(state);
    nextToken(state);
    expect(() => tokenValue(state)).toThrow(LexerError);
    expect(() => tokenValue(state)).toThrow('Cannot transform error token at line 2');
  });
});

describe('stripComments', () => {
  it('keeps the newline that ends a line comment', () => {
    expect(stripComments('a = 1; // note\nb = 2;')).toBe('a = 1; \nb = 2;');
  });

  it('removes block comments entirely', () => {
    expect(stripComments('x/* one\ntwo */y')).toBe('xy');
  });

  it('leaves comment markers inside strings alone', () => {
    expect(stripComments('s = "// not a comment";')).toBe('s = "// not a comment";');
  });

  it('honors custom markers', () => {
    expect(stripComments('a # b\nc', { lineCommentOpener: '#' })).toBe('a \nc');
  });

  it('throws TEXT-L001 for a malformed literal', () => {
    expect(() => stripComments('x = 3e;')).toThrow('Malformed numeric literal 3e');
  });
});
