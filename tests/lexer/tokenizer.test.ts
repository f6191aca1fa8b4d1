/**
 * Lexer Tests
 * Token classification, offsets, line tracking and skip options
 */

import { describe, expect, it } from 'vitest';
import { LexerError } from '../../src/error-classes.js';
import {
  LEXER_STATUS,
  TOKEN_TYPES,
  createLexer,
  nextToken,
  tokenTypeName,
  tokenize,
  type LexerOptions,
  type Token,
} from '../../src/lexer/index.js';
import { NULL_TERMINATED } from '../../src/unicode/index.js';

/** [type name, text] pairs for compact assertions */
function describeTokens(source: string, options?: LexerOptions): [string, string][] {
  return tokenize(source, options).map((token) => [tokenTypeName(token.tag), token.text]);
}

describe('tokenize', () => {
  it('splits identifiers, operators, comments and strings', () => {
    const tokens = tokenize('abc123 == // comment\n"hi"');
    expect(
      tokens.map((t) => [tokenTypeName(t.tag), t.offset, t.length, t.line])
    ).toEqual([
      ['identifier', 0, 6, 1],
      ['whitespace', 6, 1, 1],
      ['==', 7, 2, 1],
      ['whitespace', 9, 1, 1],
      ['comment', 10, 10, 1],
      ['newline', 20, 1, 1],
      ['string-double', 21, 4, 2],
    ]);
  });

  it('advances the line counter on the newline token', () => {
    const state = createLexer('abc123 == // comment\n"hi"');
    const lines: number[] = [];
    for (let i = 0; i < 8; i++) {
      nextToken(state);
      lines.push(state.lineNumber);
    }
    expect(lines).toEqual([1, 1, 1, 1, 1, 2, 2, 2]);
  });

  it('skips configured layout tokens', () => {
    expect(describeTokens('a == 1', { skipWhitespace: true })).toEqual([
      ['identifier', 'a'],
      ['==', '=='],
      ['integer-dec', '1'],
    ]);
  });

  it('skips comments and newlines together', () => {
    const options = { skipWhitespace: true, skipNewlines: true, skipComments: true };
    expect(describeTokens('x /* a */\n// b\ny', options)).toEqual([
      ['identifier', 'x'],
      ['identifier', 'y'],
    ]);
  });

  it('reports skipped tokens to onToken', () => {
    const seen: string[] = [];
    tokenize('a b', { skipWhitespace: true, onToken: (t: Token) => seen.push(t.text) });
    expect(seen).toEqual(['a', ' ', 'b', '']);
  });

  it('reads CRLF as a single newline token', () => {
    const tokens = tokenize('a\r\nb');
    expect(tokens.map((t) => [t.text, t.line])).toEqual([
      ['a', 1],
      ['\r\n', 1],
      ['b', 2],
    ]);
  });

  it('cuts trailing whitespace before a line break', () => {
    expect(describeTokens('a  \nb')).toEqual([
      ['identifier', 'a'],
      ['whitespace', '  '],
      ['newline', '\n'],
      ['identifier', 'b'],
    ]);
  });

  it('advances the line number across multi-line comments and strings', () => {
    const tokens = tokenize('/* one\ntwo */ "a\nb" x');
    expect(tokens.map((t) => t.line)).toEqual([1, 2, 2, 3, 3]);
  });

  it('keeps multi-byte identifiers whole', () => {
    const tokens = tokenize('héllo wörld');
    expect(tokens.map((t) => [t.text, t.offset, t.length])).toEqual([
      ['héllo', 0, 6],
      [' ', 6, 1],
      ['wörld', 7, 6],
    ]);
  });

  it('accepts dashes in identifiers only when enabled', () => {
    expect(describeTokens('foo-bar')).toEqual([
      ['identifier', 'foo'],
      ["'-'", '-'],
      ['identifier', 'bar'],
    ]);
    expect(describeTokens('foo-bar', { allowDashesInIdentifiers: true })).toEqual([
      ['identifier', 'foo-bar'],
    ]);
  });

  it('uses custom comment markers', () => {
    const options = { lineCommentOpener: '#', blockCommentOpener: '{-', blockCommentCloser: '-}' };
    expect(describeTokens('# note\n{- x -}y', options)).toEqual([
      ['comment', '# note'],
      ['newline', '\n'],
      ['comment', '{- x -}'],
      ['identifier', 'y'],
    ]);
  });

  it('runs an unterminated block comment to the end', () => {
    expect(describeTokens('a /* open')).toEqual([
      ['identifier', 'a'],
      ['whitespace', ' '],
      ['comment', '/* open'],
    ]);
  });

  it('reaches end of input right after an unterminated block comment', () => {
    const state = createLexer('/* never closes');
    expect(nextToken(state)).toBe(LEXER_STATUS.SUCCESS);
    expect(state.token.length).toBe(15);
    expect(nextToken(state)).toBe(LEXER_STATUS.END_OF_INPUT);
    expect(state.token.length).toBe(0);
  });

  it('does not close a string on an escaped quote', () => {
    expect(describeTokens('"a\\"b"')).toEqual([['string-double', '"a\\"b"']]);
  });

  it('classifies single-quoted strings as string-double', () => {
    expect(describeTokens("'x'")).toEqual([['string-double', "'x'"]]);
  });

  it('emits a lone quote as a character token when no closing quote follows', () => {
    expect(describeTokens('"abc')).toEqual([
      ["'\"'", '"'],
      ['identifier', 'abc'],
    ]);
  });

  it('prefers the longest compound operator', () => {
    expect(describeTokens('a<<=b...c.d')).toEqual([
      ['identifier', 'a'],
      ['<<=', '<<='],
      ['identifier', 'b'],
      ['...', '...'],
      ['identifier', 'c'],
      ["'.'", '.'],
      ['identifier', 'd'],
    ]);
  });

  it('stops at the first zero byte with NULL_TERMINATED', () => {
    const source = new Uint8Array([0x61, 0x00, 0x62]);
    expect(tokenize(source, { length: NULL_TERMINATED }).map((t) => t.text)).toEqual(['a']);
  });

  it('rejects an empty comment marker', () => {
    expect(() => tokenize('a', { lineCommentOpener: '' })).toThrow(TypeError);
  });
});

describe('numeric literals', () => {
  const classify = (text: string): [string, string][] => describeTokens(text);

  it.each([
    ['42', 'integer-dec'],
    ['10ul', 'integer-dec'],
    ['019', 'integer-dec'],
    ['012', 'integer-oct'],
    ['0x1A', 'integer-hex'],
    ['0b101', 'integer-bin'],
    ['1.5', 'float-dec'],
    ['1.5e3', 'float-dec'],
    ['2e-7f', 'float-dec'],
    ['0x1A2.8p3f', 'float-hex'],
    ['0x1p-2', 'float-hex'],
  ])('%s is %s', (text, type) => {
    expect(classify(text)).toEqual([[type, text]]);
  });

  it('treats a lone zero as decimal', () => {
    expect(classify('0')).toEqual([['integer-dec', '0']]);
  });

  it('throws TEXT-L001 for an exponent without digits', () => {
    expect(() => tokenize('x = 1e+;')).toThrow(LexerError);
    try {
      tokenize('x = 1e+;');
    } catch (err) {
      expect(err).toBeInstanceOf(LexerError);
      if (err instanceof LexerError) {
        expect(err.errorId).toBe('TEXT-L001');
        expect(err.location).toEqual({ line: 1, offset: 4 });
        expect(err.message).toBe('Malformed numeric literal 1e+ at line 1');
      }
    }
  });

  it('rejects a hex fraction without a binary exponent', () => {
    expect(() => tokenize('0x1.8')).toThrow('Malformed numeric literal 0x1.8');
  });
});

describe('nextToken', () => {
  it('returns end-of-input with an empty EOF token', () => {
    const state = createLexer('');
    expect(nextToken(state)).toBe(LEXER_STATUS.END_OF_INPUT);
    expect(state.token.length).toBe(0);
    expect(tokenTypeName(state.token.tag)).toBe(TOKEN_TYPES.EOF);
  });

  it('leaves an error token and calls onError', () => {
    const errors: string[] = [];
    const state = createLexer('1e', { onError: (t: Token) => errors.push(t.text) });
    expect(nextToken(state)).toBe(LEXER_STATUS.INVALID_ARGUMENT);
    expect(tokenTypeName(state.token.tag)).toBe('error');
    expect(errors).toEqual(['1e']);
  });

  it('reports a character token by its code point', () => {
    const state = createLexer(';');
    nextToken(state);
    expect(state.token.tag).toEqual({ kind: 'char', codePoint: 0x3b });
  });
});
