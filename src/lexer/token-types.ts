/**
 * Token Types
 * Named token categories and the token shape produced by the lexer
 */

export const TOKEN_TYPES = {
  // Stream markers
  EOF: 'eof',
  ERROR: 'error',

  // Layout
  WHITESPACE: 'whitespace',
  NEWLINE: 'newline',
  COMMENT: 'comment',

  // Words and literals
  IDENTIFIER: 'identifier',
  STRING_DOUBLE: 'string-double',
  STRING_SINGLE: 'string-single',
  INTEGER_DEC: 'integer-dec',
  INTEGER_HEX: 'integer-hex',
  INTEGER_OCT: 'integer-oct',
  INTEGER_BIN: 'integer-bin',
  FLOAT_DEC: 'float-dec',
  FLOAT_HEX: 'float-hex',

  // Compound operators
  EQ_EQ: '==',
  NOT_EQ: '!=',
  LT_EQ: '<=',
  GT_EQ: '>=',
  AND_AND: '&&',
  OR_OR: '||',
  PLUS_PLUS: '++',
  MINUS_MINUS: '--',
  PLUS_EQ: '+=',
  MINUS_EQ: '-=',
  MUL_EQ: '*=',
  DIV_EQ: '/=',
  MOD_EQ: '%=',
  AND_EQ: '&=',
  OR_EQ: '|=',
  XOR_EQ: '^=',
  SHL: '<<',
  SHR: '>>',
  SHL_EQ: '<<=',
  SHR_EQ: '>>=',
  COLON_COLON: '::',
  ELLIPSIS: '...',
} as const;

export type TokenType = (typeof TOKEN_TYPES)[keyof typeof TOKEN_TYPES];

/**
 * Token classification: a literal single character, or a named category.
 * Single-quoted strings carry STRING_DOUBLE like double-quoted ones;
 * STRING_SINGLE is reserved and never produced.
 */
export type TokenTag =
  | { readonly kind: 'char'; readonly codePoint: number }
  | { readonly kind: 'named'; readonly type: TokenType };

export interface Token {
  readonly tag: TokenTag;
  /** Byte offset of the token in the UTF-8 source */
  readonly offset: number;
  /** Byte length; 0 only for end-of-input */
  readonly length: number;
  /** Line the token starts on (1-based) */
  readonly line: number;
  /** Token text decoded from the source bytes */
  readonly text: string;
}

export function namedTag(type: TokenType): TokenTag {
  return { kind: 'named', type };
}

export function charTag(codePoint: number): TokenTag {
  return { kind: 'char', codePoint };
}

export function isNamedToken(tag: TokenTag, type: TokenType): boolean {
  return tag.kind === 'named' && tag.type === type;
}

/** Display name: the category name, or the quoted character */
export function tokenTypeName(tag: TokenTag): string {
  if (tag.kind === 'named') {
    return tag.type;
  }
  return `'${String.fromCodePoint(tag.codePoint)}'`;
}
