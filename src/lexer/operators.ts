/**
 * Operator Tables
 * Compound operators keyed by their first character, longest first
 */

import { TOKEN_TYPES, type TokenType } from './token-types.js';

export const COMPOUND_OPERATORS: Readonly<
  Record<string, readonly (readonly [string, TokenType])[]>
> = {
  '=': [['==', TOKEN_TYPES.EQ_EQ]],
  '!': [['!=', TOKEN_TYPES.NOT_EQ]],
  '<': [
    ['<<=', TOKEN_TYPES.SHL_EQ],
    ['<=', TOKEN_TYPES.LT_EQ],
    ['<<', TOKEN_TYPES.SHL],
  ],
  '>': [
    ['>>=', TOKEN_TYPES.SHR_EQ],
    ['>=', TOKEN_TYPES.GT_EQ],
    ['>>', TOKEN_TYPES.SHR],
  ],
  '&': [
    ['&&', TOKEN_TYPES.AND_AND],
    ['&=', TOKEN_TYPES.AND_EQ],
  ],
  '|': [
    ['||', TOKEN_TYPES.OR_OR],
    ['|=', TOKEN_TYPES.OR_EQ],
  ],
  '+': [
    ['++', TOKEN_TYPES.PLUS_PLUS],
    ['+=', TOKEN_TYPES.PLUS_EQ],
  ],
  '-': [
    ['--', TOKEN_TYPES.MINUS_MINUS],
    ['-=', TOKEN_TYPES.MINUS_EQ],
  ],
  '*': [['*=', TOKEN_TYPES.MUL_EQ]],
  '/': [['/=', TOKEN_TYPES.DIV_EQ]],
  '%': [['%=', TOKEN_TYPES.MOD_EQ]],
  '^': [['^=', TOKEN_TYPES.XOR_EQ]],
  ':': [['::', TOKEN_TYPES.COLON_COLON]],
  '.': [['...', TOKEN_TYPES.ELLIPSIS]],
};
