/**
 * Lexer public API
 */

export {
  TOKEN_TYPES,
  charTag,
  isNamedToken,
  namedTag,
  tokenTypeName,
  type Token,
  type TokenTag,
  type TokenType,
} from './token-types.js';
export {
  DEFAULT_LEXER_OPTIONS,
  LEXER_STATUS,
  createLexer,
  resolveLexerOptions,
  type LexerCallbacks,
  type LexerOptions,
  type LexerState,
  type LexerStatus,
  type ResolvedLexerOptions,
} from './state.js';
export { nextToken, tokenize } from './tokenizer.js';
export { transformToken, tokenValue } from './transform.js';
