/**
 * CLI Shared Utilities
 * Common formatting functions for the textkit CLI
 */

import { readFileSync } from 'node:fs';
import { TextkitError, LexerError } from './error-classes.js';
import { tokenTypeName, type Token } from './lexer/token-types.js';

/**
 * Format error for stderr output
 *
 * @param err - The error to format
 * @returns Formatted error message
 */
export function formatError(err: Error): string {
  if (err instanceof LexerError) {
    const location = err.location;
    return `Lexer error at line ${location.line}: ${err.toData().message} [${err.errorId}]`;
  }

  if (err instanceof TextkitError) {
    return `${err.message} [${err.errorId}]`;
  }

  // Handle file not found errors (ENOENT)
  if ('code' in err && err.code === 'ENOENT' && 'path' in err) {
    return `File not found: ${String(err.path)}`;
  }

  return err.message;
}

/**
 * One token per line: `line:offset type "text"`.
 * Text is JSON-quoted so newlines stay on one line.
 */
export function formatToken(token: Token): string {
  return `${token.line}:${token.offset} ${tokenTypeName(token.tag)} ${JSON.stringify(token.text)}`;
}

/**
 * Read the package version from package.json next to the build output.
 * Returns '0.0.0' when the file cannot be read.
 */
export function readVersion(): string {
  try {
    const content = readFileSync(new URL('../package.json', import.meta.url), 'utf-8');
    const parsed: unknown = JSON.parse(content);
    if (
      typeof parsed === 'object' &&
      parsed !== null &&
      'version' in parsed &&
      typeof parsed.version === 'string'
    ) {
      return parsed.version;
    }
  } catch (err) {
    if (!(err instanceof Error)) throw err;
  }
  return '0.0.0';
}
