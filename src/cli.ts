#!/usr/bin/env node
/**
 * CLI Entry Point
 *
 * textkit tokenize | strip-comments | transcode | explain
 */

import { readFileSync, writeFileSync } from 'node:fs';
import { formatError, formatToken, readVersion } from './cli-shared.js';
import { explainError } from './cli-explain.js';
import {
  loadConfig,
  loadConfigFile,
  transcodeFlags,
  type TextkitConfig,
} from './config.js';
import { tokenize } from './lexer/tokenizer.js';
import type { Token } from './lexer/token-types.js';
import { stripComments } from './strip-comments.js';
import {
  WIRE_ENCODINGS,
  isWireEncoding,
  transcodeBytes,
  type WireEncoding,
} from './unicode/bytes.js';

// ============================================================
// ARGUMENT PARSING
// ============================================================

interface CommonArgs {
  file: string;
  verbose: boolean;
  /** Explicit configuration file; undefined searches the working directory */
  config: string | undefined;
}

/**
 * Parsed command-line arguments
 */
export type ParsedArgs =
  | ({ mode: 'tokenize' | 'strip-comments' } & CommonArgs)
  | ({
      mode: 'transcode';
      from: WireEncoding;
      to: WireEncoding;
      out: string | undefined;
    } & CommonArgs)
  | { mode: 'explain'; errorId: string }
  | { mode: 'help' | 'version' };

const VALUE_OPTIONS = new Set(['--from', '--to', '--out', '--config']);
const FLAG_OPTIONS = new Set(['--verbose']);

function parseEncoding(option: string, value: string | undefined): WireEncoding {
  if (value === undefined) {
    throw new Error(`${option} requires argument: ${WIRE_ENCODINGS.join(', ')}`);
  }
  if (!isWireEncoding(value)) {
    throw new Error(`Invalid encoding: ${value}. Expected ${WIRE_ENCODINGS.join(', ')}`);
  }
  return value;
}

/**
 * Parse command-line arguments
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 * @returns Parsed command object
 * @throws Error on unknown options, unknown commands or missing arguments
 */
export function parseArgs(argv: string[]): ParsedArgs {
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { mode: 'version' };
  }

  const positionals: string[] = [];
  const values = new Map<string, string>();
  let verbose = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;

    if (!arg.startsWith('-')) {
      positionals.push(arg);
      continue;
    }
    if (FLAG_OPTIONS.has(arg)) {
      verbose = true;
      continue;
    }
    if (!VALUE_OPTIONS.has(arg)) {
      throw new Error(`Unknown option: ${arg}`);
    }

    const value = argv[i + 1];
    if (value === undefined || value.startsWith('-')) {
      throw new Error(`${arg} requires argument`);
    }
    values.set(arg, value);
    i++;
  }

  const [command, target] = positionals;
  if (command === undefined) {
    throw new Error('Missing command');
  }

  if (command === 'explain') {
    if (target === undefined) {
      throw new Error('Missing error ID argument');
    }
    return { mode: 'explain', errorId: target };
  }

  if (command !== 'tokenize' && command !== 'strip-comments' && command !== 'transcode') {
    throw new Error(`Unknown command: ${command}`);
  }
  if (target === undefined) {
    throw new Error('Missing file argument');
  }

  const common: CommonArgs = { file: target, verbose, config: values.get('--config') };
  if (command === 'transcode') {
    return {
      mode: 'transcode',
      ...common,
      from: parseEncoding('--from', values.get('--from')),
      to: parseEncoding('--to', values.get('--to')),
      out: values.get('--out'),
    };
  }
  return { mode: command, ...common };
}

// ============================================================
// COMMANDS
// ============================================================

/**
 * Token listing for `textkit tokenize`.
 * `trace` receives every scanned token, skipped ones included.
 */
export function runTokenize(
  source: Uint8Array,
  config: TextkitConfig,
  trace?: (token: Token) => void
): string[] {
  return tokenize(source, { ...config.lexer, onToken: trace }).map(formatToken);
}

export function runStripComments(source: Uint8Array, config: TextkitConfig): string {
  const { lineCommentOpener, blockCommentOpener, blockCommentCloser, allowDashesInIdentifiers } =
    config.lexer;
  return stripComments(source, {
    lineCommentOpener,
    blockCommentOpener,
    blockCommentCloser,
    allowDashesInIdentifiers,
  });
}

export function runTranscode(
  source: Uint8Array,
  from: WireEncoding,
  to: WireEncoding,
  config: TextkitConfig
): Uint8Array {
  return transcodeBytes(source, from, to, { flags: transcodeFlags(config.transcode) });
}

function resolveConfig(path: string | undefined): TextkitConfig {
  if (path !== undefined) {
    return loadConfigFile(path);
  }
  return loadConfig(process.cwd());
}

// ============================================================
// MAIN ENTRY POINT
// ============================================================

const HELP = `textkit - Unicode transcoding and C-like lexing

Usage:
  textkit tokenize <file>
  textkit strip-comments <file>
  textkit transcode <file> --from <enc> --to <enc> [--out <file>]
  textkit explain <error-id>

Encodings: ${WIRE_ENCODINGS.join(', ')}

Options:
  --config <file>  Configuration file (default: ./textkit.config.yaml)
  --verbose        Trace every scanned token to stderr
  -h, --help       Show this help message
  -v, --version    Show version number`;

/**
 * Main entry point for the textkit CLI.
 * Orchestrates argument parsing, file reading, and output.
 */
function main(): void {
  try {
    const args = parseArgs(process.argv.slice(2));

    switch (args.mode) {
      case 'help':
        console.log(HELP);
        return;
      case 'version':
        console.log(readVersion());
        return;
      case 'explain': {
        const doc = explainError(args.errorId);
        if (doc === null) {
          console.error(`Unknown error ID: ${args.errorId}`);
          process.exit(1);
        }
        console.log(doc);
        return;
      }
      default:
        break;
    }

    const config = resolveConfig(args.config);
    const source = readFileSync(args.file);

    switch (args.mode) {
      case 'tokenize': {
        const trace = args.verbose
          ? (token: Token) => console.error(`trace ${formatToken(token)}`)
          : undefined;
        for (const line of runTokenize(source, config, trace)) {
          console.log(line);
        }
        return;
      }
      case 'strip-comments':
        process.stdout.write(runStripComments(source, config));
        return;
      case 'transcode': {
        const output = runTranscode(source, args.from, args.to, config);
        if (args.out !== undefined) {
          writeFileSync(args.out, output);
        }
        if (args.verbose) {
          console.error(`read ${source.length} bytes as ${args.from}`);
        }
        console.log(`${output.length} bytes ${args.to}`);
        return;
      }
    }
  } catch (err) {
    if (err instanceof Error) {
      console.error(`Error: ${formatError(err)}`);
    } else {
      console.error(`Error: ${String(err)}`);
    }
    process.exit(1);
  }
}

// Only run main if this is the entry point (not imported)
const shouldRunMain =
  process.env['NODE_ENV'] !== 'test' &&
  !process.env['VITEST'] &&
  !process.env['VITEST_WORKER_ID'];

if (shouldRunMain) {
  main();
}
