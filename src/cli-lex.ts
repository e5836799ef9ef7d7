#!/usr/bin/env node
/**
 * CLI Lex Entry Point
 *
 * Implements argument parsing for ibtac-lex.
 * Tokenizes a source file (or inline code) and reports tokens and
 * lexical errors.
 */

import { createDefaultConfig, isOutputFormat, loadConfig } from './config.js';
import type { LexConfig } from './config.js';
import {
  InputError,
  formatError,
  readSourceFile,
  readVersion,
} from './cli-shared.js';
import { tokenize } from './lexer/index.js';
import { formatReport, type OutputFormat } from './report.js';

export type LexInput =
  | { kind: 'file'; path: string }
  | { kind: 'code'; code: string };

/**
 * Parsed command-line arguments for ibtac-lex
 */
export type ParsedLexArgs =
  | {
      mode: 'lex';
      input: LexInput;
      format: OutputFormat | undefined;
      trivia: boolean;
      suggest: boolean;
    }
  | { mode: 'help' }
  | { mode: 'version' };

export const HELP_TEXT = `ibtac-lex - Tokenize IBTAC source

Usage: ibtac-lex [options] <file>
       ibtac-lex [options] --code <source>

Options:
  --code <source>  Tokenize the given text instead of a file
  --format <fmt>   Output format: text (default) or json
  --trivia         Include newline and comment tokens
  --suggest        Include correction hints for errors
  -h, --help       Show this help message
  -v, --version    Show version number`;

/** Options that consume the following argument */
const VALUE_FLAGS = new Set(['--code', '--format']);

const KNOWN_FLAGS = new Set([
  '--help',
  '-h',
  '--version',
  '-v',
  '--trivia',
  '--suggest',
  ...VALUE_FLAGS,
]);

function readFlagValue(argv: string[], index: number, flag: string): string {
  const value = argv[index + 1];
  if (value === undefined || (flag !== '--code' && value.startsWith('-'))) {
    throw new Error(`${flag} requires an argument`);
  }
  return value;
}

/**
 * Parse command-line arguments for ibtac-lex
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 * @returns Parsed command object
 */
export function parseLexArgs(argv: string[]): ParsedLexArgs {
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { mode: 'version' };
  }

  let format: OutputFormat | undefined;
  let code: string | undefined;
  let file: string | undefined;
  let trivia = false;
  let suggest = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;

    if (VALUE_FLAGS.has(arg)) {
      const value = readFlagValue(argv, i, arg);
      i++; // Skip the flag's value
      if (arg === '--code') {
        code = value;
      } else if (isOutputFormat(value)) {
        format = value;
      } else {
        throw new Error(`Invalid format: ${value}. Expected text or json`);
      }
      continue;
    }

    if (arg.startsWith('-')) {
      if (!KNOWN_FLAGS.has(arg)) {
        throw new Error(`Unknown option: ${arg}`);
      }
      if (arg === '--trivia') trivia = true;
      if (arg === '--suggest') suggest = true;
      continue;
    }

    // First non-flag argument is the file
    file ??= arg;
  }

  if (code !== undefined && file !== undefined) {
    throw new Error('Pass either a file or --code, not both');
  }

  let input: LexInput;
  if (code !== undefined) {
    input = { kind: 'code', code };
  } else if (file !== undefined) {
    input = { kind: 'file', path: file };
  } else {
    throw new Error('Missing file argument');
  }

  return {
    mode: 'lex',
    input,
    format,
    trivia,
    suggest,
  };
}

/** Flags override the configuration file; boolean flags only switch on */
export function resolveOptions(
  args: Extract<ParsedLexArgs, { mode: 'lex' }>,
  config: LexConfig
): LexConfig {
  return {
    format: args.format ?? config.format,
    trivia: args.trivia || config.trivia,
    suggest: args.suggest || config.suggest,
  };
}

export interface LexOutcome {
  readonly output: string;
  /** 0 when clean, 1 when lexical errors were found */
  readonly exitCode: 0 | 1;
}

/** Tokenize source text and render the report */
export function runLex(source: string, options: LexConfig): LexOutcome {
  const { tokens, errors } = tokenize(source);
  return {
    output: formatReport(tokens, errors, options),
    exitCode: errors.hasErrors() ? 1 : 0,
  };
}

// ============================================================
// MAIN ENTRY POINT
// ============================================================

/**
 * Main entry point for ibtac-lex CLI.
 * Exit codes: 0 clean, 1 lexical errors, 2 usage, configuration, or file
 * errors.
 */
function main(): void {
  try {
    const args = parseLexArgs(process.argv.slice(2));

    if (args.mode === 'help') {
      console.log(HELP_TEXT);
      process.exit(0);
    }
    if (args.mode === 'version') {
      console.log(readVersion());
      process.exit(0);
    }

    const config = loadConfig(process.cwd()) ?? createDefaultConfig();
    const source =
      args.input.kind === 'code'
        ? args.input.code
        : readSourceFile(args.input.path);

    const { output, exitCode } = runLex(source, resolveOptions(args, config));
    console.log(output);
    process.exit(exitCode);
  } catch (err) {
    console.error(formatError(err));
    if (!(err instanceof InputError)) {
      console.error(`Run 'ibtac-lex --help' for usage.`);
    }
    process.exit(2);
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
