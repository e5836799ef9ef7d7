/**
 * CLI Shared Utilities
 * Source loading, version lookup, and error formatting for CLI tools
 */

import { readFileSync, statSync } from 'node:fs';

/** Failure to obtain the text to scan (exit code 2) */
export class InputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InputError';
  }
}

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

/**
 * Read a source file as UTF-8.
 *
 * @throws InputError for missing files, directories, and unreadable files
 */
export function readSourceFile(file: string): string {
  try {
    if (statSync(file).isDirectory()) {
      throw new InputError(`Path is a directory: ${file}`);
    }
    return readFileSync(file, 'utf-8');
  } catch (err) {
    if (err instanceof InputError) throw err;

    const code = errorCode(err);
    if (code === 'ENOENT') {
      throw new InputError(`File not found: ${file}`);
    }
    if (code === 'EISDIR') {
      throw new InputError(`Path is a directory: ${file}`);
    }
    throw new InputError(`Cannot read file: ${file}`);
  }
}

/** Package version from package.json next to the dist/ or src/ directory */
export function readVersion(): string {
  const packageJsonUrl = new URL('../package.json', import.meta.url);
  const data: unknown = JSON.parse(readFileSync(packageJsonUrl, 'utf-8'));
  if (
    typeof data === 'object' &&
    data !== null &&
    'version' in data &&
    typeof data.version === 'string'
  ) {
    return data.version;
  }
  return '0.0.0';
}

/**
 * Format error for stderr output
 *
 * @param err - The error to format
 * @returns Formatted error message
 */
export function formatError(err: unknown): string {
  if (err instanceof Error) {
    return `Error: ${err.message}`;
  }
  return `Error: ${String(err)}`;
}
