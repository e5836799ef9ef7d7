/**
 * Configuration Loader for ibtac-lex
 * Loads and validates .ibtac-lex.json configuration files.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import type { OutputFormat, ReportOptions } from './report.js';

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file name */
export const CONFIG_FILE_NAME = '.ibtac-lex.json';

const KNOWN_OPTIONS: ReadonlySet<string> = new Set([
  'format',
  'trivia',
  'suggest',
]);

export type LexConfig = ReportOptions;

// ============================================================
// DEFAULT CONFIGURATION
// ============================================================

export function createDefaultConfig(): LexConfig {
  return { format: 'text', trivia: false, suggest: false };
}

// ============================================================
// VALIDATION
// ============================================================

export function isOutputFormat(value: unknown): value is OutputFormat {
  return value === 'text' || value === 'json';
}

/**
 * Validate configuration structure and values.
 * Throws Error if configuration is invalid.
 */
function validateConfig(data: unknown): asserts data is Partial<LexConfig> {
  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    throw new Error('Invalid configuration: must be an object');
  }

  for (const [key, value] of Object.entries(data)) {
    if (!KNOWN_OPTIONS.has(key)) {
      throw new Error(`Invalid configuration: unknown option ${key}`);
    }
    if (key === 'format' && !isOutputFormat(value)) {
      throw new Error(
        `Invalid configuration: format has invalid value "${String(value)}" (must be 'text' or 'json')`
      );
    }
    if ((key === 'trivia' || key === 'suggest') && typeof value !== 'boolean') {
      throw new Error(`Invalid configuration: ${key} must be a boolean`);
    }
  }
}

// ============================================================
// CONFIGURATION LOADING
// ============================================================

/**
 * Load configuration from .ibtac-lex.json in the specified directory.
 *
 * @param cwd - Directory to search for configuration file
 * @returns Configuration merged over defaults, or null if file not found
 * @throws Error with "Invalid configuration: {reason}" if the file is invalid
 */
export function loadConfig(cwd: string): LexConfig | null {
  const configPath = join(cwd, CONFIG_FILE_NAME);

  if (!existsSync(configPath)) {
    return null;
  }

  let fileContent: string;
  try {
    fileContent = readFileSync(configPath, 'utf-8');
  } catch (err) {
    throw new Error(
      `Invalid configuration: failed to read file (${err instanceof Error ? err.message : String(err)})`
    );
  }

  let parsedData: unknown;
  try {
    parsedData = JSON.parse(fileContent);
  } catch (err) {
    throw new Error(
      `Invalid configuration: invalid JSON (${err instanceof Error ? err.message : String(err)})`
    );
  }

  validateConfig(parsedData);

  return { ...createDefaultConfig(), ...parsedData };
}
