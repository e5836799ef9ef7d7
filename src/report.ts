/**
 * Token Report
 * Text and JSON rendering of a scan result
 */

import { suggestCorrection, type LexicalErrorHandler } from './lexer/index.js';
import {
  formatToken,
  isErrorToken,
  isTriviaKind,
  type Token,
} from './types.js';

export type OutputFormat = 'text' | 'json';

export interface ReportOptions {
  readonly format: OutputFormat;
  /** Include NEWLINE and COMMENT tokens */
  readonly trivia: boolean;
  /** Append correction hints to errors */
  readonly suggest: boolean;
}

/**
 * Drop trivia unless requested. EOF always survives; error tokens are
 * left in place for callers that want them inline.
 */
export function filterTokens(
  tokens: readonly Token[],
  options: { includeTrivia: boolean }
): Token[] {
  if (options.includeTrivia) return [...tokens];
  return tokens.filter((token) => !isTriviaKind(token.kind));
}

function formatErrorsText(
  errors: LexicalErrorHandler,
  suggest: boolean
): string {
  if (!suggest || !errors.hasErrors()) return errors.getErrorSummary();

  const output = [`Found ${errors.errorCount} lexical error(s):`];
  errors.errors.forEach((token, index) => {
    output.push(`${index + 1}. ${formatToken(token)}`);
    const hint = suggestCorrection(token);
    if (hint !== null) {
      output.push(`   Hint: ${hint}`);
    }
  });
  return output.join('\n');
}

function formatReportText(
  tokens: Token[],
  errors: LexicalErrorHandler,
  suggest: boolean
): string {
  const tokenLines = tokens.map(
    (token, index) => `${index + 1}. ${formatToken(token)}`
  );
  return [
    'Tokens:',
    ...tokenLines,
    '',
    formatErrorsText(errors, suggest),
  ].join('\n');
}

function formatReportJSON(
  tokens: Token[],
  errors: LexicalErrorHandler,
  suggest: boolean
): string {
  const output = {
    tokens: tokens.map((token) => ({
      kind: token.kind,
      lexeme: token.lexeme,
      line: token.line,
      column: token.column,
    })),
    errors: errors.errors.map((token) => {
      const error: Record<string, unknown> = {
        code: token.code,
        kind: token.kind,
        message: token.errorDetail,
        lexeme: token.lexeme,
        line: token.line,
        column: token.column,
      };
      if (suggest) {
        error['suggestion'] = suggestCorrection(token);
      }
      return error;
    }),
    summary: {
      total: tokens.length,
      errors: errors.errorCount,
    },
  };

  return JSON.stringify(output, null, 2);
}

/**
 * Render a scan result. The token listing excludes error tokens; errors
 * are reported once, in the summary.
 *
 * Text format:
 *   Tokens:
 *   1. IF(if) at line 1, col 1
 *   2. EOF() at line 1, col 3
 *
 *   No lexical errors found.
 */
export function formatReport(
  tokens: readonly Token[],
  errors: LexicalErrorHandler,
  options: ReportOptions
): string {
  const listed = filterTokens(tokens, {
    includeTrivia: options.trivia,
  }).filter((token) => !isErrorToken(token));

  if (options.format === 'json') {
    return formatReportJSON(listed, errors, options.suggest);
  }
  return formatReportText(listed, errors, options.suggest);
}
