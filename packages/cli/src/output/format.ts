/**
 * Diagnostic formatting for terminal and JSON output
 */

import type { Diagnostic } from '@kindred/templates';
import chalk from 'chalk';

export interface CheckResult {
  path: string;
  diagnostic: Diagnostic | null;
}

export interface Colors {
  red: (s: string) => string;
  green: (s: string) => string;
  gray: (s: string) => string;
  cyan: (s: string) => string;
  bold: (s: string) => string;
}

const identity = (s: string): string => s;

export const plainColors: Colors = {
  red: identity,
  green: identity,
  gray: identity,
  cyan: identity,
  bold: identity,
};

export function getColors(color: boolean): Colors {
  return color ? chalk : plainColors;
}

/**
 * `file:line:column` with a 1-based column, or just the file when no span is known
 */
export function formatLocation(file: string, diagnostic: Diagnostic): string {
  const start = diagnostic.span?.start;
  return start ? `${file}:${start.line}:${start.column + 1}` : file;
}

/**
 * One diagnostic, optionally followed by its source context
 */
export function formatDiagnostic(
  file: string,
  diagnostic: Diagnostic,
  colors: Colors = plainColors,
): string {
  const header = `${colors.cyan(formatLocation(file, diagnostic))} ${colors.red(diagnostic.kind)}: ${diagnostic.message}`;
  if (!diagnostic.context) {
    return header;
  }
  return `${header}\n${colors.gray(`  | ${diagnostic.context}`)}`;
}

/**
 * Report for `kindred check`
 */
export function formatCheckReport(results: CheckResult[], colors: Colors = plainColors): string {
  const lines: string[] = [];
  let failed = 0;

  for (const result of results) {
    if (result.diagnostic) {
      failed++;
      lines.push(`${colors.red('✗')} ${formatDiagnostic(result.path, result.diagnostic, colors)}`);
    } else {
      lines.push(`${colors.green('✓')} ${result.path}`);
    }
  }

  const passed = results.length - failed;
  const summary =
    failed > 0
      ? colors.red(`${failed} of ${results.length} file(s) failed`)
      : colors.green(`${passed} file(s) ok`);
  lines.push('', colors.bold(summary));

  return lines.join('\n');
}

export function formatCheckJson(results: CheckResult[]): string {
  return JSON.stringify(
    {
      files: results,
      failed: results.filter((r) => r.diagnostic !== null).length,
    },
    null,
    2,
  );
}
