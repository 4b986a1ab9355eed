/**
 * kindred check command
 *
 * Parses and expands every template without writing output, then reports
 * the first error found in each file.
 */

import type { Logger } from '@kindred/logger';
import { Command } from 'commander';
import { checkFile, collectFiles } from '../files.js';
import { formatCheckJson, formatCheckReport, getColors } from '../output/format.js';

export interface CheckOptions {
  format: string;
  quiet?: boolean;
  color: boolean;
}

export function createCheckCommand(logger: Logger): Command {
  return new Command('check')
    .description('Check template files for errors')
    .argument('[paths...]', 'Files or directories to check', ['.'])
    .option('--format <type>', 'Output format: pretty, json', 'pretty')
    .option('--quiet', 'Only output on errors')
    .option('--no-color', 'Disable colored output')
    .action(async (paths: string[], options: CheckOptions) => {
      process.exit(await runCheck(paths, options, logger));
    });
}

/**
 * Check every template under the given paths and print the report
 *
 * @returns The exit code: 0 when clean, 1 on a template error, 2 on any other failure
 */
export async function runCheck(
  paths: string[],
  options: CheckOptions,
  logger: Logger,
): Promise<number> {
  try {
    const files = await collectFiles(paths);

    if (files.length === 0) {
      if (!options.quiet) {
        console.log('No template files found to check');
      }
      return 0;
    }

    const results = files.map((file) => checkFile(file, logger));
    const failed = results.some((r) => r.diagnostic !== null);

    if (options.format === 'json') {
      console.log(formatCheckJson(results));
    } else if (!options.quiet || failed) {
      const shown = options.quiet ? results.filter((r) => r.diagnostic !== null) : results;
      console.log(formatCheckReport(shown, getColors(options.color)));
    }

    return failed ? 1 : 0;
  } catch (error) {
    logger.error('check_failed', { error });
    console.error('Error:', error instanceof Error ? error.message : error);
    return 2;
  }
}
