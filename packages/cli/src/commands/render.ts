/**
 * kindred render command
 */

import type { Logger } from '@kindred/logger';
import { tryRender } from '@kindred/templates';
import { Command } from 'commander';
import * as fs from 'node:fs';
import { readTemplate } from '../files.js';
import { formatDiagnostic, getColors } from '../output/format.js';

export interface RenderCommandOptions {
  out?: string;
  format: string;
  color: boolean;
}

export function createRenderCommand(logger: Logger): Command {
  return new Command('render')
    .description('Expand a template file and print the result')
    .argument('<file>', "Template file, or '-' for stdin")
    .option('-o, --out <file>', 'Write the output to a file instead of stdout')
    .option('--format <type>', 'Output format: text, json', 'text')
    .option('--no-color', 'Disable colored output')
    .action((file: string, options: RenderCommandOptions) => {
      process.exit(runRender(file, options, logger));
    });
}

/**
 * Render one template file
 *
 * @returns The exit code: 0 on success, 1 on a template error, 2 on any other failure
 */
export function runRender(file: string, options: RenderCommandOptions, logger: Logger): number {
  try {
    const result = tryRender(readTemplate(file), { logger: logger.child({ file }) });

    if (options.format === 'json') {
      emit(JSON.stringify(result, null, 2), options.out);
    } else if (result.ok) {
      emit(result.output, options.out);
    } else {
      console.error(formatDiagnostic(file, result.diagnostic, getColors(options.color)));
    }

    return result.ok ? 0 : 1;
  } catch (error) {
    logger.error('render_failed', { file, error });
    console.error('Error:', error instanceof Error ? error.message : error);
    return 2;
  }
}

function emit(text: string, out: string | undefined): void {
  if (out) {
    fs.writeFileSync(out, `${text}\n`, 'utf-8');
  } else {
    process.stdout.write(`${text}\n`);
  }
}
