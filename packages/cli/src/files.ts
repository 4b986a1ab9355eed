/**
 * Template file discovery and checking
 */

import type { Logger } from '@kindred/logger';
import { tryRender } from '@kindred/templates';
import { glob } from 'glob';
import * as fs from 'node:fs';
import * as path from 'node:path';
import type { CheckResult } from './output/format.js';

export const TEMPLATE_PATTERN = '**/*.kin';

/**
 * Resolve files and directories to a sorted list of template files
 *
 * @throws {Error} If a path does not exist
 */
export async function collectFiles(paths: string[]): Promise<string[]> {
  const files = new Set<string>();

  for (const p of paths) {
    const resolved = path.resolve(p);

    if (!fs.existsSync(resolved)) {
      throw new Error(`Path not found: ${p}`);
    }

    if (fs.statSync(resolved).isDirectory()) {
      const found = await glob(TEMPLATE_PATTERN, {
        cwd: resolved,
        absolute: true,
        ignore: ['**/node_modules/**', '**/dist/**'],
      });
      found.forEach((file) => files.add(file));
    } else {
      files.add(resolved);
    }
  }

  return [...files].sort();
}

/**
 * Read template text from a file, or from stdin for `-`
 */
export function readTemplate(file: string): string {
  return fs.readFileSync(file === '-' ? 0 : file, 'utf-8');
}

/**
 * Parse and expand one file without writing output
 */
export function checkFile(file: string, logger: Logger): CheckResult {
  const result = tryRender(readTemplate(file), { logger: logger.child({ file }) });

  if (result.ok) {
    logger.debug('file_checked', { file, ok: true });
    return { path: file, diagnostic: null };
  }

  logger.debug('file_failed', { file, kind: result.diagnostic.kind });
  return { path: file, diagnostic: result.diagnostic };
}
