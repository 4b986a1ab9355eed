#!/usr/bin/env node

/**
 * kindred CLI - Template expansion from the command line
 */

import { createLogger } from '@kindred/logger';
import { Command } from 'commander';
import { createCheckCommand } from './commands/check.js';
import { createRenderCommand } from './commands/render.js';
import { loadConfig } from './config.js';

const config = loadConfig();
const logger = createLogger({
  environment: config.environment,
  minLevel: config.logLevel,
});

const program = new Command();

program
  .name('kindred')
  .description('Expand templates with multi-valued variables into repeated code')
  .version('0.1.0');

// Register commands
program.addCommand(createRenderCommand(logger));
program.addCommand(createCheckCommand(logger));

// Parse arguments
await program.parseAsync();
