/**
 * CLI configuration loading
 *
 * Loads configuration from .env files, searching from the current directory
 * up to the filesystem root.
 */

import { isEnvironment, isLogLevel, type Environment, type LogLevel } from '@kindred/logger';
import * as fs from 'node:fs';
import * as path from 'node:path';

export interface KindredConfig {
  environment?: Environment;
  logLevel?: LogLevel;
}

const ENV_KEY = 'KINDRED_ENV';
const LOG_LEVEL_KEY = 'KINDRED_LOG_LEVEL';

/**
 * Parse a .env file into a key-value object
 */
export function parseEnvFile(content: string): Record<string, string> {
  const result: Record<string, string> = {};

  for (const line of content.split('\n')) {
    const trimmed = line.trim();

    // Skip empty lines and comments
    if (!trimmed || trimmed.startsWith('#')) {
      continue;
    }

    const eqIndex = trimmed.indexOf('=');
    if (eqIndex === -1) {
      continue;
    }

    const key = trimmed.slice(0, eqIndex).trim();
    let value = trimmed.slice(eqIndex + 1).trim();

    // Remove surrounding quotes if present
    if (
      (value.startsWith('"') && value.endsWith('"')) ||
      (value.startsWith("'") && value.endsWith("'"))
    ) {
      value = value.slice(1, -1);
    }

    result[key] = value;
  }

  return result;
}

/**
 * Find and load .env file, searching from startDir up to root
 */
function findEnvFile(startDir: string): Record<string, string> | null {
  let currentDir = path.resolve(startDir);

  while (true) {
    const envPath = path.join(currentDir, '.env');

    if (fs.existsSync(envPath) && fs.statSync(envPath).isFile()) {
      return parseEnvFile(fs.readFileSync(envPath, 'utf-8'));
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      // Reached filesystem root
      return null;
    }
    currentDir = parentDir;
  }
}

/**
 * Apply recognized keys from one source; unrecognized values are ignored
 */
function applySource(config: KindredConfig, source: Record<string, string | undefined>): void {
  const environment = source[ENV_KEY];
  if (environment && isEnvironment(environment)) {
    config.environment = environment;
  }

  const logLevel = source[LOG_LEVEL_KEY];
  if (logLevel && isLogLevel(logLevel)) {
    config.logLevel = logLevel;
  }
}

/**
 * Load kindred configuration from environment and .env files
 *
 * Priority (highest to lowest):
 * 1. Process environment variables
 * 2. .env file (searched from cwd upward)
 */
export function loadConfig(
  cwd: string = process.cwd(),
  env: Record<string, string | undefined> = process.env,
): KindredConfig {
  const config: KindredConfig = {};

  // Load from .env file first (lower priority)
  const envFile = findEnvFile(cwd);
  if (envFile) {
    applySource(config, envFile);
  }

  // Override with process environment (higher priority)
  applySource(config, env);

  return config;
}
