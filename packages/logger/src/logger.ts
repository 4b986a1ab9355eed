/** Structured JSON-lines logger */

import type {
  Environment,
  EnvironmentConfig,
  LogEntry,
  Logger,
  LoggerConfig,
  LogLevel,
} from './types.js';

/** Environment-specific configurations */
const ENVIRONMENT_CONFIGS: Record<Environment, EnvironmentConfig> = {
  test: {
    minLevel: 'debug', // Log everything in tests
    includeStackTraces: true,
  },
  development: {
    minLevel: 'info', // Skip debug logs
    includeStackTraces: true,
  },
  production: {
    minLevel: 'warn', // Only warnings and errors
    includeStackTraces: false,
  },
};

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

export const LOG_LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error', 'fatal'];

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVEL_PRIORITY, value);
}

export function isEnvironment(value: string): value is Environment {
  return Object.hasOwn(ENVIRONMENT_CONFIGS, value);
}

class LoggerImpl implements Logger {
  protected metadata: Record<string, unknown>;
  private config: LoggerConfig;
  private envConfig: EnvironmentConfig;
  private minLevel: LogLevel;
  private write: (line: string) => void;

  constructor(config: LoggerConfig, parentMetadata: Record<string, unknown> = {}) {
    this.metadata = parentMetadata;
    this.config = config;
    this.envConfig = ENVIRONMENT_CONFIGS[config.environment ?? 'development'];
    this.minLevel = config.minLevel ?? this.envConfig.minLevel;
    this.write = config.write ?? ((line) => console.error(line));
  }

  child(metadata: Record<string, unknown>): Logger {
    return new LoggerImpl(this.config, { ...this.metadata, ...metadata });
  }

  debug(event_type: string, metadata?: Record<string, unknown>): void {
    this.log('debug', event_type, metadata);
  }

  info(event_type: string, metadata?: Record<string, unknown>): void {
    this.log('info', event_type, metadata);
  }

  warn(event_type: string, metadata?: Record<string, unknown>): void {
    this.log('warn', event_type, metadata);
  }

  error(event_type: string, metadata?: Record<string, unknown>): void {
    this.log('error', event_type, metadata);
  }

  fatal(event_type: string, metadata?: Record<string, unknown>): void {
    this.log('fatal', event_type, metadata);
  }

  private log(level: LogLevel, event_type: string, metadata?: Record<string, unknown>): void {
    // Check if this log level should be emitted
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.minLevel]) {
      return; // Skip logs below minimum level
    }

    const entry: LogEntry = {
      level,
      event_type,
      metadata: this.prepareMetadata(metadata),
      timestamp: new Date().toISOString(),
    };

    this.write(JSON.stringify(entry));
  }

  /**
   * Merge inherited metadata and flatten Error values, which JSON.stringify drops
   */
  private prepareMetadata(metadata?: Record<string, unknown>): Record<string, unknown> {
    const merged: Record<string, unknown> = { ...this.metadata, ...metadata };

    for (const [key, value] of Object.entries(merged)) {
      if (value instanceof Error) {
        merged[key] = {
          name: value.name,
          message: value.message,
          ...(this.envConfig.includeStackTraces ? { stack: value.stack } : {}),
        };
      }
    }

    return merged;
  }
}

export function createLogger(config: LoggerConfig = {}): Logger {
  return new LoggerImpl(config);
}
