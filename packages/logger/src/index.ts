export { createLogger, isEnvironment, isLogLevel, LOG_LEVELS } from './logger.js';
export type {
  Environment,
  EnvironmentConfig,
  LogEntry,
  Logger,
  LoggerConfig,
  LogLevel,
} from './types.js';
