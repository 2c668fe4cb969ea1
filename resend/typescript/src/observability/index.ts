export {
  ConsoleLogger,
  NoopLogger,
  createDefaultLoggingConfig,
  logError,
  type Logger,
  type LogLevel,
  type LogFormat,
  type LoggingConfig,
} from './logging.js';
