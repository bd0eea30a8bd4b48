export {
  ConsoleLogger,
  NoopLogger,
  LOG_LEVELS,
  createDefaultLoggingConfig,
  redactContext,
  logRequest,
  logResponse,
  type Logger,
  type LogLevel,
  type LogFormat,
  type LoggingConfig,
} from './logging.js';
