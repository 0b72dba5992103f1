export {
  createLogger,
  errorMessage,
  isLogLevel,
  resolveLogLevel,
  type LogFields,
  type LogLevel,
  type Logger,
  type LoggerOptions,
} from './logger.js';
