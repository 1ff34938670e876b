export {
  LOG_LEVELS,
  Logger,
  createLogger,
  createQuietLogger,
  isDebugMode,
  setDebugMode,
  type LogEntry,
  type LogFormat,
  type LogLevel,
  type LoggerConfig,
} from './logger.js';
