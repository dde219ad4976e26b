export {
  QueryLensLogger,
  createLogger,
  formatLogEntry,
  isDebugMode,
  setDebugMode,
  type LogEntry,
  type LogLevel,
  type LogSink,
  type LoggerOptions,
} from './logger.js';
