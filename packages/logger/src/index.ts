export {
  flushLoggers,
  getLogger,
  initLogger,
  isLogLevel,
  LOG_LEVELS,
  serializeContext,
  type LogContext,
  type LogEntry,
  type Logger,
  type LoggerConfig,
  type LogLevel,
  type LogMethod,
  type Sink,
} from './logger.js';
export { ConsoleSink, type ConsoleSinkOptions } from './sinks/console.js';
export { FileSink, type FileSinkOptions } from './sinks/file.js';
