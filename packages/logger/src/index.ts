export {
  initLogger,
  getLogger,
  flushLoggers,
  isLogLevel,
  LOG_LEVELS,
  type Logger,
  type Sink,
  type LogEntry,
  type LogLevel,
  type LoggerConfig,
} from './logger.js';
export { ConsoleSink, type ConsoleSinkOptions, type LogStream } from './sinks/console.js';
