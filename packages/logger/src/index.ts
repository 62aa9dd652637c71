export {
  flushLoggers,
  getLogger,
  initLogger,
  type LogContext,
  type LogEntry,
  type Logger,
  type LoggerConfig,
  type LogLevel,
  type LogMethod,
  type Sink,
} from './logger.js';
export { ConsoleSink, formatLogLine, type ConsoleSinkOptions } from './sinks/console.js';
export { MemorySink } from './sinks/memory.js';
