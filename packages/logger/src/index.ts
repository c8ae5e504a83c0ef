export {
  initLogger,
  getLogger,
  flushLoggers,
  type Logger,
  type Sink,
  type LogEntry,
  type LogLevel,
  type LoggerConfig,
} from './logger.js';
export { BufferedSink, type BufferedSinkOptions } from './buffered-sink.js';
export { ConsoleSink, type ConsoleSinkOptions } from './sinks/console.js';
export { FileSink, type FileSinkOptions } from './sinks/file.js';
