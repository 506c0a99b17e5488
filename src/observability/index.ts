export {
  createStructuredLogger,
  silentLogger,
  ConsoleOutput,
  JsonLinesOutput,
  BufferOutput,
  LOG_LEVELS,
  type StructuredLogger,
  type LogEntry,
  type LogOutput,
  type LogLevel,
  type CreateLoggerOptions,
} from './logger.js';
