export {
  initLogger,
  getLogger,
  flushLoggers,
  serializeContext,
  LOG_LEVELS,
  type Logger,
  type Sink,
  type LogEntry,
  type LogLevel,
  type LoggerConfig,
} from './logger.js';
export { initLoggerFromEnv, validateLoggerEnv, loggerEnvSchema, type LoggerEnvConfig } from './env.schema.js';
export { ConsoleSink, formatConsoleLine, type ConsoleSinkOptions } from './sinks/console.js';
export { MemorySink } from './sinks/memory.js';
