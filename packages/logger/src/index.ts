export {
  initLogger,
  getLogger,
  flushLoggers,
  LOG_LEVELS,
  type Logger,
  type Sink,
  type LogEntry,
  type LogLevel,
  type LoggerConfig,
} from './logger.js';
export { ConsoleSink, formatEntry, type ConsoleSinkOptions } from './sinks/console.js';
export { initLoggerFromEnv, validateLoggerEnv, loggerEnvSchema, type LoggerEnvConfig } from './env.schema.js';
