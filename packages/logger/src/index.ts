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
export { initLoggerFromEnv } from './init.js';
export { loggerEnvSchema, validateLoggerEnv, type LoggerEnvConfig } from './env.schema.js';
export { ConsoleSink, type ConsoleSinkOptions } from './sinks/console.js';
export { PinoSink, type PinoSinkOptions } from './sinks/pino.js';
export { BufferedSink, type BufferedSinkOptions } from './buffered-sink.js';
