import { validateLoggerEnv } from './env.schema.js';
import { initLogger, type Sink } from './logger.js';
import { ConsoleSink } from './sinks/console.js';
import { PinoSink } from './sinks/pino.js';

/**
 * Configure the global logger from LOGGER_* variables.
 */
export function initLoggerFromEnv(env: NodeJS.ProcessEnv = process.env): void {
  const config = validateLoggerEnv(env);

  const sinks: Sink[] = [];
  if (config.LOGGER_SINK === 'console') {
    sinks.push(new ConsoleSink({ color: config.LOGGER_COLOR }));
  } else if (config.LOGGER_SINK === 'pino') {
    sinks.push(
      new PinoSink({
        level: config.LOGGER_LOG_LEVEL,
        nodeEnv: config.NODE_ENV,
        serviceName: config.LOGGER_SERVICE_NAME,
      })
    );
  }

  initLogger({ level: config.LOGGER_LOG_LEVEL, sinks });
}
