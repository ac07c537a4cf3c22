import os from 'node:os';
import { Writable } from 'node:stream';

import pino from 'pino';

import type { LoggerEnvConfig } from '../env.schema.js';
import type { LogEntry, LogLevel, Sink } from '../logger.js';

export interface PinoSinkOptions {
  level?: LogLevel;
  nodeEnv?: LoggerEnvConfig['NODE_ENV'];
  serviceName?: string;
  /** Write here instead of the configured transport (tests, custom pipes) */
  destination?: pino.DestinationStream;
}

/**
 * Formats a log label string to be a fixed length. When the label string
 * is longer than the specified size, it is truncated and prefixed by a
 * horizontal ellipsis (…).
 */
export function formatLabel(label: string, size: number): string {
  const str = label.padStart(size);
  return str.length <= size ? str : `…${str.slice(-size + 1)}`;
}

const isTestEnv = (nodeEnv: string | undefined): boolean =>
  nodeEnv === 'test' || process.env['NODE_ENV'] === 'test' || process.env['VITEST'] === 'true';

function createPinoLogger(options: PinoSinkOptions): pino.Logger {
  const nodeEnv = options.nodeEnv ?? 'development';
  const config: pino.LoggerOptions = {
    base: {
      environment: nodeEnv,
      hostname: os.hostname(),
      pid: process.pid,
      service: options.serviceName ?? 'retryline',
    },
    level: options.level ?? 'info',
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (options.destination) {
    return pino.pino(config, options.destination);
  }

  // No transports under test: they spawn worker threads
  if (isTestEnv(nodeEnv)) {
    const noopStream = new Writable({
      write(_chunk, _encoding, callback) {
        callback();
      },
    });
    return pino.pino(config, noopStream);
  }

  if (nodeEnv === 'development') {
    config.transport = {
      options: { ignore: 'pid,hostname,categoryLabel,service,environment' },
      target: 'pino-pretty',
    };
  } else {
    // JSON on stdout for log processors
    config.transport = { options: { destination: 1 }, target: 'pino/file' };
  }

  return pino.pino(config);
}

/**
 * Forwards entries to pino: pretty in development, JSON in production, silent under test.
 * Level filtering already happened in the category logger.
 */
export class PinoSink implements Sink {
  private readonly logger: pino.Logger;
  private readonly children = new Map<string, pino.Logger>();

  constructor(options: PinoSinkOptions = {}) {
    this.logger = createPinoLogger(options);
  }

  write(entry: LogEntry): void {
    const child = this.childFor(entry.category);
    if (entry.context) {
      child[entry.level](entry.context, entry.msg);
    } else {
      child[entry.level](entry.msg);
    }
  }

  flush(): void {
    this.logger.flush();
  }

  private childFor(category: string): pino.Logger {
    const cached = this.children.get(category);
    if (cached) {
      return cached;
    }
    const child = this.logger.child({ category, categoryLabel: formatLabel(category, 25) });
    this.children.set(category, child);
    return child;
  }
}
