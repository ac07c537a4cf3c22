import { BufferedSink, type BufferedSinkOptions } from '../buffered-sink.js';
import type { LogEntry, LogLevel } from '../logger.js';

export type ConsoleOutput = Pick<Console, 'error' | 'log' | 'warn'>;

export interface ConsoleSinkOptions extends BufferedSinkOptions {
  color?: boolean;
  /** Defaults to the global console */
  output?: ConsoleOutput;
  /** Format times in UTC instead of local time */
  utc?: boolean;
}

const LEVEL_COLORS: Record<LogLevel, string> = {
  trace: '\x1b[90m', // gray
  debug: '\x1b[36m', // cyan
  info: '\x1b[32m', // green
  warn: '\x1b[33m', // yellow
  error: '\x1b[31m', // red
};

/**
 * Format: [HH:MM:SS] LEVEL [category] message {key=value, ...}
 */
export class ConsoleSink extends BufferedSink {
  private readonly color: boolean;
  private readonly output: ConsoleOutput;
  private readonly utc: boolean;

  constructor(options?: ConsoleSinkOptions) {
    super(options);
    this.color = options?.color ?? false;
    this.output = options?.output ?? console;
    this.utc = options?.utc ?? false;
  }

  format(entry: LogEntry): string {
    const context = entry.context ? ` ${this.formatContext(entry.context)}` : '';
    return `${this.formatTime(entry.timestamp)} ${this.formatLevel(entry.level)} [${entry.category}] ${entry.msg}${context}`;
  }

  protected writeEntry(entry: LogEntry): void {
    const message = this.format(entry);

    if (entry.level === 'error') {
      this.output.error(message);
    } else if (entry.level === 'warn') {
      this.output.warn(message);
    } else {
      this.output.log(message);
    }
  }

  private formatTime(timestamp: Date): string {
    const parts = this.utc
      ? [timestamp.getUTCHours(), timestamp.getUTCMinutes(), timestamp.getUTCSeconds()]
      : [timestamp.getHours(), timestamp.getMinutes(), timestamp.getSeconds()];
    return `[${parts.map((part) => String(part).padStart(2, '0')).join(':')}]`;
  }

  private formatLevel(level: LogLevel): string {
    const upper = level.toUpperCase().padEnd(5);
    return this.color ? `${LEVEL_COLORS[level]}${upper}\x1b[0m` : upper;
  }

  private formatContext(context: Record<string, unknown>): string {
    const pairs = Object.entries(context).map(([key, value]) => `${key}=${JSON.stringify(value)}`);
    return `{${pairs.join(', ')}}`;
  }
}
