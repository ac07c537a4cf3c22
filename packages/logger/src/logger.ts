export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  level: LogLevel;
  category: string;
  timestamp: Date;
  msg: string;
  context?: Record<string, unknown>;
}

export interface Sink {
  write(entry: LogEntry): void;
  flush(): void;
}

type LogMethod = {
  (msg: string): void;
  (context: Record<string, unknown>, msg: string): void;
};

export type Logger = Record<LogLevel, LogMethod>;

export interface LoggerConfig {
  level?: LogLevel;
  sinks?: Sink[];
}

/** Ordered from most to least verbose */
export const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

const rank = (level: LogLevel): number => LOG_LEVELS.indexOf(level);

interface LoggerState {
  minRank: number;
  sinks: readonly Sink[];
}

let state: LoggerState = { minRank: rank('info'), sinks: [] };
const categories = new Map<string, Logger>();
const failedSinks = new WeakSet<object>();

/**
 * Report a sink failure on stderr, once per sink. A broken sink never reaches the code
 * that logged.
 */
export function reportSinkFailure(sink: object, error: unknown): void {
  if (failedSinks.has(sink)) return;
  failedSinks.add(sink);

  const name = sink.constructor.name || 'anonymous sink';
  const reason = error instanceof Error ? error.message : String(error);
  try {
    process.stderr.write(`[logger] ${name} failed, further failures suppressed: ${reason}\n`);
  } catch {
    // stderr closed; nowhere left to report
  }
}

/**
 * Plain-JSON copy of a log context. Errors keep name, message and stack; bigints become
 * strings and sets arrays. Any object met a second time (cycle or shared reference) is
 * written as '[Circular]'.
 */
export function serializeContext(context: Record<string, unknown>): Record<string, unknown> {
  const visited = new WeakSet<object>();

  const toPlain = (_key: string, value: unknown): unknown => {
    if (value instanceof Error) {
      return { name: value.name, message: value.message, stack: value.stack };
    }
    if (typeof value === 'bigint') {
      return value.toString();
    }
    if (value instanceof Set) {
      return [...value];
    }
    if (typeof value === 'object' && value !== null) {
      if (visited.has(value)) {
        return '[Circular]';
      }
      visited.add(value);
    }
    return value;
  };

  try {
    const copy: unknown = JSON.parse(JSON.stringify(context, toPlain));
    return isRecord(copy) ? copy : {};
  } catch {
    return { error: '[unserializable]' };
  }
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

function dispatch(entry: LogEntry): void {
  for (const sink of state.sinks) {
    try {
      sink.write(entry);
    } catch (error) {
      reportSinkFailure(sink, error);
    }
  }
}

/**
 * Loggers read the global state on every call, so one obtained before initLogger() picks
 * up the later configuration.
 */
function createCategoryLogger(category: string): Logger {
  const methodFor =
    (level: LogLevel): LogMethod =>
    (first: string | Record<string, unknown>, msg?: string): void => {
      if (state.sinks.length === 0 || rank(level) < state.minRank) return;

      const entry: LogEntry =
        typeof first === 'string'
          ? { category, level, msg: first, timestamp: new Date() }
          : { category, context: serializeContext(first), level, msg: msg ?? '', timestamp: new Date() };
      dispatch(entry);
    };

  return {
    trace: methodFor('trace'),
    debug: methodFor('debug'),
    info: methodFor('info'),
    warn: methodFor('warn'),
    error: methodFor('error'),
  };
}

export function initLogger(config: LoggerConfig): void {
  state = { minRank: rank(config.level ?? 'info'), sinks: config.sinks ?? [] };
  categories.clear();
}

export function getLogger(category: string): Logger {
  let logger = categories.get(category);
  if (!logger) {
    logger = createCategoryLogger(category);
    categories.set(category, logger);
  }
  return logger;
}

export function flushLoggers(): void {
  for (const sink of state.sinks) {
    try {
      sink.flush();
    } catch (error) {
      reportSinkFailure(sink, error);
    }
  }
}
