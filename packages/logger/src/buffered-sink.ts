import { reportSinkFailure, type LogEntry, type Sink } from './logger.js';

export interface BufferedSinkOptions {
  /** Entries held before the oldest are dropped. Default 1000 */
  maxBuffer?: number;
}

/**
 * Queues entries and writes them on a later turn of the event loop, so the request loop
 * never waits on output. When the queue is full the oldest entry goes, and a warning
 * with the drop count precedes the next batch.
 */
export abstract class BufferedSink implements Sink {
  private pending: LogEntry[] = [];
  private droppedSinceDrain = 0;
  private drainScheduled = false;
  private readonly capacity: number;

  constructor(options?: BufferedSinkOptions) {
    this.capacity = options?.maxBuffer ?? 1000;
  }

  protected abstract writeEntry(entry: LogEntry): void;

  write(entry: LogEntry): void {
    if (this.pending.length >= this.capacity) {
      this.pending.shift();
      this.droppedSinceDrain++;
    }
    this.pending.push(entry);
    this.scheduleDrain();
  }

  /** Write everything queued now. Call before process exit. */
  flush(): void {
    this.drain();
  }

  private scheduleDrain(): void {
    if (this.drainScheduled) return;
    this.drainScheduled = true;
    setImmediate(() => this.drain());
  }

  private drain(): void {
    const batch = this.pending;
    const dropped = this.droppedSinceDrain;
    this.pending = [];
    this.droppedSinceDrain = 0;
    this.drainScheduled = false;

    if (dropped > 0) {
      this.emit({
        category: 'logger',
        level: 'warn',
        msg: `Dropped ${dropped} log entries (buffer overflow)`,
        timestamp: new Date(),
      });
    }
    batch.forEach((entry) => this.emit(entry));
  }

  // May run from setImmediate, outside any caller's stack
  private emit(entry: LogEntry): void {
    try {
      this.writeEntry(entry);
    } catch (error) {
      reportSinkFailure(this, error);
    }
  }
}
