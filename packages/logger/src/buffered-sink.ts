import type { LogEntry, Sink } from './logger.js';

export interface BufferedSinkOptions {
  /** Entries collected before a batch is written out synchronously (default 1000) */
  maxBuffer?: number | undefined;
}

/**
 * Collects entries and writes them in batches: on the next event-loop turn, when a
 * batch fills up, or on `flush()`. Nothing is discarded, so a long synchronous replay
 * logging at debug level still writes every line.
 *
 * Subclasses implement `writeEntry(entry)` for actual output.
 */
export abstract class BufferedSink implements Sink {
  private batch: LogEntry[] = [];
  private drainPending = false;
  private readonly maxBuffer: number;

  constructor(options: BufferedSinkOptions = {}) {
    this.maxBuffer = options.maxBuffer ?? 1000;
  }

  protected abstract writeEntry(entry: LogEntry): void;

  write(entry: LogEntry): void {
    this.batch.push(entry);

    if (this.batch.length >= this.maxBuffer) {
      this.flush();
      return;
    }

    if (!this.drainPending) {
      this.drainPending = true;
      setImmediate(() => {
        this.drainPending = false;
        this.flush();
      });
    }
  }

  flush(): void {
    const entries = this.batch;
    this.batch = [];
    for (const entry of entries) {
      this.writeEntry(entry);
    }
  }
}
