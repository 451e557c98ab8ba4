import pc from 'picocolors';

import { BufferedSink, type BufferedSinkOptions } from '../buffered-sink.js';
import type { LogContext, LogEntry, LogLevel } from '../logger.js';

export interface ConsoleSinkOptions extends BufferedSinkOptions {
  color?: boolean;
  /** Defaults to process.stderr; stdout is reserved for the account snapshot */
  stream?: { write(chunk: string): unknown };
}

const levelColors: Record<LogLevel, (text: string) => string> = {
  debug: pc.cyan,
  info: pc.green,
  warn: pc.yellow,
  error: pc.red,
};

/**
 * Console sink writing one line per entry.
 *
 * Format: [HH:MM:SS] LEVEL [category] message {context}
 */
export class ConsoleSink extends BufferedSink {
  private readonly color: boolean;
  private readonly stream: { write(chunk: string): unknown };

  constructor(options?: ConsoleSinkOptions) {
    super(options);
    this.color = options?.color ?? false;
    this.stream = options?.stream ?? process.stderr;
  }

  protected writeEntry(entry: LogEntry): void {
    const time = this.formatTime(entry.timestamp);
    const level = this.formatLevel(entry.level);
    const category = `[${entry.category}]`;
    const context = entry.context ? ` ${this.formatContext(entry.context)}` : '';

    this.stream.write(`${time} ${level} ${category} ${entry.msg}${context}\n`);
  }

  private formatTime(timestamp: Date): string {
    const hours = String(timestamp.getHours()).padStart(2, '0');
    const minutes = String(timestamp.getMinutes()).padStart(2, '0');
    const seconds = String(timestamp.getSeconds()).padStart(2, '0');
    return `[${hours}:${minutes}:${seconds}]`;
  }

  private formatLevel(level: LogLevel): string {
    const upper = level.toUpperCase().padEnd(5);
    return this.color ? levelColors[level](upper) : upper;
  }

  private formatContext(context: LogContext): string {
    const pairs: string[] = [];
    for (const [key, value] of Object.entries(context)) {
      if (value === undefined) continue;
      pairs.push(`${key}=${JSON.stringify(value)}`);
    }
    return `{${pairs.join(', ')}}`;
  }
}
