export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/**
 * Values a log context may carry. Amounts are passed pre-formatted
 * (see `formatDecimal` in @txledger/core); undefined entries are left out of the line.
 */
export type LogValue = string | number | boolean | undefined;
export type LogContext = Readonly<Record<string, LogValue>>;

export interface LogEntry {
  level: LogLevel;
  category: string;
  timestamp: Date;
  msg: string;
  context?: LogContext;
}

export interface Sink {
  write(entry: LogEntry): void;
  flush(): void;
}

export interface Logger {
  debug(msg: string): void;
  debug(context: LogContext, msg: string): void;
  info(msg: string): void;
  info(context: LogContext, msg: string): void;
  warn(msg: string): void;
  warn(context: LogContext, msg: string): void;
  error(msg: string): void;
  error(context: LogContext, msg: string): void;
  isLevelEnabled(level: LogLevel): boolean;
}

export interface LoggerConfig {
  level?: LogLevel;
  sinks?: Sink[];
}

const levelRank: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

let activeLevel: LogLevel = 'info';
let activeSinks: readonly Sink[] = [];

class CategoryLogger implements Logger {
  constructor(private readonly category: string) {}

  debug(first: LogContext | string, msg?: string): void {
    this.emit('debug', first, msg);
  }

  info(first: LogContext | string, msg?: string): void {
    this.emit('info', first, msg);
  }

  warn(first: LogContext | string, msg?: string): void {
    this.emit('warn', first, msg);
  }

  error(first: LogContext | string, msg?: string): void {
    this.emit('error', first, msg);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return activeSinks.length > 0 && levelRank[level] >= levelRank[activeLevel];
  }

  private emit(level: LogLevel, first: LogContext | string, msg: string | undefined): void {
    if (!this.isLevelEnabled(level)) return;

    const entry: LogEntry =
      typeof first === 'string'
        ? { level, category: this.category, timestamp: new Date(), msg: first }
        : { level, category: this.category, timestamp: new Date(), msg: msg ?? '', context: { ...first } };

    for (const sink of activeSinks) {
      sink.write(entry);
    }
  }
}

const loggers = new Map<string, Logger>();

/**
 * Swap in a new level and sink set. Entries held by the previous sinks are flushed first.
 * Loggers obtained earlier keep working against the new configuration.
 */
export function initLogger(config: LoggerConfig): void {
  flushLoggers();
  activeLevel = config.level ?? 'info';
  activeSinks = config.sinks ?? [];
}

export function getLogger(category: string): Logger {
  let logger = loggers.get(category);
  if (!logger) {
    logger = new CategoryLogger(category);
    loggers.set(category, logger);
  }
  return logger;
}

export function flushLoggers(): void {
  for (const sink of activeSinks) {
    sink.flush();
  }
}
