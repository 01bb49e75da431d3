/**
 * Logger - leveled, structured logging for operation runs
 *
 * Entries are kept in a bounded in-memory buffer, fanned out to subscribers
 * and echoed to stderr when they reach the threshold level.
 */

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error';

/**
 * Numeric levels. The threshold is passed to operation processes as LOG_LEVEL.
 */
export const LOG_LEVELS: Readonly<Record<LogLevelName, number>> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export type LogCategory =
  | 'CONFIG'
  | 'COMMAND'
  | 'PLUGIN'
  | 'RUN'
  | 'DEPENDENCY'
  | 'PROCESS';

export interface LogEntry {
  timestamp: string;
  level: LogLevelName;
  category: LogCategory;
  message: string;
  details?: Record<string, unknown>;
  runId?: string;
}

export interface LogSubscriber {
  onLog(entry: LogEntry): void;
}

export interface LoggerOptions {
  level?: LogLevelName;
  maxEntries?: number;
  /** Echo entries at or above the threshold to stderr (default: true) */
  console?: boolean;
}

export function isLogLevelName(value: unknown): value is LogLevelName {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

export class Logger {
  private entries: LogEntry[] = [];
  private subscribers: Set<LogSubscriber> = new Set();
  private readonly maxEntries: number;
  private readonly echo: boolean;
  private level: LogLevelName;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.maxEntries = options.maxEntries ?? 1000;
    this.echo = options.console ?? true;
  }

  getLevel(): LogLevelName {
    return this.level;
  }

  /**
   * Numeric threshold, e.g. 20 for 'info'
   */
  getEffectiveLevel(): number {
    return LOG_LEVELS[this.level];
  }

  setLevel(level: LogLevelName): void {
    this.level = level;
  }

  isEnabledFor(level: LogLevelName): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  log(
    level: LogLevelName,
    category: LogCategory,
    message: string,
    options: { details?: Record<string, unknown>; runId?: string } = {}
  ): LogEntry | undefined {
    if (!this.isEnabledFor(level)) {
      return undefined;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      category,
      message,
      details: options.details,
      runId: options.runId,
    };

    this.entries.push(entry);
    if (this.entries.length > this.maxEntries) {
      this.entries = this.entries.slice(-this.maxEntries);
    }

    for (const subscriber of this.subscribers) {
      try {
        subscriber.onLog(entry);
      } catch (err) {
        this.echoLine('warn', 'RUN', `log subscriber failed: ${(err as Error).message}`);
      }
    }

    if (this.echo) {
      this.echoLine(level, category, message);
    }
    return entry;
  }

  debug(category: LogCategory, message: string, details?: Record<string, unknown>): LogEntry | undefined {
    return this.log('debug', category, message, { details });
  }

  info(category: LogCategory, message: string, details?: Record<string, unknown>): LogEntry | undefined {
    return this.log('info', category, message, { details });
  }

  warn(category: LogCategory, message: string, details?: Record<string, unknown>): LogEntry | undefined {
    return this.log('warn', category, message, { details });
  }

  error(category: LogCategory, message: string, error?: unknown): LogEntry | undefined {
    const details =
      error === undefined
        ? undefined
        : {
            error: error instanceof Error ? error.message : String(error),
            stack: error instanceof Error ? error.stack : undefined,
          };
    return this.log('error', category, message, { details });
  }

  getAll(): LogEntry[] {
    return [...this.entries];
  }

  getByCategory(category: LogCategory): LogEntry[] {
    return this.entries.filter((e) => e.category === category);
  }

  getByLevel(level: LogLevelName): LogEntry[] {
    return this.entries.filter((e) => e.level === level);
  }

  clear(): void {
    this.entries = [];
  }

  subscribe(subscriber: LogSubscriber): () => void {
    this.subscribers.add(subscriber);
    return () => this.subscribers.delete(subscriber);
  }

  private echoLine(level: LogLevelName, category: LogCategory, message: string): void {
    console.error(`[oprun] ${level.toUpperCase()} ${category}: ${message}`);
  }
}

let globalLogger: Logger | null = null;

export function getLogger(): Logger {
  if (!globalLogger) {
    globalLogger = new Logger();
  }
  return globalLogger;
}

export function setLogLevel(level: LogLevelName): void {
  getLogger().setLevel(level);
}

export function resetLogger(): void {
  globalLogger = null;
}
