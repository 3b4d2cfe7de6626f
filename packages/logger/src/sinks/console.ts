import type { LogEntry, LogLevel, Sink } from '../logger.js';

export interface LogStream {
  write(chunk: string): unknown;
}

export interface ConsoleSinkOptions {
  color?: boolean | undefined;
  /** Defaults to process.stderr so stdout only carries command results. */
  stream?: LogStream | undefined;
}

const LEVEL_COLORS: Record<LogLevel, string> = {
  trace: '\x1b[90m',
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
};

/**
 * Writes each entry as one line as soon as it is logged.
 * Format: [HH:MM:SS] LEVEL [category] message {context}
 */
export class ConsoleSink implements Sink {
  private readonly color: boolean;
  private readonly stream: LogStream;

  constructor(options?: ConsoleSinkOptions) {
    this.color = options?.color ?? false;
    this.stream = options?.stream ?? process.stderr;
  }

  write(entry: LogEntry): void {
    const time = this.formatTime(entry.timestamp);
    const level = this.formatLevel(entry.level);
    const context = entry.context ? ` ${this.formatContext(entry.context)}` : '';

    this.stream.write(`${time} ${level} [${entry.category}] ${entry.msg}${context}\n`);
  }

  // Lines are written synchronously; nothing is held back
  flush(): void {
    return;
  }

  private formatTime(timestamp: Date): string {
    const hours = String(timestamp.getHours()).padStart(2, '0');
    const minutes = String(timestamp.getMinutes()).padStart(2, '0');
    const seconds = String(timestamp.getSeconds()).padStart(2, '0');
    return `[${hours}:${minutes}:${seconds}]`;
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
