export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

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

export interface Logger {
  trace(msg: string): void;
  trace(obj: Record<string, unknown>, msg: string): void;
  debug(msg: string): void;
  debug(obj: Record<string, unknown>, msg: string): void;
  info(msg: string): void;
  info(obj: Record<string, unknown>, msg: string): void;
  warn(msg: string): void;
  warn(obj: Record<string, unknown>, msg: string): void;
  error(msg: string): void;
  error(obj: Record<string, unknown>, msg: string): void;
}

export interface LoggerConfig {
  level?: LogLevel | undefined;
  sinks?: Sink[] | undefined;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Make a context object safe for JSON sinks.
 * Errors become plain objects, cycles become '[Circular]'.
 */
function serializeContext(obj: Record<string, unknown>): Record<string, unknown> {
  const seen = new WeakSet<object>();

  const replacer = (_key: string, value: unknown): unknown => {
    if (value instanceof Error) {
      return {
        name: value.name,
        message: value.message,
        stack: value.stack,
      };
    }

    if (typeof value === 'object' && value !== null) {
      if (seen.has(value)) {
        return '[Circular]';
      }
      seen.add(value);
    }

    return value;
  };

  try {
    return JSON.parse(JSON.stringify(obj, replacer)) as Record<string, unknown>;
  } catch {
    return { error: '[unserializable]' };
  }
}

let globalLevel: LogLevel = 'info';
let globalSinks: Sink[] = [];

class CategoryLogger implements Logger {
  constructor(private readonly category: string) {}

  trace(msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    this.log('trace', msgOrObj, maybeMsg);
  }

  debug(msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    this.log('debug', msgOrObj, maybeMsg);
  }

  info(msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    this.log('info', msgOrObj, maybeMsg);
  }

  warn(msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    this.log('warn', msgOrObj, maybeMsg);
  }

  error(msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    this.log('error', msgOrObj, maybeMsg);
  }

  private log(level: LogLevel, msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(globalLevel)) return;
    if (globalSinks.length === 0) return;

    const entry: LogEntry =
      typeof msgOrObj === 'string'
        ? { level, category: this.category, timestamp: new Date(), msg: msgOrObj }
        : {
            level,
            category: this.category,
            timestamp: new Date(),
            msg: maybeMsg ?? '',
            context: serializeContext(msgOrObj),
          };

    for (const sink of globalSinks) {
      sink.write(entry);
    }
  }
}

const loggerCache = new Map<string, Logger>();

/**
 * Configure level and sinks for every logger, including ones already handed out.
 * Until this is called loggers have no sinks and stay silent.
 */
export function initLogger(config: LoggerConfig): void {
  globalLevel = config.level ?? 'info';
  globalSinks = config.sinks ?? [];
}

export function getLogger(category: string): Logger {
  const cached = loggerCache.get(category);
  if (cached) {
    return cached;
  }

  const logger = new CategoryLogger(category);
  loggerCache.set(category, logger);
  return logger;
}

export function flushLoggers(): void {
  for (const sink of globalSinks) {
    sink.flush();
  }
}
