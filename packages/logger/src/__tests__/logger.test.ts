/* eslint-disable @typescript-eslint/no-empty-function -- acceptable in tests */
import { beforeEach, describe, expect, it, vi } from 'vitest';

import { flushLoggers, getLogger, initLogger, isLogLevel, type LogEntry, type Sink } from '../logger.js';
import { ConsoleSink } from '../sinks/console.js';

function createMemorySink(): Sink & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  return {
    entries,
    write: (entry: LogEntry) => entries.push(entry),
    flush: () => {},
  };
}

function createStream(): { lines: string[]; write: (chunk: string) => boolean } {
  const lines: string[] = [];
  return {
    lines,
    write: (chunk: string) => {
      lines.push(chunk);
      return true;
    },
  };
}

describe('Logger', () => {
  beforeEach(() => {
    initLogger({ sinks: [] });
  });

  it('should be silent when no sinks are configured', () => {
    const stderrSpy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const logger = getLogger('test');

    logger.info('test message');
    logger.error('error message');

    expect(stderrSpy).not.toHaveBeenCalled();
    stderrSpy.mockRestore();
  });

  it('should log to sink when initialized', () => {
    const sink = createMemorySink();
    initLogger({ level: 'info', sinks: [sink] });
    const logger = getLogger('IndexFetcher');

    logger.info('fetching');

    expect(sink.entries).toHaveLength(1);
    expect(sink.entries[0]?.level).toBe('info');
    expect(sink.entries[0]?.category).toBe('IndexFetcher');
    expect(sink.entries[0]?.msg).toBe('fetching');
  });

  it('should apply a new configuration to loggers created earlier', () => {
    const logger = getLogger('early');
    const sink = createMemorySink();

    initLogger({ level: 'debug', sinks: [sink] });
    logger.debug('after init');

    expect(sink.entries.map((e) => e.msg)).toEqual(['after init']);
  });

  it('should respect log levels', () => {
    const sink = createMemorySink();
    initLogger({ level: 'warn', sinks: [sink] });
    const logger = getLogger('test');

    logger.trace('trace message');
    logger.debug('debug message');
    logger.info('info message');
    logger.warn('warn message');
    logger.error('error message');

    expect(sink.entries.map((e) => e.level)).toEqual(['warn', 'error']);
  });

  it('should attach context objects', () => {
    const sink = createMemorySink();
    initLogger({ level: 'info', sinks: [sink] });

    getLogger('test').info({ source: 'http://example.test/djia/', attempt: 1 }, 'source failed');

    expect(sink.entries[0]?.msg).toBe('source failed');
    expect(sink.entries[0]?.context).toEqual({ source: 'http://example.test/djia/', attempt: 1 });
  });

  it('should serialize Error objects in context', () => {
    const sink = createMemorySink();
    initLogger({ level: 'info', sinks: [sink] });

    getLogger('test').error({ error: new Error('test error') }, 'operation failed');

    expect(sink.entries[0]?.context?.['error']).toMatchObject({
      name: 'Error',
      message: 'test error',
    });
  });

  it('should replace circular references in context', () => {
    const sink = createMemorySink();
    initLogger({ level: 'info', sinks: [sink] });

    const obj: Record<string, unknown> = { name: 'test' };
    obj['self'] = obj;
    getLogger('test').info({ data: obj }, 'circular reference test');

    expect(sink.entries[0]?.context?.['data']).toEqual({ name: 'test', self: '[Circular]' });
  });

  it('should return the same instance for a category', () => {
    expect(getLogger('same')).toBe(getLogger('same'));
  });

  it('should flush every configured sink', () => {
    const flush = vi.fn();
    initLogger({ sinks: [{ write: () => {}, flush }, { write: () => {}, flush }] });

    flushLoggers();

    expect(flush).toHaveBeenCalledTimes(2);
  });
});

describe('isLogLevel', () => {
  it('should accept known levels only', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('error')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel('')).toBe(false);
  });
});

describe('ConsoleSink', () => {
  it('should format entries as a single line on the configured stream', () => {
    const stream = createStream();
    const sink = new ConsoleSink({ color: false, stream });

    sink.write({
      level: 'info',
      category: 'test',
      timestamp: new Date(2024, 0, 1, 9, 5, 3),
      msg: 'test message',
    });
    sink.flush();

    expect(stream.lines).toEqual(['[09:05:03] INFO  [test] test message\n']);
  });

  it('should format context as key=value pairs', () => {
    const stream = createStream();
    const sink = new ConsoleSink({ color: false, stream });

    sink.write({
      level: 'warn',
      category: 'test',
      timestamp: new Date(2024, 0, 1, 12, 0, 0),
      msg: 'source failed',
      context: { attempt: 2, source: 'mirror' },
    });
    sink.flush();

    expect(stream.lines).toEqual(['[12:00:00] WARN  [test] source failed {attempt=2, source="mirror"}\n']);
  });

  it('should write each entry without waiting for a flush', () => {
    const stream = createStream();
    initLogger({ level: 'debug', sinks: [new ConsoleSink({ stream })] });

    getLogger('IndexFetcher').debug('first');
    getLogger('IndexFetcher').warn('second');

    expect(stream.lines).toHaveLength(2);
    expect(stream.lines[0]).toMatch(/^\[\d{2}:\d{2}:\d{2}\] DEBUG \[IndexFetcher\] first\n$/);
    expect(stream.lines[1]).toMatch(/^\[\d{2}:\d{2}:\d{2}\] WARN  \[IndexFetcher\] second\n$/);
  });

  it('should wrap the level in ANSI colors when enabled', () => {
    const stream = createStream();
    const sink = new ConsoleSink({ color: true, stream });

    sink.write({ level: 'error', category: 'c', timestamp: new Date(2024, 0, 1, 0, 0, 0), msg: 'm' });
    sink.flush();

    expect(stream.lines).toEqual(['[00:00:00] \x1b[31mERROR\x1b[0m [c] m\n']);
  });
});
