import { describe, expect, test, vi } from 'vitest';

import { createLogger, errorFields, withLogContext } from './logger.js';

const captureStderr = (fn: () => void): string[] => {
  const lines: string[] = [];
  const spy = vi.spyOn(process.stderr, 'write').mockImplementation((chunk: unknown) => {
    lines.push(String(chunk));
    return true;
  });
  try {
    fn();
  } finally {
    spy.mockRestore();
  }
  return lines.filter(Boolean);
};

const lastEntry = (lines: string[]): Record<string, unknown> => {
  const last = lines.at(-1);
  if (!last) throw new Error('Expected a log line');
  return JSON.parse(last) as Record<string, unknown>;
};

describe('logger redaction', () => {
  test('redacts credential keys and session cookie values', () => {
    const lines = captureStderr(() => {
      const logger = createLogger({ app: 'test' }, 'debug');
      logger.info('hello', {
        authorization: 'Bearer ya29.abcdef',
        cookie: 'COMPASS=dynamite=abc',
        refresh_token: 'test-secret',
        note: 'Bearer also-should-redact',
        freeText: 'COMPASS cookie was dynamite=sid-123; path=/',
      });
    });

    const entry = lastEntry(lines);
    expect(entry.authorization).toBe('[REDACTED]');
    expect(entry.cookie).toBe('[REDACTED]');
    expect(entry.refresh_token).toBe('[REDACTED]');
    expect(entry.note).toBe('Bearer [REDACTED]');
    expect(entry.freeText).toBe('COMPASS cookie was dynamite=[REDACTED]; path=/');
  });

  test('does not throw on circular contexts', () => {
    const lines = captureStderr(() => {
      const logger = createLogger({ app: 'test' }, 'debug');
      const obj: { a: number; self?: unknown } = { a: 1 };
      obj.self = obj;
      logger.info('circular', { obj });
    });

    const entry = lastEntry(lines);
    expect(JSON.stringify(entry.obj)).toContain('[Circular]');
  });

  test('drops entries below the threshold and merges child bindings', () => {
    const lines = captureStderr(() => {
      const logger = createLogger({ app: 'test' }, 'warn').child({ component: 'webchannel' });
      logger.info('quiet');
      logger.warn('loud', { attempt: 2 });
    });

    expect(lines).toHaveLength(1);
    const entry = lastEntry(lines);
    expect(entry.msg).toBe('loud');
    expect(entry.level).toBe('warn');
    expect(entry.app).toBe('test');
    expect(entry.component).toBe('webchannel');
    expect(entry.attempt).toBe(2);
  });

  test('includes async log context', () => {
    const lines = captureStderr(() => {
      const logger = createLogger({}, 'debug');
      withLogContext({ conversationId: 'dm:abc' }, () => logger.debug('inside'));
    });
    expect(lastEntry(lines).conversationId).toBe('dm:abc');
  });
});

describe('errorFields', () => {
  test('describes errors and plain values', () => {
    const err = new Error('Bearer ya29.secret failed', { cause: 'socket' });
    expect(errorFields(err)).toEqual({
      errName: 'Error',
      errMsg: 'Bearer [REDACTED] failed',
      errCause: 'socket',
    });
    expect(errorFields('boom')).toEqual({ errMsg: 'boom' });
  });
});
