import { describe, it, expect, vi } from 'vitest';
import { createLogger, serializeError, type LogSink } from './logger';

function capture() {
  const lines: Array<{ level: string; entry: unknown }> = [];
  const sink: LogSink = (level, line) => {
    lines.push({ level, entry: JSON.parse(line) });
  };
  return { lines, sink };
}

describe('createLogger', () => {
  it('writes one JSON line per entry with level, time and message', () => {
    vi.useFakeTimers({ now: new Date('2026-07-01T00:00:00.000Z') });
    const { lines, sink } = capture();

    createLogger('info', {}, sink).info({ accountId: 3 }, 'Usage committed');

    expect(lines).toEqual([
      {
        level: 'info',
        entry: {
          level: 'info',
          time: '2026-07-01T00:00:00.000Z',
          accountId: 3,
          msg: 'Usage committed',
        },
      },
    ]);
    vi.useRealTimers();
  });

  it('drops entries below the configured level', () => {
    const { lines, sink } = capture();
    const logger = createLogger('warn', {}, sink);

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');
    logger.error('shown');

    expect(lines.map((l) => l.level)).toEqual(['warn', 'error']);
  });

  it('writes nothing when silent', () => {
    const { lines, sink } = capture();
    createLogger('silent', {}, sink).error('nope');
    expect(lines).toHaveLength(0);
  });

  it('carries bindings into children', () => {
    const { lines, sink } = capture();
    const child = createLogger('info', { service: 'gateway' }, sink).child({ requestId: 'r1' });

    child.info('hello');

    expect(lines[0]?.entry).toMatchObject({ service: 'gateway', requestId: 'r1', msg: 'hello' });
  });
});

describe('serializeError', () => {
  it('keeps name and message of errors', () => {
    expect(serializeError(new RangeError('bad'))).toMatchObject({ name: 'RangeError', message: 'bad' });
  });

  it('stringifies anything else', () => {
    expect(serializeError(42)).toEqual({ message: '42' });
  });
});
