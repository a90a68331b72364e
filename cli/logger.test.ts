import { afterEach, describe, it, expect, vi } from 'vitest';
import { createLogger } from './logger.ts';

describe('cli logger', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('formats lines as time | level | module | message', () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-02T03:04:05.000Z'));
    const lines: string[] = [];
    const logger = createLogger('debug', (line) => lines.push(line));
    logger.forModule('cli').warn('careful');
    expect(lines).toEqual(['2026-01-02T03:04:05.000Z | warn | cli | careful']);
  });

  it('drops messages below the threshold', () => {
    const lines: string[] = [];
    const logger = createLogger('warn', (line) => lines.push(line));
    const log = logger.forModule('session');
    log.debug('noise');
    log.info('noise');
    log.error('boom');
    expect(logger.level).toBe('warn');
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/ \| error \| session \| boom$/);
  });

  it('reuses one module logger per name', () => {
    const logger = createLogger('info', () => {});
    expect(logger.forModule('session')).toBe(logger.forModule('session'));
    expect(logger.forModule('session')).not.toBe(logger.forModule('cli'));
  });

  it('writes errors with their stack, or name and message without one', () => {
    const lines: string[] = [];
    const log = createLogger('error', (line) => lines.push(line)).forModule('cli');
    const bare = new RangeError('too small');
    bare.stack = undefined;
    log.error(bare);
    const traced = new Error('boom');
    traced.stack = 'Error: boom\n    at here';
    log.error(traced);
    expect(lines[0]).toMatch(/ \| error \| cli \| RangeError: too small$/);
    expect(lines[1]).toMatch(/ \| error \| cli \| Error: boom\n {4}at here$/);
  });
});
