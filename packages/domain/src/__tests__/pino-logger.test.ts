import pino from 'pino';
import { describe, expect, it } from 'vitest';
import { PinoLogger } from '../infrastructure/pino-logger';

function capture(traceErrors: boolean) {
  const lines: Record<string, unknown>[] = [];
  const destination = {
    write(chunk: string) {
      lines.push(JSON.parse(chunk));
    },
  };
  const logger = new PinoLogger({ name: 'test', level: 'info', traceErrors }, pino({ level: 'info' }, destination));
  return { logger, lines };
}

describe('PinoLogger', () => {
  it('writes the message with its context', () => {
    const { logger, lines } = capture(false);

    logger.info('Scaled 2 -> 3 replicas', { from: 2, to: 3 });

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({ msg: 'Scaled 2 -> 3 replicas', from: 2, to: 3, level: 30 });
  });

  it('drops entries below the level', () => {
    const { logger, lines } = capture(false);

    logger.debug('noise');

    expect(lines).toEqual([]);
    expect(logger.getLevel()).toBe('info');
  });

  it('logs errors without a stack unless tracing is on', () => {
    const plain = capture(false);
    const traced = capture(true);
    const error = new Error('apiserver unavailable');

    plain.logger.error('Tick failed', error);
    traced.logger.error('Tick failed', error);

    expect(plain.lines[0]?.err).toEqual({ name: 'Error', message: 'apiserver unavailable' });
    expect(traced.lines[0]?.err).toEqual({ name: 'Error', message: 'apiserver unavailable', stack: error.stack });
  });

  it('binds child names', () => {
    const { logger, lines } = capture(false);

    logger.child({ name: 'autoscaler' }).warn('slow');

    expect(lines[0]).toMatchObject({ name: 'autoscaler', msg: 'slow', level: 40 });
  });
});
