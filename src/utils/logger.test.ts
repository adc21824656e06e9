import { beforeEach, describe, it, expect, vi } from 'vitest';
import { logger } from './logger.js';

describe('logger', () => {
  beforeEach(() => {
    logger.clear();
  });

  it('notifies subscribers until they unsubscribe', () => {
    const subscriber = vi.fn();
    const unsubscribe = logger.subscribe(subscriber);
    expect(subscriber).toHaveBeenCalledTimes(1);

    logger.info('wrapped', { lines: 1 });
    expect(subscriber).toHaveBeenCalledTimes(2);
    expect(logger.getLogs().map(entry => [entry.level, entry.message])).toEqual([['info', 'wrapped']]);

    unsubscribe();
    logger.warn('ignored');
    expect(subscriber).toHaveBeenCalledTimes(2);
  });

  it('keeps only the most recent 50 entries', () => {
    for (let i = 0; i < 60; i++) {
      logger.debug(`entry ${i}`);
    }
    const logs = logger.getLogs();
    expect(logs).toHaveLength(50);
    expect(logs[0].message).toBe('entry 10');
    expect(logs[49].message).toBe('entry 59');
  });
});
