import { describe, it, expect, vi, afterEach } from 'vitest';
import logger from '../src/utils/logger';
import { FanoutEventSink, LoggingEventSink, MemoryEventSink } from '../src/vault/sinks';
import type { StakingEvent } from '../src/types';

const claimed: StakingEvent = {
  type: 'reward_claimed',
  account: 'alice',
  reward: 42n,
  timestamp: 7n,
};

describe('event sinks', () => {
  afterEach(() => {
    logger.setLevel('silent');
    vi.restoreAllMocks();
  });

  it('should fan out to every sink and filter by type', () => {
    const a = new MemoryEventSink();
    const b = new MemoryEventSink();
    new FanoutEventSink([a, b]).emit(claimed);

    expect(a.events).toEqual([claimed]);
    expect(b.ofType('reward_claimed')).toEqual([claimed]);
    expect(b.ofType('staked')).toEqual([]);
  });

  it('should log events with bigints rendered as strings', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    logger.setLevel('info');

    new LoggingEventSink().emit(claimed);

    expect(info).toHaveBeenCalledTimes(1);
    expect(info.mock.calls[0][0]).toContain(
      '[EVENT] reward_claimed {"type":"reward_claimed","account":"alice","reward":"42","timestamp":"7"}',
    );
  });

  it('should drop lines below the configured level', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    logger.setLevel('warn');

    logger.info('[TEST] quiet');
    logger.warn('[TEST] loud');

    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toMatch(/WARN  \[TEST\] loud$/);
  });
});
