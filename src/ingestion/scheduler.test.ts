import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { silentLogger } from '../testing/fixtures';
import type { CycleResult, SiloChannelMapping } from './pipeline';
import { PollScheduler } from './scheduler';

const mappings: SiloChannelMapping[] = [
  { siloName: 'North Silo', channelId: '1001', readKey: null },
  { siloName: 'South Silo', channelId: '1002', readKey: 'test-read-key' }
];

function storedResult(mapping: SiloChannelMapping): CycleResult {
  return { siloName: mapping.siloName, status: 'stored', alerts: [], eventCount: 0 };
}

describe('PollScheduler', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('runs one cycle per silo on every tick and none before the first', async () => {
    const runCycle = vi.fn(async (mapping: SiloChannelMapping) => storedResult(mapping));
    const scheduler = new PollScheduler({ runCycle }, mappings, 60_000, silentLogger());

    scheduler.start();
    expect(scheduler.running).toBe(true);
    expect(runCycle).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(60_000);
    expect(runCycle).toHaveBeenCalledTimes(2);
    expect(runCycle.mock.calls.map(([mapping]) => mapping.channelId)).toEqual(['1001', '1002']);

    await vi.advanceTimersByTimeAsync(60_000);
    expect(runCycle).toHaveBeenCalledTimes(4);

    scheduler.stop();
    await vi.advanceTimersByTimeAsync(180_000);
    expect(runCycle).toHaveBeenCalledTimes(4);
    expect(scheduler.running).toBe(false);
  });

  it('keeps other silos running when one cycle crashes', async () => {
    const runCycle = vi.fn(async (mapping: SiloChannelMapping) => {
      if (mapping.siloName === 'North Silo') {
        throw new Error('unexpected');
      }
      return storedResult(mapping);
    });
    const scheduler = new PollScheduler({ runCycle }, mappings, 60_000, silentLogger());

    const results = await scheduler.runOnce();

    expect(results).toEqual([storedResult(mappings[1])]);
  });

  it('lets idle wait for a tick that is still running', async () => {
    let finish: () => void = () => undefined;
    const runCycle = vi.fn(
      (mapping: SiloChannelMapping) =>
        new Promise<CycleResult>(resolve => {
          finish = () => resolve(storedResult(mapping));
        })
    );
    const scheduler = new PollScheduler({ runCycle }, [mappings[0]], 60_000, silentLogger());
    scheduler.start();
    await vi.advanceTimersByTimeAsync(60_000);
    scheduler.stop();

    let idle = false;
    const waiting = scheduler.idle().then(() => {
      idle = true;
    });
    await Promise.resolve();
    expect(idle).toBe(false);

    finish();
    await waiting;
    expect(idle).toBe(true);
  });
});
