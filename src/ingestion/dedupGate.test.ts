import { describe, expect, it } from 'vitest';

import { DEFAULT_MIN_INTERVAL_MS, DeduplicationGate } from './dedupGate';

const HOUR_MS = 60 * 60 * 1000;

function sample(timestamp: string, overrides: Partial<{ temperature: number | null; lux: number | null }> = {}) {
  return {
    temperature: 22.5,
    humidity: 48,
    gas: 410,
    luminosityAlert: 0,
    lux: 2,
    timestamp: new Date(timestamp),
    ...overrides
  };
}

describe('DeduplicationGate', () => {
  const gate = new DeduplicationGate();

  it('defaults to a five hour window', () => {
    expect(DEFAULT_MIN_INTERVAL_MS).toBe(5 * HOUR_MS);
  });

  it('accepts the first reading for a silo', () => {
    expect(gate.evaluate(sample('2024-05-01T10:00:00Z'), null)).toEqual({
      accepted: true,
      reason: 'first',
      elapsedMs: null
    });
  });

  it('accepts a changed reading regardless of elapsed time', () => {
    const previous = sample('2024-05-01T10:00:00Z');
    const current = sample('2024-05-01T10:01:00Z', { temperature: 22.6 });

    expect(gate.evaluate(current, previous)).toEqual({ accepted: true, reason: 'changed', elapsedMs: 60_000 });
  });

  it('treats a value appearing where there was none as a change', () => {
    const previous = sample('2024-05-01T10:00:00Z', { lux: null });
    const current = sample('2024-05-01T10:05:00Z');

    expect(gate.evaluate(current, previous).reason).toBe('changed');
  });

  it('suppresses an identical reading inside the window', () => {
    const previous = sample('2024-05-01T10:00:00Z');
    const current = sample('2024-05-01T14:59:59Z');

    expect(gate.evaluate(current, previous)).toEqual({
      accepted: false,
      reason: 'duplicate',
      elapsedMs: 5 * HOUR_MS - 1000
    });
  });

  it('accepts an identical reading once the window has fully elapsed', () => {
    const previous = sample('2024-05-01T10:00:00Z');

    expect(gate.evaluate(sample('2024-05-01T15:00:00Z'), previous)).toEqual({
      accepted: true,
      reason: 'interval_elapsed',
      elapsedMs: 5 * HOUR_MS
    });
  });

  it('honours a configured window', () => {
    const shortGate = new DeduplicationGate(60_000);
    const previous = sample('2024-05-01T10:00:00Z');

    expect(shortGate.evaluate(sample('2024-05-01T10:00:30Z'), previous).accepted).toBe(false);
    expect(shortGate.evaluate(sample('2024-05-01T10:01:00Z'), previous).accepted).toBe(true);
  });
});
