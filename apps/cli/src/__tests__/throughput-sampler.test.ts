import { describe, it, expect } from '@jest/globals';
import { DeterministicClock } from '@linetest/adapters';
import { createLogger } from '../logging/logger.js';
import { ThroughputSampler, toMbits } from '../services/throughput/throughput-sampler.js';
import { FakeHttp, MemorySink } from './fakes.js';

const T0 = Date.UTC(2026, 0, 1);

describe('ThroughputSampler.sample', () => {
  it('returns null for an empty url list without fetching', async () => {
    const clock = new DeterministicClock(T0);
    const http = new FakeHttp(clock, {});
    const sampler = new ThroughputSampler(http, clock);

    await expect(sampler.sample([])).resolves.toBeNull();
    await expect(sampler.measure([])).resolves.toBeNull();
    expect(http.requested).toEqual([]);
  });

  it('sums successful bytes and waits for the slowest attempt, failed ones included', async () => {
    const clock = new DeterministicClock(T0);
    const http = new FakeHttp(clock, {
      'http://files.test/a': { bytes: 1_000, delayMs: 50 },
      'http://files.test/b': { fail: true, delayMs: 300 },
      'http://files.test/c': { bytes: 3_000, delayMs: 120 },
    });
    const sampler = new ThroughputSampler(http, clock);

    const sample = await sampler.sample(['http://files.test/a', 'http://files.test/b', 'http://files.test/c']);

    expect(sample).toEqual({ elapsedMs: 300, bytes: 4_000, succeeded: 2, failed: 1 });
  });

  it('dispatches every download before any completes', async () => {
    const clock = new DeterministicClock(T0);
    const http = new FakeHttp(clock, {
      'http://files.test/a': { bytes: 10, delayMs: 100 },
      'http://files.test/b': { bytes: 10, delayMs: 100 },
      'http://files.test/c': { bytes: 10, delayMs: 100 },
    });
    const sampler = new ThroughputSampler(http, clock);

    const sample = await sampler.sample(['http://files.test/a', 'http://files.test/b', 'http://files.test/c']);

    expect(sample?.elapsedMs).toBe(100);
    expect(http.requested).toHaveLength(3);
  });

  it('cancels downloads in flight when the signal aborts', async () => {
    const clock = new DeterministicClock(T0);
    const sink = new MemorySink();
    const http = new FakeHttp(clock, {
      'http://files.test/a': { bytes: 1_000, delayMs: 10_000 },
      'http://files.test/b': { bytes: 1_000, delayMs: 20_000 },
    });
    const sampler = new ThroughputSampler(http, clock, createLogger({ level: 'warn', sink }));
    const controller = new AbortController();

    const sampling = sampler.sample(['http://files.test/a', 'http://files.test/b'], controller.signal);
    controller.abort();

    await expect(sampling).resolves.toBeNull();
    expect(clock.monotonicMs()).toBe(T0);
    expect(clock.pendingSleeps).toBe(0);
    expect(sink.lines).toEqual([]);
  });

  it('returns null when every download fails and logs each failure', async () => {
    const clock = new DeterministicClock(T0);
    const sink = new MemorySink();
    const logger = createLogger({ level: 'warn', sink });
    const http = new FakeHttp(clock, {});
    const sampler = new ThroughputSampler(http, clock, logger);

    await expect(sampler.sample(['http://files.test/x', 'http://files.test/y'])).resolves.toBeNull();

    expect(sink.lines).toEqual([
      {
        level: 'warn',
        line: '[linetest:throughput] download failed http://files.test/x: connect ECONNREFUSED http://files.test/x',
      },
      {
        level: 'warn',
        line: '[linetest:throughput] download failed http://files.test/y: connect ECONNREFUSED http://files.test/y',
      },
      { level: 'warn', line: '[linetest:throughput] all 2 downloads failed' },
    ]);
  });

  it('measure() reduces a sample to Mbit/s', async () => {
    const clock = new DeterministicClock(T0);
    const http = new FakeHttp(clock, {
      'http://files.test/a': { bytes: 2_500_000, delayMs: 2_000 },
    });
    const sampler = new ThroughputSampler(http, clock);

    const mbits = await sampler.measure(['http://files.test/a']);

    expect(mbits).toBeCloseTo(10, 9);
  });

  it('measure() yields null when the downloads finish in zero time', async () => {
    const clock = new DeterministicClock(T0);
    const http = new FakeHttp(clock, { 'http://files.test/a': { bytes: 1_000 } });
    const sampler = new ThroughputSampler(http, clock);

    await expect(sampler.sample(['http://files.test/a'])).resolves.toEqual({
      elapsedMs: 0,
      bytes: 1_000,
      succeeded: 1,
      failed: 0,
    });
    await expect(sampler.measure(['http://files.test/a'])).resolves.toBeNull();
  });
});

describe('toMbits', () => {
  it('converts bytes over elapsed time to megabits per second', () => {
    expect(toMbits({ elapsedMs: 1_000, bytes: 1_250_000, succeeded: 1, failed: 0 })).toBeCloseTo(10, 9);
  });

  it('never divides by zero', () => {
    expect(toMbits({ elapsedMs: 0, bytes: 1_000, succeeded: 1, failed: 0 })).toBeNull();
    expect(toMbits(null)).toBeNull();
  });
});
