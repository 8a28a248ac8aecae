import { performance } from 'node:perf_hooks';
import { setTimeout as delay } from 'node:timers/promises';
import type { ClockPort } from '@linetest/domain';

interface PendingSleep {
  wakeAtMs: number;
  seq: number;
  resolve: () => void;
}

/**
 * Virtual-time clock for tests.
 * Starts at `epochMs` and only moves when a sleeper wakes: pending sleeps fire
 * one per macrotask in wake-time order, so concurrent sleeps overlap instead of
 * adding up. Nothing waits on real time.
 */
export class DeterministicClock implements ClockPort {
  private currentMs: number;
  private readonly pending: PendingSleep[] = [];
  private seq = 0;
  private wakeScheduled = false;

  constructor(epochMs: number = Date.UTC(2026, 0, 1)) {
    this.currentMs = epochMs;
  }

  now(): Date {
    return new Date(this.currentMs);
  }

  monotonicMs(): number {
    return this.currentMs;
  }

  /** Move time forward without waking anyone early. */
  advance(ms: number): void {
    this.currentMs += ms;
  }

  sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) return Promise.resolve();
    return new Promise<void>((resolve) => {
      const onAbort = (): void => {
        const idx = this.pending.indexOf(entry);
        if (idx >= 0) this.pending.splice(idx, 1);
        resolve();
      };
      const entry: PendingSleep = {
        wakeAtMs: this.currentMs + Math.max(0, ms),
        seq: this.seq++,
        resolve: () => {
          signal?.removeEventListener('abort', onAbort);
          resolve();
        },
      };
      this.pending.push(entry);
      signal?.addEventListener('abort', onAbort, { once: true });
      this.scheduleWake();
    });
  }

  /** Sleepers not yet woken. */
  get pendingSleeps(): number {
    return this.pending.length;
  }

  private scheduleWake(): void {
    if (this.wakeScheduled) return;
    this.wakeScheduled = true;
    setImmediate(() => {
      this.wakeScheduled = false;
      this.wakeNext();
    });
  }

  private wakeNext(): void {
    if (this.pending.length === 0) return;
    this.pending.sort((a, b) => a.wakeAtMs - b.wakeAtMs || a.seq - b.seq);
    const next = this.pending.shift();
    if (!next) return;
    this.currentMs = Math.max(this.currentMs, next.wakeAtMs);
    next.resolve();
    if (this.pending.length > 0) this.scheduleWake();
  }
}

/** Wall-clock implementation for live runs. */
export class SystemClock implements ClockPort {
  now(): Date {
    return new Date();
  }

  monotonicMs(): number {
    return performance.now();
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) return;
    try {
      // zero still waits one macrotask
      await delay(Math.max(0, ms), undefined, { signal });
    } catch (err) {
      if (signal?.aborted) return;
      throw err;
    }
  }
}
