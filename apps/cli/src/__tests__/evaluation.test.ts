/**
 * Evaluation tests
 *
 * timeoutRatio divides by every entry, throughput samples included. The
 * assertions below pin that current behaviour.
 */

import { describe, it, expect } from '@jest/globals';
import {
  latencyDatapoint,
  throughputDownDatapoint,
  throughputUpDatapoint,
  type Datapoint,
} from '@linetest/domain';
import {
  meanDownload,
  meanLatency,
  sessionDuration,
  summarize,
  timeoutCount,
  timeoutRatio,
  totalEntries,
} from '../services/evaluation/evaluation.js';

// ─── Helpers ──────────────────────────────────────────────────────────────────

const T0 = Date.UTC(2026, 0, 1);
const at = (sec: number): Date => new Date(T0 + sec * 1000);

const SESSION: Datapoint[] = [
  latencyDatapoint(10, at(0)),
  latencyDatapoint(null, at(1)),
  latencyDatapoint(30, at(2)),
  throughputDownDatapoint(50, at(3)),
  throughputDownDatapoint(null, at(4)),
  throughputDownDatapoint(70, at(5)),
];

// ─── Means ────────────────────────────────────────────────────────────────────

describe('meanLatency', () => {
  it('averages successful probes only', () => {
    expect(meanLatency(SESSION)).toBe(20);
  });

  it('is NaN when every probe timed out', () => {
    expect(meanLatency([latencyDatapoint(null, at(0)), latencyDatapoint(null, at(1))])).toBeNaN();
  });

  it('is NaN for an empty session', () => {
    expect(meanLatency([])).toBeNaN();
  });
});

describe('meanDownload', () => {
  it('averages the successful download samples', () => {
    expect(meanDownload(SESSION)).toBe(60);
  });

  it('ignores upload samples', () => {
    expect(meanDownload([...SESSION, throughputUpDatapoint(1_000, at(6))])).toBe(60);
  });

  it('is NaN without a successful download', () => {
    expect(meanDownload([latencyDatapoint(10, at(0)), throughputDownDatapoint(null, at(1))])).toBeNaN();
  });
});

// ─── Timeouts ─────────────────────────────────────────────────────────────────

describe('timeoutCount / timeoutRatio', () => {
  it('counts latency entries without a value', () => {
    expect(timeoutCount(SESSION)).toBe(1);
  });

  it('does not count failed downloads as timeouts', () => {
    expect(timeoutCount([throughputDownDatapoint(null, at(0))])).toBe(0);
  });

  it('divides by all entries (current semantics)', () => {
    expect(totalEntries(SESSION)).toBe(6);
    expect(timeoutRatio(SESSION)).toBeCloseTo(1 / 6, 12);
  });

  it('is 1 for total loss and 0 for perfect availability', () => {
    expect(timeoutRatio([latencyDatapoint(null, at(0))])).toBe(1);
    expect(timeoutRatio([latencyDatapoint(3, at(0)), throughputDownDatapoint(9, at(1))])).toBe(0);
  });

  it('stays within [0, 1] and never exceeds the entry count', () => {
    const sequences: Datapoint[][] = [];
    for (let n = 1; n <= 24; n++) {
      const seq: Datapoint[] = [];
      for (let i = 0; i < n; i++) {
        if (i % 11 === 10) seq.push(throughputDownDatapoint(i % 2 === 0 ? null : 42, at(i)));
        else seq.push(latencyDatapoint((i * n) % 3 === 0 ? null : 15 + i, at(i)));
      }
      sequences.push(seq);
    }

    for (const seq of sequences) {
      expect(timeoutCount(seq)).toBeLessThanOrEqual(totalEntries(seq));
      expect(timeoutRatio(seq)).toBeGreaterThanOrEqual(0);
      expect(timeoutRatio(seq)).toBeLessThanOrEqual(1);
    }
  });
});

// ─── Duration ─────────────────────────────────────────────────────────────────

describe('sessionDuration', () => {
  it('spans first to last entry in ms', () => {
    expect(sessionDuration(SESSION)).toBe(5_000);
  });

  it('is 0 with fewer than two entries', () => {
    expect(sessionDuration([])).toBe(0);
    expect(sessionDuration([latencyDatapoint(1, at(0))])).toBe(0);
  });

  it('clamps to 0 when the last entry predates the first', () => {
    expect(sessionDuration([latencyDatapoint(1, at(10)), latencyDatapoint(1, at(2))])).toBe(0);
  });
});

describe('summarize', () => {
  it('collects every statistic', () => {
    const summary = summarize(SESSION);
    expect(summary).toEqual({
      samples: 6,
      sessionDurationMs: 5_000,
      meanDownloadMbit: 60,
      meanLatencyMs: 20,
      timeoutCount: 1,
      timeoutRatio: 1 / 6,
    });
  });
});
