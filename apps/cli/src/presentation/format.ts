import type { Datapoint, SessionSummary } from '@linetest/domain';

export function formatDatapoint(dp: Datapoint): string {
  switch (dp.kind) {
    case 'Latency':
      return dp.value === null ? 'Ping:\tTimeout' : `Ping:\t${dp.value.toFixed(2)} ms`;
    case 'ThroughputDown':
      return dp.value === null ? 'Speed:\tTimeout' : `Speed:\t${dp.value.toFixed(1)} Mbit/s`;
    case 'ThroughputUp':
      return dp.value === null ? 'Upload speed:\tTimeout' : `Upload speed:\t${dp.value.toFixed(1)} Mbit/s`;
  }
}

function orDash(value: number, digits: number, unit: string): string {
  return Number.isFinite(value) ? `${value.toFixed(digits)} ${unit}` : '-';
}

export function formatSummary(summary: SessionSummary): string[] {
  return [
    `${summary.samples} samples`,
    `Time: ${(summary.sessionDurationMs / 1000).toFixed(1)}s`,
    `Download: ${orDash(summary.meanDownloadMbit, 1, 'Mbit/s')}`,
    `Latency: ${orDash(summary.meanLatencyMs, 1, 'ms')}`,
    `${summary.timeoutCount} timeouts`,
    `Timeout ratio: ${orDash(summary.timeoutRatio * 100, 1, '%')}`,
  ];
}
