import { isLatency, isThroughputDown, type Datapoint, type SessionSummary } from '@linetest/domain';

function mean(values: number[]): number {
  if (values.length === 0) return Number.NaN;
  return values.reduce((acc, v) => acc + v, 0) / values.length;
}

export function totalEntries(datapoints: readonly Datapoint[]): number {
  return datapoints.length;
}

/** Mean of the successful download samples, in Mbit/s. NaN when there are none. */
export function meanDownload(datapoints: readonly Datapoint[]): number {
  return mean(
    datapoints.filter(isThroughputDown).flatMap((dp) => (dp.value === null ? [] : [dp.value])),
  );
}

/** Mean round-trip time in ms; timeouts count in neither sum nor divisor. */
export function meanLatency(datapoints: readonly Datapoint[]): number {
  return mean(datapoints.filter(isLatency).flatMap((dp) => (dp.value === null ? [] : [dp.value])));
}

export function timeoutCount(datapoints: readonly Datapoint[]): number {
  return datapoints.filter((dp) => isLatency(dp) && dp.value === null).length;
}

/**
 * Timeouts over *all* entries, throughput samples included: 0 is perfect
 * availability, 1 total loss. NaN for an empty session.
 */
export function timeoutRatio(datapoints: readonly Datapoint[]): number {
  if (datapoints.length === 0) return Number.NaN;
  return timeoutCount(datapoints) / datapoints.length;
}

/** Milliseconds from the first entry to the last; never negative. */
export function sessionDuration(datapoints: readonly Datapoint[]): number {
  if (datapoints.length < 2) return 0;
  const first = datapoints[0];
  const last = datapoints[datapoints.length - 1];
  const span = last.at.getTime() - first.at.getTime();
  return Number.isFinite(span) && span > 0 ? span : 0;
}

export function summarize(datapoints: readonly Datapoint[]): SessionSummary {
  return {
    samples: totalEntries(datapoints),
    sessionDurationMs: sessionDuration(datapoints),
    meanDownloadMbit: meanDownload(datapoints),
    meanLatencyMs: meanLatency(datapoints),
    timeoutCount: timeoutCount(datapoints),
    timeoutRatio: timeoutRatio(datapoints),
  };
}
