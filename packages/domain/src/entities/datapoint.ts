export type DatapointKind = 'Latency' | 'ThroughputUp' | 'ThroughputDown';

/** Round-trip time in milliseconds; `null` when the probe timed out. */
export interface LatencyDatapoint {
  readonly kind: 'Latency';
  readonly value: number | null;
  readonly at: Date;
}

/** Aggregate download rate in Mbit/s; `null` when every download failed. */
export interface ThroughputDownDatapoint {
  readonly kind: 'ThroughputDown';
  readonly value: number | null;
  readonly at: Date;
}

/** Upload rate in Mbit/s. Reserved: no scheduler produces it yet. */
export interface ThroughputUpDatapoint {
  readonly kind: 'ThroughputUp';
  readonly value: number | null;
  readonly at: Date;
}

export type Datapoint = LatencyDatapoint | ThroughputDownDatapoint | ThroughputUpDatapoint;

/** Ordered sequence of datapoints; insertion order is temporal order. */
export type MeasurementResult = Datapoint[];

export function latencyDatapoint(value: number | null, at: Date): LatencyDatapoint {
  return Object.freeze({ kind: 'Latency', value, at });
}

export function throughputDownDatapoint(value: number | null, at: Date): ThroughputDownDatapoint {
  return Object.freeze({ kind: 'ThroughputDown', value, at });
}

export function throughputUpDatapoint(value: number | null, at: Date): ThroughputUpDatapoint {
  return Object.freeze({ kind: 'ThroughputUp', value, at });
}

export function isLatency(dp: Datapoint): dp is LatencyDatapoint {
  return dp.kind === 'Latency';
}

export function isThroughputDown(dp: Datapoint): dp is ThroughputDownDatapoint {
  return dp.kind === 'ThroughputDown';
}
