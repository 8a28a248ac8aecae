export const DEFAULT_PING_TARGET = '8.8.8.8';
export const DEFAULT_PROBE_INTERVAL_MS = 7_000;
export const DEFAULT_LATENCY_PROBES_PER_CYCLE = 10;

export interface MeasurementConfig {
  /** Host for latency probes. Only a single target is probed per run. */
  readonly pingTarget: string;
  /** Files downloaded in parallel for each throughput sample. */
  readonly downloadUrls: readonly string[];
  readonly probeIntervalMs: number;
  /** Absent = run until the consumer stops reading. */
  readonly totalDurationMs?: number;
  readonly logPath?: string;
  /** Latency probes performed before each throughput sample. */
  readonly latencyProbesPerCycle: number;
}

export interface MeasurementConfigInput {
  pingTargets?: readonly string[];
  downloadUrls?: readonly string[];
  probeIntervalMs?: number;
  totalDurationMs?: number;
  logPath?: string;
  latencyProbesPerCycle?: number;
}

/**
 * Build an immutable config. A running scheduler never sees later edits:
 * changing a setting means building a new config for the next run.
 */
export function createMeasurementConfig(input: MeasurementConfigInput = {}): MeasurementConfig {
  const config: MeasurementConfig = {
    pingTarget: input.pingTargets?.[0] ?? DEFAULT_PING_TARGET,
    downloadUrls: Object.freeze([...(input.downloadUrls ?? [])]),
    probeIntervalMs: input.probeIntervalMs ?? DEFAULT_PROBE_INTERVAL_MS,
    latencyProbesPerCycle: input.latencyProbesPerCycle ?? DEFAULT_LATENCY_PROBES_PER_CYCLE,
    ...(input.totalDurationMs !== undefined ? { totalDurationMs: input.totalDurationMs } : {}),
    ...(input.logPath !== undefined ? { logPath: input.logPath } : {}),
  };
  return Object.freeze(config);
}
