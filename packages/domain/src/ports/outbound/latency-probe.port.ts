/** Receives one probe outcome: round-trip milliseconds, or `null` on timeout. */
export type ProbeResultSink = (latencyMs: number | null) => void;

export interface LatencyProbeSession {
  readonly target: string;
  /**
   * Send one probe. Calls `onResult` exactly once, then resolves.
   * Rejects only when the probe facility itself breaks.
   */
  probe(onResult: ProbeResultSink): Promise<void>;
}

export interface LatencyProbePort {
  /** Synchronous; throws `ProbeSetupError` when probing is impossible here. */
  open(target: string): LatencyProbeSession;
}
