export type RunStopReason = 'duration-elapsed' | 'consumer-disconnected';

export interface RunOutcome {
  readonly reason: RunStopReason;
  /** Datapoints the consumer's stream accepted. */
  readonly published: number;
  readonly startedAt: Date;
  readonly endedAt: Date;
}
