export interface SessionSummary {
  readonly samples: number;
  readonly sessionDurationMs: number;
  /** NaN when no download succeeded. */
  readonly meanDownloadMbit: number;
  /** NaN when every probe timed out. */
  readonly meanLatencyMs: number;
  readonly timeoutCount: number;
  readonly timeoutRatio: number;
}
