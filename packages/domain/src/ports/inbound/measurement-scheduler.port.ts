import type { Datapoint, MeasurementResult } from '../../entities/datapoint.js';
import type { MeasurementConfig } from '../../entities/measurement-config.js';
import type { RunOutcome } from '../../entities/run-outcome.js';

/**
 * Live datapoints of one run. Leaving a `for await` loop over the stream
 * (or calling `return()` on its iterator) stops the run.
 */
export interface DatapointStream extends AsyncIterable<Datapoint> {
  /** Settles once the background loop has exited. */
  readonly done: Promise<RunOutcome>;
}

export interface MeasurementSchedulerPort {
  start(config: MeasurementConfig): DatapointStream;
  runOnce(config: MeasurementConfig): Promise<MeasurementResult>;
}
