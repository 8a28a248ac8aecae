import type { Datapoint } from '../../entities/datapoint.js';

export interface MeasurementStorePort {
  /** Rewrite `path` with the whole sequence, creating parent directories. */
  save(path: string, datapoints: readonly Datapoint[]): Promise<void>;
  load(path: string): Promise<Datapoint[]>;
  /** Saved session files in `dir`, sorted by name. */
  list(dir: string): Promise<string[]>;
}
