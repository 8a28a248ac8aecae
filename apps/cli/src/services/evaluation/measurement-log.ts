import type { Datapoint, MeasurementStorePort, SessionSummary } from '@linetest/domain';
import { summarize } from './evaluation.js';

/**
 * The consumer's copy of a session. Grows by `append` during a live run,
 * or is replaced wholesale by `load`.
 */
export class MeasurementLog {
  private datapoints: Datapoint[] = [];

  constructor(private readonly store: MeasurementStorePort) {}

  get entries(): readonly Datapoint[] {
    return this.datapoints;
  }

  get length(): number {
    return this.datapoints.length;
  }

  append(dp: Datapoint): void {
    this.datapoints.push(dp);
  }

  clear(): void {
    this.datapoints = [];
  }

  summary(): SessionSummary {
    return summarize(this.datapoints);
  }

  /** Rewrites `path` with everything accumulated so far. */
  async save(path: string): Promise<void> {
    await this.store.save(path, this.datapoints);
  }

  /** Replaces the in-memory session; on failure it is left as it was. */
  async load(path: string): Promise<void> {
    const loaded = await this.store.load(path);
    this.datapoints = loaded;
  }
}
