import type { ClockPort, HttpFetchPort } from '@linetest/domain';
import { silentLogger, type Logger } from '../../logging/logger.js';

export interface ThroughputSample {
  /** Dispatch of the first request to settlement of the last one. */
  readonly elapsedMs: number;
  /** Bytes received across successful downloads only. */
  readonly bytes: number;
  readonly succeeded: number;
  readonly failed: number;
}

/** Mbit/s for a sample; `null` when there is nothing to divide. */
export function toMbits(sample: ThroughputSample | null): number | null {
  if (!sample || sample.elapsedMs <= 0) return null;
  const mbit = (sample.bytes * 8) / 1_000_000;
  return mbit / (sample.elapsedMs / 1000);
}

/**
 * Measures how fast the link pulls data right now: every URL is downloaded
 * concurrently and the batch is reduced to one combined figure.
 */
export class ThroughputSampler {
  private readonly logger: Logger;

  constructor(
    private readonly http: HttpFetchPort,
    private readonly clock: ClockPort,
    logger: Logger = silentLogger,
  ) {
    this.logger = logger.child('throughput');
  }

  /** Aborting `signal` cancels the downloads in flight; the sample is then `null`. */
  async sample(urls: readonly string[], signal?: AbortSignal): Promise<ThroughputSample | null> {
    if (urls.length === 0) {
      this.logger.debug('no download urls configured; skipping sample');
      return null;
    }

    const startedMs = this.clock.monotonicMs();
    const results = await Promise.allSettled(urls.map((url) => this.http.fetch(url, signal)));
    const elapsedMs = this.clock.monotonicMs() - startedMs;

    if (signal?.aborted) {
      this.logger.debug(`sample cancelled after ${elapsedMs.toFixed(0)}ms`);
      return null;
    }

    let bytes = 0;
    let succeeded = 0;
    results.forEach((result, i) => {
      if (result.status === 'fulfilled') {
        bytes += result.value.byteLength;
        succeeded++;
      } else {
        this.logger.warn(`download failed ${urls[i]}: ${describe(result.reason)}`);
      }
    });

    const failed = urls.length - succeeded;
    if (succeeded === 0) {
      this.logger.warn(`all ${urls.length} downloads failed`);
      return null;
    }

    this.logger.debug(`downloaded ${bytes} B from ${succeeded}/${urls.length} urls in ${elapsedMs.toFixed(0)}ms`);
    return { elapsedMs, bytes, succeeded, failed };
  }

  /** One sample reduced to Mbit/s. */
  async measure(urls: readonly string[], signal?: AbortSignal): Promise<number | null> {
    return toMbits(await this.sample(urls, signal));
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
