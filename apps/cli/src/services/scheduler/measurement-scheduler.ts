import {
  latencyDatapoint,
  throughputDownDatapoint,
  type ClockPort,
  type Datapoint,
  type DatapointStream,
  type LatencyProbePort,
  type LatencyProbeSession,
  type MeasurementConfig,
  type MeasurementResult,
  type MeasurementSchedulerPort,
  type RunOutcome,
  type RunStopReason,
} from '@linetest/domain';
import { silentLogger, type Logger } from '../../logging/logger.js';
import { Channel } from '../stream/datapoint-channel.js';
import type { ThroughputSampler } from '../throughput/throughput-sampler.js';

export interface MeasurementSchedulerDeps {
  probe: LatencyProbePort;
  sampler: ThroughputSampler;
  clock: ClockPort;
  logger?: Logger;
}

interface RunContext {
  readonly config: MeasurementConfig;
  readonly session: LatencyProbeSession;
  readonly channel: Channel<Datapoint>;
  /** Aborted when the consumer disconnects; cuts the inter-probe sleep short. */
  readonly disconnected: AbortSignal;
  readonly startedAt: Date;
  readonly startedMs: number;
  published: number;
}

/**
 * Interleaves latency probes with throughput samples and streams the results.
 *
 * Each `start()` launches one background loop that is the only writer of its
 * stream: K probes `probeIntervalMs` apart, then one throughput sample, repeated
 * until the duration cap is reached or the consumer stops reading.
 */
export class MeasurementScheduler implements MeasurementSchedulerPort {
  private readonly probe: LatencyProbePort;
  private readonly sampler: ThroughputSampler;
  private readonly clock: ClockPort;
  private readonly logger: Logger;

  constructor(deps: MeasurementSchedulerDeps) {
    this.probe = deps.probe;
    this.sampler = deps.sampler;
    this.clock = deps.clock;
    this.logger = (deps.logger ?? silentLogger).child('scheduler');
  }

  /** Throws `ProbeSetupError` synchronously; no loop is started then. */
  start(config: MeasurementConfig): DatapointStream {
    const session = this.probe.open(config.pingTarget);
    const disconnect = new AbortController();
    const channel = new Channel<Datapoint>(() => disconnect.abort());
    const ctx: RunContext = {
      config,
      session,
      channel,
      disconnected: disconnect.signal,
      startedAt: this.clock.now(),
      startedMs: this.clock.monotonicMs(),
      published: 0,
    };

    this.logger.info(
      `run started target=${session.target} urls=${config.downloadUrls.length} ` +
        `interval=${config.probeIntervalMs}ms cap=${config.totalDurationMs ?? 'none'}`,
    );

    const done = this.loop(ctx);
    void done.catch((err: unknown) => this.logger.error('measurement loop failed', err));

    return {
      done,
      [Symbol.asyncIterator]: () => channel[Symbol.asyncIterator](),
    };
  }

  /** A single cycle collected in memory: K probes, then one throughput sample. */
  async runOnce(config: MeasurementConfig): Promise<MeasurementResult> {
    const session = this.probe.open(config.pingTarget);
    const result: MeasurementResult = [];

    for (let i = 0; i < config.latencyProbesPerCycle; i++) {
      if (i > 0) await this.clock.sleep(config.probeIntervalMs);
      const latency = await this.probeOnce(session);
      result.push(latencyDatapoint(latency, this.clock.now()));
    }
    this.logger.debug(`probes: ${result.map((dp) => dp.value ?? 'timeout').join(', ')}`);

    const mbits = await this.sampler.measure(config.downloadUrls);
    result.push(throughputDownDatapoint(mbits, this.clock.now()));
    return result;
  }

  private async loop(ctx: RunContext): Promise<RunOutcome> {
    const { config, session, channel } = ctx;
    try {
      for (;;) {
        for (let i = 0; i < config.latencyProbesPerCycle; i++) {
          const stop = this.stopReason(ctx);
          if (stop) return this.finish(ctx, stop);

          const latency = await this.probeOnce(session);
          if (!this.publish(ctx, latencyDatapoint(latency, this.clock.now()))) {
            return this.finish(ctx, 'consumer-disconnected');
          }
          this.logger.debug(`waiting ${config.probeIntervalMs}ms to next ping`);
          await this.clock.sleep(config.probeIntervalMs, ctx.disconnected);
        }

        const stop = this.stopReason(ctx);
        if (stop) return this.finish(ctx, stop);

        const sample = await this.measureWithinRun(ctx);
        if (!sample) return this.finish(ctx, this.stopReason(ctx) ?? 'duration-elapsed');
        if (!this.publish(ctx, throughputDownDatapoint(sample.mbits, this.clock.now()))) {
          return this.finish(ctx, 'consumer-disconnected');
        }
      }
    } catch (err) {
      channel.fail(err);
      throw err;
    }
  }

  /**
   * One throughput sample, cancelled when the duration cap passes or the
   * consumer disconnects. `null` when it was cancelled; nothing is published then.
   */
  private async measureWithinRun(ctx: RunContext): Promise<{ readonly mbits: number | null } | null> {
    const cut = new AbortController();
    const onDisconnect = (): void => cut.abort();
    ctx.disconnected.addEventListener('abort', onDisconnect, { once: true });

    // downloads are dispatched before the cap timer so a sample finishing exactly at the cap is kept
    const measuring = this.sampler.measure(ctx.config.downloadUrls, cut.signal);
    const cap = ctx.config.totalDurationMs;
    const capTimer =
      cap === undefined
        ? Promise.resolve()
        : this.clock
            .sleep(cap - (this.clock.monotonicMs() - ctx.startedMs), cut.signal)
            .then(() => cut.abort());

    try {
      const mbits = await measuring;
      if (cut.signal.aborted) {
        this.logger.info('throughput sample cancelled');
        return null;
      }
      return { mbits };
    } finally {
      ctx.disconnected.removeEventListener('abort', onDisconnect);
      cut.abort();
      await capTimer;
    }
  }

  private stopReason(ctx: RunContext): RunStopReason | null {
    if (ctx.channel.disconnected) return 'consumer-disconnected';
    const cap = ctx.config.totalDurationMs;
    if (cap !== undefined && this.clock.monotonicMs() - ctx.startedMs >= cap) {
      return 'duration-elapsed';
    }
    return null;
  }

  private publish(ctx: RunContext, dp: Datapoint): boolean {
    if (!ctx.channel.push(dp)) return false;
    ctx.published++;
    this.logger.debug(`published ${dp.kind} ${dp.value ?? 'none'}`);
    return true;
  }

  private finish(ctx: RunContext, reason: RunStopReason): RunOutcome {
    ctx.channel.close();
    const outcome: RunOutcome = {
      reason,
      published: ctx.published,
      startedAt: ctx.startedAt,
      endedAt: this.clock.now(),
    };
    this.logger.info(`run stopped (${reason}) after ${ctx.published} datapoints`);
    return outcome;
  }

  private async probeOnce(session: LatencyProbeSession): Promise<number | null> {
    const results: Array<number | null> = [];
    await session.probe((latencyMs) => results.push(latencyMs));
    if (results.length !== 1) {
      this.logger.warn(`probe delivered ${results.length} results; using the first`);
    }
    return results.length > 0 ? results[0] : null;
  }
}
