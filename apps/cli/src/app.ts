import {
  JsonFileMeasurementStore,
  SystemClock,
  SystemPingProbe,
  UndiciHttpFetcher,
} from '@linetest/adapters';
import type {
  ClockPort,
  HttpFetchPort,
  LatencyProbePort,
  MeasurementSchedulerPort,
  MeasurementStorePort,
  RunOutcome,
  SessionSummary,
} from '@linetest/domain';
import type { AppConfig } from './config/app-config.js';
import type { Logger } from './logging/logger.js';
import { formatDatapoint, formatSummary } from './presentation/format.js';
import { MeasurementLog } from './services/evaluation/measurement-log.js';
import { MeasurementScheduler } from './services/scheduler/measurement-scheduler.js';
import { ThroughputSampler } from './services/throughput/throughput-sampler.js';

export type Output = (line: string) => void;

export interface Services {
  readonly scheduler: MeasurementSchedulerPort;
  readonly store: MeasurementStorePort;
}

export interface ServiceOverrides {
  probe?: LatencyProbePort;
  http?: HttpFetchPort;
  clock?: ClockPort;
  store?: MeasurementStorePort;
}

/** Wire the ports to their default adapters; tests swap any of them. */
export function buildServices(logger: Logger, overrides: ServiceOverrides = {}): Services {
  const clock = overrides.clock ?? new SystemClock();
  const sampler = new ThroughputSampler(overrides.http ?? new UndiciHttpFetcher(), clock, logger);
  const scheduler = new MeasurementScheduler({
    probe: overrides.probe ?? new SystemPingProbe(),
    sampler,
    clock,
    logger,
  });
  return { scheduler, store: overrides.store ?? new JsonFileMeasurementStore() };
}

export interface LiveRunResult {
  readonly outcome: RunOutcome;
  readonly summary: SessionSummary;
}

/**
 * Consume a live run: print each datapoint and rewrite the session file after
 * every one. Aborting `stop` drops the stream, which ends the run.
 */
export async function runLive(
  config: AppConfig,
  services: Services,
  out: Output,
  logger: Logger,
  stop: AbortSignal,
): Promise<LiveRunResult> {
  const { logPath } = config.measurement;
  const log = new MeasurementLog(services.store);
  const stream = services.scheduler.start(config.measurement);
  const iterator = stream[Symbol.asyncIterator]();

  const drop = (): void => {
    logger.info('stop requested');
    void iterator.return?.();
  };
  stop.addEventListener('abort', drop, { once: true });
  if (stop.aborted) drop();

  if (logPath) logger.info(`saving session to ${logPath}`);

  try {
    for (let next = await iterator.next(); !next.done; next = await iterator.next()) {
      const dp = next.value;
      out(formatDatapoint(dp));
      log.append(dp);
      if (logPath) await log.save(logPath);
    }
  } finally {
    stop.removeEventListener('abort', drop);
    await iterator.return?.();
  }

  const outcome = await stream.done;
  const summary = log.summary();
  formatSummary(summary).forEach((line) => out(line));
  return { outcome, summary };
}

export async function runOnceMode(config: AppConfig, services: Services, out: Output): Promise<SessionSummary> {
  const log = new MeasurementLog(services.store);
  const result = await services.scheduler.runOnce(config.measurement);
  for (const dp of result) {
    out(formatDatapoint(dp));
    log.append(dp);
  }
  if (config.measurement.logPath) await log.save(config.measurement.logPath);
  const summary = log.summary();
  formatSummary(summary).forEach((line) => out(line));
  return summary;
}

/** Replace the view with a saved session and summarize it. */
export async function runLoad(path: string, services: Services, out: Output, logger: Logger): Promise<SessionSummary> {
  const log = new MeasurementLog(services.store);
  await log.load(path);
  logger.info(`loaded ${log.length} data points from ${path}`);
  const summary = log.summary();
  formatSummary(summary).forEach((line) => out(line));
  return summary;
}

export async function runList(dataDir: string, services: Services, out: Output): Promise<string[]> {
  const sessions = await services.store.list(dataDir);
  if (sessions.length === 0) {
    out(`no saved sessions in ${dataDir}`);
  }
  sessions.forEach((s) => out(s));
  return sessions;
}
