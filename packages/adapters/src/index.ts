// ─── Latency probe ─────────────────────────────────────────────────────────────
export {
  SystemPingProbe,
  findExecutable,
  parsePingOutput,
  pingArgs,
} from './probe/system-ping.adapter.js';
export type { ExecutableLookup, PingExecutor, PingRun, SystemPingOptions } from './probe/system-ping.adapter.js';

// ─── HTTP ──────────────────────────────────────────────────────────────────────
export { UndiciHttpFetcher } from './http/undici-fetch.adapter.js';

// ─── Storage ───────────────────────────────────────────────────────────────────
export { JsonFileMeasurementStore } from './storage/json-file.store.js';
export {
  PersistedDatapointSchema,
  PersistedSessionSchema,
  encodeDatapoint,
  decodeDatapoint,
} from './storage/datapoint.codec.js';
export type { PersistedDatapoint } from './storage/datapoint.codec.js';
export {
  APP_DIR_NAME,
  LOG_EXTENSIONS,
  localDataDir,
  getDataDir,
  defaultLogFileName,
  isLogFile,
} from './storage/data-dir.js';

// ─── Clock ─────────────────────────────────────────────────────────────────────
export { DeterministicClock, SystemClock } from './clock/clocks.js';
