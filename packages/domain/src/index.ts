// ─── Entities ─────────────────────────────────────────────────────────────────
export * from './entities/datapoint.js';
export * from './entities/measurement-config.js';
export * from './entities/session-summary.js';
export * from './entities/run-outcome.js';

// ─── Errors ───────────────────────────────────────────────────────────────────
export * from './errors/measurement-errors.js';

// ─── Inbound Ports ────────────────────────────────────────────────────────────
export * from './ports/inbound/measurement-scheduler.port.js';

// ─── Outbound Ports ───────────────────────────────────────────────────────────
export * from './ports/outbound/latency-probe.port.js';
export * from './ports/outbound/http-fetch.port.js';
export * from './ports/outbound/measurement-store.port.js';
export * from './ports/outbound/clock.port.js';
