// ─── Entities ─────────────────────────────────────────────────────────────────
export * from './entities/raw-table.js';
export * from './entities/telemetry-sample.js';
export * from './entities/stop-event.js';
export * from './entities/deceleration-profile.js';
export * from './entities/trip-metrics.js';
export * from './entities/resampled-point.js';
export * from './entities/analysis-result.js';

// ─── Inbound Ports ────────────────────────────────────────────────────────────
export * from './ports/inbound/telemetry-analysis.port.js';

// ─── Outbound Ports ───────────────────────────────────────────────────────────
export * from './ports/outbound/table-decoder.port.js';
