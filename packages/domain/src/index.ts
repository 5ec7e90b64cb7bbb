// ─── Entities ─────────────────────────────────────────────────────────────────
export * from './entities/simulation-request.js';
export * from './entities/ephemeris.js';
export * from './entities/simulation-artifacts.js';

// ─── Errors ───────────────────────────────────────────────────────────────────
export * from './errors/pipeline-errors.js';

// ─── Inbound Ports ────────────────────────────────────────────────────────────
export * from './ports/inbound/simulation-pipeline.port.js';

// ─── Outbound Ports ───────────────────────────────────────────────────────────
export * from './ports/outbound/file-downloader.port.js';
export * from './ports/outbound/decompressor.port.js';
export * from './ports/outbound/signal-tool-runner.port.js';
