export { GammaAdapter, BaseAdapter, type MarketPageParams, type MarketPageSource } from './adapters/index.js';
export {
  MarketPoller,
  POLLER_JOB_NAME,
  INTERRUPTED_ERROR,
  type PollerDeps,
  type PollerOptions,
  type PollerSnapshot,
  type LoopSummary,
} from './pipeline/poller.js';
export { runFreshnessReport, type FreshnessReport, type FreshnessReportOptions, type TableFreshness } from './pipeline/freshness.js';
export { runBackfill, BACKFILL_JOB_NAME, type BackfillDeps, type BackfillOptions } from './pipeline/backfill.js';
export { runHealthCheck, type HealthDeps, type HealthOptions, type HealthResult } from './commands/health.js';
export {
  createHealthApp,
  evaluateHealth,
  startHealthServer,
  stopHealthServer,
  thresholdsFor,
  type HealthThresholds,
  type ServiceStatus,
} from './health-server.js';
export { installShutdownHandlers, type ShutdownHandle } from './shutdown.js';
export { PollerMetrics } from './metrics.js';
