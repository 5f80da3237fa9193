export { MarketRepository, type MarketStore, type UpsertMarketsResult } from './market.repository.js';
export {
  FreshnessRepository,
  UnknownTableError,
  MONITORED_TABLES,
  MONITORED_TABLE_NAMES,
  isMonitoredTable,
  resolveMonitoredTable,
  toFreshnessStats,
  type FreshnessRow,
  type FreshnessStore,
  type MonitoredTable,
} from './freshness.repository.js';
export {
  EnrichmentRepository,
  type EnrichmentStore,
  type EnrichmentCandidate,
  type EnrichmentUpdate,
  type BatchCursor,
} from './enrichment.repository.js';
export { IngestionRepository, type RunRecorder, type RunCounts, type JobRunSummary } from './ingestion.repository.js';
