/**
 * Market status lifecycle. Archival is a status, rows are never deleted.
 */
export type MarketStatus = 'ACTIVE' | 'CLOSED' | 'RESOLVED' | 'ARCHIVED';

export const MARKET_STATUSES: readonly MarketStatus[] = ['ACTIVE', 'CLOSED', 'RESOLVED', 'ARCHIVED'];

/**
 * Canonical market row produced by the ingestion boundary.
 * Timestamps are owned by the store and are not part of the input.
 */
export interface MarketRecord {
  marketId: string;
  title: string;
  status: MarketStatus;
  acceptingOrders: boolean;
  volume: number;
  liquidity: number;
  /** One probability per outcome, each in [0, 1]. Empty when upstream sent placeholders. */
  outcomePrices: number[];
  lastMidPrice: number | null;
  conditionId: string | null;
  slug: string | null;
  category: string | null;
  outcomes: string[];
  endDate: Date | null;
}

/**
 * Stored market row (record + store-managed timestamps)
 */
export interface StoredMarket extends MarketRecord {
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Outcome of one upsert
 */
export interface UpsertOutcome {
  created: boolean;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Which upstream listing a poll pass reads
 */
export type PollFilter = 'open' | 'closed' | 'all';

/**
 * Poll cycle statistics
 */
export interface PollResult {
  fetched: number;
  upserted: number;
  created: number;
  updated: number;
  /** Malformed records skipped */
  errors: number;
  /** Upstream request retries across the cycle */
  retries: number;
  pages: number;
  /** True when an upstream failure ended the cycle early */
  aborted: boolean;
  /** True when the stop signal ended the cycle before every pass finished */
  interrupted: boolean;
  error?: string;
  durationMs: number;
}

/**
 * Aggregate staleness of one monitored table
 */
export interface FreshnessStats {
  totalRecords: number;
  latestUpdate: Date | null;
  /** Seconds since the most recently written row */
  freshnessSeconds: number | null;
  /** 95th percentile of per-row staleness in seconds */
  p95FreshnessSeconds: number | null;
}

export type FreshnessGrade = 'HEALTHY' | 'DEGRADED' | 'STALE' | 'EMPTY';

/**
 * Derived fields decoded from a position id
 */
export interface DecodedPosition {
  marketId: string;
  outcome: number;
}

export interface BackfillResult {
  totalUpdated: number;
  pendingBefore: number;
  batches: number;
  /** Rows whose position id could not be decoded */
  skipped: number;
  dryRun: boolean;
  durationMs: number;
}
