import type { FreshnessGrade, FreshnessStats } from './types.js';
import { percentileCont } from './percentile.js';

export const EMPTY_FRESHNESS: FreshnessStats = {
  totalRecords: 0,
  latestUpdate: null,
  freshnessSeconds: null,
  p95FreshnessSeconds: null,
};

/**
 * Freshness of a set of write timestamps as seen at `now`.
 * Reference implementation of the aggregate query, used for small in-memory sets.
 */
export function freshnessOf(timestamps: readonly Date[], now: Date): FreshnessStats {
  if (timestamps.length === 0) {
    return { ...EMPTY_FRESHNESS };
  }

  const latest = timestamps.reduce((max, ts) => (ts.getTime() > max.getTime() ? ts : max));
  const ages = timestamps.map((ts) => (now.getTime() - ts.getTime()) / 1000);

  return {
    totalRecords: timestamps.length,
    latestUpdate: latest,
    freshnessSeconds: (now.getTime() - latest.getTime()) / 1000,
    p95FreshnessSeconds: percentileCont(ages, 0.95),
  };
}

/**
 * Grade p95 staleness against the expected write interval:
 * HEALTHY up to 1.5x, DEGRADED up to 3x, STALE beyond.
 */
export function gradeFreshness(stats: FreshnessStats, expectedIntervalSeconds: number): FreshnessGrade {
  if (stats.totalRecords === 0 || stats.p95FreshnessSeconds === null) {
    return 'EMPTY';
  }
  if (stats.p95FreshnessSeconds <= expectedIntervalSeconds * 1.5) {
    return 'HEALTHY';
  }
  if (stats.p95FreshnessSeconds <= expectedIntervalSeconds * 3) {
    return 'DEGRADED';
  }
  return 'STALE';
}
