import { sql, type SQL } from 'drizzle-orm';
import type { FreshnessStats } from '@freshness/core';
import type { Database } from '../client.js';
import { markets, userTransactions } from '../schema.js';

/**
 * Tables the freshness report may look at, each with the column that says
 * when a row was last written. Nothing outside this map is ever interpolated
 * into SQL.
 */
export const MONITORED_TABLES = {
  markets: { table: markets, column: markets.updatedAt },
  user_transactions: { table: userTransactions, column: userTransactions.timestamp },
} as const;

export type MonitoredTable = keyof typeof MONITORED_TABLES;

export const MONITORED_TABLE_NAMES: readonly MonitoredTable[] = ['markets', 'user_transactions'];

export class UnknownTableError extends Error {
  constructor(public readonly table: string) {
    super(`Unknown table "${table}" (monitored: ${MONITORED_TABLE_NAMES.join(', ')})`);
    this.name = 'UnknownTableError';
  }
}

export function isMonitoredTable(name: string): name is MonitoredTable {
  return (MONITORED_TABLE_NAMES as readonly string[]).includes(name);
}

/**
 * Narrow a table name to the registry, throwing before any SQL is built
 */
export function resolveMonitoredTable(name: string): MonitoredTable {
  if (!isMonitoredTable(name)) {
    throw new UnknownTableError(name);
  }
  return name;
}

export interface FreshnessStore {
  computeFreshness(table: MonitoredTable): Promise<FreshnessStats>;
}

export type FreshnessRow = {
  total_records: number | string;
  latest_update_epoch: number | string | null;
  freshness_seconds: number | string | null;
  p95_freshness_seconds: number | string | null;
};

// pg returns numeric/bigint as strings and double precision as numbers
function toNumber(value: number | string | null): number | null {
  if (value === null) return null;
  const n = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(n) ? n : null;
}

function epochToDate(value: number | string | null): Date | null {
  const seconds = toNumber(value);
  return seconds === null ? null : new Date(Math.round(seconds * 1000));
}

/**
 * Map the aggregate row. A missing row or count 0 means an empty table.
 */
export function toFreshnessStats(row: FreshnessRow | undefined): FreshnessStats {
  const totalRecords = row ? toNumber(row.total_records) ?? 0 : 0;
  if (!row || totalRecords === 0) {
    return { totalRecords: 0, latestUpdate: null, freshnessSeconds: null, p95FreshnessSeconds: null };
  }

  return {
    totalRecords,
    latestUpdate: epochToDate(row.latest_update_epoch),
    freshnessSeconds: toNumber(row.freshness_seconds),
    p95FreshnessSeconds: toNumber(row.p95_freshness_seconds),
  };
}

/**
 * Repository for freshness aggregates
 */
export class FreshnessRepository implements FreshnessStore {
  constructor(private readonly db: Database) {}

  /**
   * Single aggregate over the whole table; rows are never loaded.
   * An empty table yields count 0 and NULL aggregates.
   */
  freshnessQuery(table: MonitoredTable): SQL {
    const target = MONITORED_TABLES[resolveMonitoredTable(table)];
    const column = target.column;

    return sql`
      select
        count(*)::int as total_records,
        extract(epoch from max(${column}))::float8 as latest_update_epoch,
        extract(epoch from (now() - max(${column})))::float8 as freshness_seconds,
        percentile_cont(0.95) within group (
          order by extract(epoch from (now() - ${column}))
        ) as p95_freshness_seconds
      from ${target.table}
    `;
  }

  async computeFreshness(table: MonitoredTable): Promise<FreshnessStats> {
    const result = await this.db.execute<FreshnessRow>(this.freshnessQuery(table));
    return toFreshnessStats(result.rows[0]);
  }
}
