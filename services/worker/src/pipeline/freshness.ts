import {
  type FreshnessGrade,
  type FreshnessStats,
  formatDuration,
  gradeFreshness,
} from '@freshness/core';
import { resolveMonitoredTable, type FreshnessStore, type MonitoredTable } from '@freshness/db';

export interface FreshnessReportOptions {
  tables: readonly string[];
  /** Expected write interval; grades are relative to it */
  expectedIntervalSeconds: number;
}

export interface TableFreshness extends FreshnessStats {
  table: MonitoredTable;
  grade: FreshnessGrade;
}

export interface FreshnessReport {
  generatedAt: Date;
  expectedIntervalSeconds: number;
  tables: TableFreshness[];
  /** True when every table is HEALTHY */
  ok: boolean;
}

function formatSeconds(seconds: number | null): string {
  return seconds === null ? '-' : formatDuration(Math.round(seconds * 1000));
}

/**
 * Compute, grade and print freshness of the requested tables.
 * Table names are checked against the registry before any query runs.
 */
export async function runFreshnessReport(
  store: FreshnessStore,
  options: FreshnessReportOptions
): Promise<FreshnessReport> {
  const tables = options.tables.map(resolveMonitoredTable);
  const results: TableFreshness[] = [];

  for (const table of tables) {
    const stats = await store.computeFreshness(table);
    results.push({ table, ...stats, grade: gradeFreshness(stats, options.expectedIntervalSeconds) });
  }

  console.log(`\n${'='.repeat(60)}`);
  console.log('[freshness] Data Freshness Report');
  console.log(`${'='.repeat(60)}`);
  console.log(`Expected interval: ${options.expectedIntervalSeconds}s`);
  console.log();
  console.log(
    `${'Table'.padEnd(20)} ${'Rows'.padStart(10)} ${'Latest'.padStart(10)} ${'p95'.padStart(10)}  Grade`
  );
  console.log('-'.repeat(60));
  for (const row of results) {
    console.log(
      `${row.table.padEnd(20)} ${String(row.totalRecords).padStart(10)} ` +
      `${formatSeconds(row.freshnessSeconds).padStart(10)} ${formatSeconds(row.p95FreshnessSeconds).padStart(10)}  ${row.grade}`
    );
  }
  console.log(`${'='.repeat(60)}\n`);

  return {
    generatedAt: new Date(),
    expectedIntervalSeconds: options.expectedIntervalSeconds,
    tables: results,
    ok: results.every((row) => row.grade === 'HEALTHY'),
  };
}
