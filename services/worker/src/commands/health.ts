import { type FreshnessGrade, errorMessage, gradeFreshness } from '@freshness/core';
import type { FreshnessStore, JobRunSummary } from '@freshness/db';
import { POLLER_JOB_NAME } from '../pipeline/poller.js';
import { BACKFILL_JOB_NAME } from '../pipeline/backfill.js';

export interface HealthDeps {
  ping(): Promise<void>;
  runs: { summarize(jobName: string): Promise<JobRunSummary> };
  freshness: FreshnessStore;
}

export interface HealthOptions {
  /** A scheduled job whose last success is older than this is STALE */
  maxJobAgeMinutes?: number;
  maxFailuresInRow?: number;
  /** Poll interval the markets table is graded against */
  expectedIntervalSeconds: number;
  now?: Date;
}

export type JobStatus = 'OK' | 'STALE' | 'FAILING' | 'NEVER_RUN';

export interface JobHealth {
  jobName: string;
  status: JobStatus;
  lastSuccessAt: Date | null;
  lastError: string | null;
  failuresInRow: number;
}

export interface HealthResult {
  ok: boolean;
  database: boolean;
  jobs: JobHealth[];
  marketsGrade: FreshnessGrade | null;
  errors: string[];
}

interface JobCheck {
  jobName: string;
  /** On-demand jobs are only checked for failures */
  scheduled: boolean;
}

const JOBS: JobCheck[] = [
  { jobName: POLLER_JOB_NAME, scheduled: true },
  { jobName: BACKFILL_JOB_NAME, scheduled: false },
];

export function jobStatus(
  summary: JobRunSummary,
  scheduled: boolean,
  now: Date,
  maxJobAgeMinutes: number,
  maxFailuresInRow: number
): JobStatus {
  if (summary.consecutiveFailures >= maxFailuresInRow) return 'FAILING';
  if (!scheduled) return 'OK';
  if (!summary.lastSuccess) return summary.lastRun ? 'FAILING' : 'NEVER_RUN';

  const finishedAt = summary.lastSuccess.finishedAt ?? summary.lastSuccess.startedAt;
  const ageMinutes = (now.getTime() - finishedAt.getTime()) / 60000;
  return ageMinutes > maxJobAgeMinutes ? 'STALE' : 'OK';
}

/**
 * Run health check: database, job history, markets freshness
 */
export async function runHealthCheck(deps: HealthDeps, options: HealthOptions): Promise<HealthResult> {
  const { maxJobAgeMinutes = 15, maxFailuresInRow = 5, expectedIntervalSeconds } = options;
  const now = options.now ?? new Date();

  const result: HealthResult = {
    ok: true,
    database: false,
    jobs: [],
    marketsGrade: null,
    errors: [],
  };

  try {
    await deps.ping();
    result.database = true;
    console.log('✓ Database connection: OK');
  } catch (error) {
    result.ok = false;
    result.errors.push(`Database connection failed: ${errorMessage(error)}`);
    console.log('✗ Database connection: FAILED');
    return result;
  }

  console.log('\nJobs:');
  for (const check of JOBS) {
    const summary = await deps.runs.summarize(check.jobName);
    const status = jobStatus(summary, check.scheduled, now, maxJobAgeMinutes, maxFailuresInRow);
    const lastSuccessAt = summary.lastSuccess?.finishedAt ?? null;
    const lastError = summary.lastRun && summary.lastRun.ok === false ? summary.lastRun.errorText : null;

    result.jobs.push({
      jobName: check.jobName,
      status,
      lastSuccessAt,
      lastError,
      failuresInRow: summary.consecutiveFailures,
    });

    const icon = status === 'OK' || status === 'NEVER_RUN' ? '✓' : '✗';
    const lastSuccess = lastSuccessAt
      ? `${Math.round((now.getTime() - lastSuccessAt.getTime()) / 60000)}m ago`
      : 'never';
    console.log(`  ${icon} ${check.jobName}: ${status} (last success ${lastSuccess}, failures=${summary.consecutiveFailures})`);
    if (lastError) {
      console.log(`    └─ Last error: ${lastError.substring(0, 80)}`);
    }

    if (status === 'STALE') {
      result.ok = false;
      result.errors.push(`Job ${check.jobName} is stale (no success in ${maxJobAgeMinutes}m)`);
    } else if (status === 'FAILING') {
      result.ok = false;
      result.errors.push(`Job ${check.jobName} is FAILING (${summary.consecutiveFailures} consecutive failures)`);
    }
  }

  const stats = await deps.freshness.computeFreshness('markets');
  result.marketsGrade = gradeFreshness(stats, expectedIntervalSeconds);
  console.log(`\nMarkets freshness: ${result.marketsGrade} (${stats.totalRecords} rows)`);
  if (result.marketsGrade === 'STALE') {
    result.ok = false;
    result.errors.push('markets table is STALE');
  }

  console.log('\n' + (result.ok ? '✓ Health check PASSED' : '✗ Health check FAILED'));
  if (result.errors.length > 0) {
    console.log('\nErrors:');
    for (const error of result.errors) {
      console.log(`  - ${error}`);
    }
  }

  return result;
}
