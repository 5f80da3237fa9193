import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import type { IngestionRunRow, JobRunSummary } from '@freshness/db';
import { InMemoryFreshnessStore } from '../testing/memory-stores.js';
import { POLLER_JOB_NAME } from '../pipeline/poller.js';
import { BACKFILL_JOB_NAME } from '../pipeline/backfill.js';
import { jobStatus, runHealthCheck, type HealthDeps } from './health.js';

const NOW = new Date('2025-06-01T12:00:00Z');

function minutesAgo(minutes: number): Date {
  return new Date(NOW.getTime() - minutes * 60000);
}

function run(jobName: string, ok: boolean, finishedMinutesAgo: number): IngestionRunRow {
  return {
    id: 1,
    jobName,
    startedAt: minutesAgo(finishedMinutesAgo + 1),
    finishedAt: minutesAgo(finishedMinutesAgo),
    ok,
    fetched: 10,
    written: 10,
    errors: 0,
    errorText: ok ? null : 'Bad Gateway',
  };
}

function neverRun(jobName: string): JobRunSummary {
  return { jobName, lastRun: null, lastSuccess: null, consecutiveFailures: 0 };
}

function deps(poller: JobRunSummary, pingError?: Error): HealthDeps {
  return {
    ping: async () => {
      if (pingError) throw pingError;
    },
    runs: {
      summarize: async (jobName) => (jobName === POLLER_JOB_NAME ? poller : neverRun(jobName)),
    },
    freshness: new InMemoryFreshnessStore({ markets: [new Date(NOW.getTime() - 5000)] }, () => NOW),
  };
}

describe('jobStatus', () => {
  it('should grade scheduled jobs by age and failures', () => {
    const ok = run(POLLER_JOB_NAME, true, 5);
    assert.equal(jobStatus({ jobName: POLLER_JOB_NAME, lastRun: ok, lastSuccess: ok, consecutiveFailures: 0 }, true, NOW, 15, 5), 'OK');
    assert.equal(jobStatus({ jobName: POLLER_JOB_NAME, lastRun: ok, lastSuccess: ok, consecutiveFailures: 5 }, true, NOW, 15, 5), 'FAILING');
    assert.equal(jobStatus(neverRun(POLLER_JOB_NAME), true, NOW, 15, 5), 'NEVER_RUN');
    const old = run(POLLER_JOB_NAME, true, 30);
    assert.equal(jobStatus({ jobName: POLLER_JOB_NAME, lastRun: old, lastSuccess: old, consecutiveFailures: 0 }, true, NOW, 15, 5), 'STALE');
  });

  it('should not call an on-demand job stale', () => {
    const old = run(BACKFILL_JOB_NAME, true, 600);
    assert.equal(jobStatus({ jobName: BACKFILL_JOB_NAME, lastRun: old, lastSuccess: old, consecutiveFailures: 0 }, false, NOW, 15, 5), 'OK');
  });
});

describe('runHealthCheck', () => {
  it('should pass with a recent poll and fresh markets', async () => {
    const last = run(POLLER_JOB_NAME, true, 2);
    const result = await runHealthCheck(
      deps({ jobName: POLLER_JOB_NAME, lastRun: last, lastSuccess: last, consecutiveFailures: 0 }),
      { expectedIntervalSeconds: 60, now: NOW }
    );

    assert.equal(result.ok, true);
    assert.equal(result.database, true);
    assert.deepEqual(result.jobs.map((j) => [j.jobName, j.status]), [
      [POLLER_JOB_NAME, 'OK'],
      [BACKFILL_JOB_NAME, 'OK'],
    ]);
    assert.equal(result.marketsGrade, 'HEALTHY');
    assert.deepEqual(result.errors, []);
  });

  it('should fail when the poller has not succeeded recently', async () => {
    const last = run(POLLER_JOB_NAME, true, 30);
    const result = await runHealthCheck(
      deps({ jobName: POLLER_JOB_NAME, lastRun: last, lastSuccess: last, consecutiveFailures: 0 }),
      { expectedIntervalSeconds: 60, maxJobAgeMinutes: 15, now: NOW }
    );

    assert.equal(result.ok, false);
    assert.deepEqual(result.errors, [`Job ${POLLER_JOB_NAME} is stale (no success in 15m)`]);
  });

  it('should surface the last error of a failing poller', async () => {
    const success = run(POLLER_JOB_NAME, true, 10);
    const failed = run(POLLER_JOB_NAME, false, 1);
    const result = await runHealthCheck(
      deps({ jobName: POLLER_JOB_NAME, lastRun: failed, lastSuccess: success, consecutiveFailures: 5 }),
      { expectedIntervalSeconds: 60, now: NOW }
    );

    assert.equal(result.ok, false);
    assert.equal(result.jobs[0]?.status, 'FAILING');
    assert.equal(result.jobs[0]?.lastError, 'Bad Gateway');
  });

  it('should stop at a failed database ping', async () => {
    const result = await runHealthCheck(deps(neverRun(POLLER_JOB_NAME), new Error('ECONNREFUSED')), {
      expectedIntervalSeconds: 60,
      now: NOW,
    });

    assert.equal(result.ok, false);
    assert.equal(result.database, false);
    assert.deepEqual(result.jobs, []);
    assert.deepEqual(result.errors, ['Database connection failed: ECONNREFUSED']);
  });
});
