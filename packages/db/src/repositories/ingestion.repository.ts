import { and, desc, eq, sql } from 'drizzle-orm';
import type { Database } from '../client.js';
import { ingestionRuns, type IngestionRunRow } from '../schema.js';

export interface RunCounts {
  fetched: number;
  written: number;
  errors: number;
}

/**
 * Run bookkeeping used by the poller and the backfill
 */
export interface RunRecorder {
  startRun(jobName: string): Promise<number>;
  completeRun(runId: number, counts: RunCounts): Promise<void>;
  failRun(runId: number, error: string, counts: RunCounts): Promise<void>;
}

export interface JobRunSummary {
  jobName: string;
  lastRun: IngestionRunRow | null;
  lastSuccess: IngestionRunRow | null;
  consecutiveFailures: number;
}

/**
 * Repository for ingestion run tracking
 */
export class IngestionRepository implements RunRecorder {
  constructor(private readonly db: Database) {}

  /**
   * Start a new run
   */
  async startRun(jobName: string): Promise<number> {
    const [run] = await this.db
      .insert(ingestionRuns)
      .values({ jobName })
      .returning({ id: ingestionRuns.id });
    if (!run) {
      throw new Error(`Could not start run for ${jobName}`);
    }
    return run.id;
  }

  /**
   * Complete a run successfully
   */
  async completeRun(runId: number, counts: RunCounts): Promise<void> {
    await this.db
      .update(ingestionRuns)
      .set({ finishedAt: sql`now()`, ok: true, ...counts })
      .where(eq(ingestionRuns.id, runId));
  }

  /**
   * Fail a run
   */
  async failRun(runId: number, error: string, counts: RunCounts): Promise<void> {
    await this.db
      .update(ingestionRuns)
      .set({ finishedAt: sql`now()`, ok: false, errorText: error.slice(0, 2000), ...counts })
      .where(eq(ingestionRuns.id, runId));
  }

  async getRecentRuns(jobName: string, limit = 10): Promise<IngestionRunRow[]> {
    return this.db
      .select()
      .from(ingestionRuns)
      .where(eq(ingestionRuns.jobName, jobName))
      .orderBy(desc(ingestionRuns.startedAt))
      .limit(limit);
  }

  async getLastSuccessfulRun(jobName: string): Promise<IngestionRunRow | null> {
    const rows = await this.db
      .select()
      .from(ingestionRuns)
      .where(and(eq(ingestionRuns.jobName, jobName), eq(ingestionRuns.ok, true)))
      .orderBy(desc(ingestionRuns.finishedAt))
      .limit(1);
    return rows[0] ?? null;
  }

  /**
   * Failed runs in a row, counting back from the most recent finished run
   */
  async countConsecutiveFailures(jobName: string): Promise<number> {
    const recentRuns = await this.getRecentRuns(jobName, 20);

    let failures = 0;
    for (const run of recentRuns) {
      if (run.ok === null) continue; // still running
      if (run.ok) break;
      failures++;
    }
    return failures;
  }

  async summarize(jobName: string): Promise<JobRunSummary> {
    const [recent, lastSuccess, consecutiveFailures] = await Promise.all([
      this.getRecentRuns(jobName, 1),
      this.getLastSuccessfulRun(jobName),
      this.countConsecutiveFailures(jobName),
    ]);
    return { jobName, lastRun: recent[0] ?? null, lastSuccess, consecutiveFailures };
  }
}
