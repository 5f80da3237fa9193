import {
  type HttpConfig,
  type MarketRecord,
  type PollerConfig,
  type PollFilter,
  type PollResult,
  errorMessage,
  formatDuration,
  parseGammaMarket,
  sleep,
  withRetry,
} from '@freshness/core';
import type { MarketStore, RunRecorder, RunCounts } from '@freshness/db';
import type { MarketPageSource } from '../adapters/index.js';
import type { PollerMetrics } from '../metrics.js';

export const POLLER_JOB_NAME = 'markets-poller';

export const INTERRUPTED_ERROR = 'interrupted by stop signal';

export interface PollerDeps {
  source: MarketPageSource;
  store: MarketStore;
  /** Optional run bookkeeping (ingestion_runs) */
  runs?: RunRecorder;
  metrics?: PollerMetrics;
}

export interface PollerOptions {
  poller: PollerConfig;
  retry: Pick<HttpConfig, 'maxAttempts' | 'baseDelayMs' | 'maxDelayMs'>;
  now?: () => Date;
}

/**
 * State exposed to the health server
 */
export interface PollerSnapshot {
  startedAt: Date;
  lastCycleAt: Date | null;
  lastSuccessAt: Date | null;
  lastResult: PollResult | null;
  consecutiveFailures: number;
  totalCycles: number;
}

export interface LoopSummary {
  cycles: number;
  stoppedBy: 'signal' | 'failures';
  consecutiveFailures: number;
}

interface PollPass {
  name: 'open' | 'closed';
  closed: boolean;
  maxPages: number;
  /** Only records updated upstream at or after this instant are kept */
  since: Date | null;
}

function emptyResult(): PollResult {
  return {
    fetched: 0,
    upserted: 0,
    created: 0,
    updated: 0,
    errors: 0,
    retries: 0,
    pages: 0,
    aborted: false,
    interrupted: false,
    durationMs: 0,
  };
}

function countsOf(result: PollResult): RunCounts {
  return { fetched: result.fetched, written: result.upserted, errors: result.errors };
}

/**
 * Polls the listing API page by page and upserts every valid record.
 *
 * Upstream failures are retried with backoff; once retries are exhausted the
 * cycle ends early with `aborted` set and whatever was already written stays.
 * Store failures are not caught here.
 */
export class MarketPoller {
  private readonly config: PollerConfig;
  private readonly retry: PollerOptions['retry'];
  private readonly now: () => Date;
  private readonly snapshot: PollerSnapshot;

  constructor(private readonly deps: PollerDeps, options: PollerOptions) {
    this.config = options.poller;
    this.retry = options.retry;
    this.now = options.now ?? (() => new Date());
    this.snapshot = {
      startedAt: this.now(),
      lastCycleAt: null,
      lastSuccessAt: null,
      lastResult: null,
      consecutiveFailures: 0,
      totalCycles: 0,
    };
  }

  getSnapshot(): PollerSnapshot {
    return { ...this.snapshot };
  }

  private passesFor(filter: PollFilter): PollPass[] {
    const passes: PollPass[] = [];
    if (filter === 'open' || filter === 'all') {
      passes.push({ name: 'open', closed: false, maxPages: this.config.maxPages, since: null });
    }
    if (filter === 'closed' || filter === 'all') {
      const since = new Date(this.now().getTime() - this.config.closedLookbackHours * 3600 * 1000);
      passes.push({ name: 'closed', closed: true, maxPages: this.config.closedMaxPages, since });
    }
    return passes;
  }

  /**
   * One poll cycle over the passes selected by `filter`
   */
  async pollOnce(filter: PollFilter = 'open', signal?: AbortSignal): Promise<PollResult> {
    const startTime = Date.now();
    const result = emptyResult();

    for (const pass of this.passesFor(filter)) {
      const completed = await this.runPass(pass, result, signal);
      if (!completed) break;
    }

    result.durationMs = Date.now() - startTime;
    return result;
  }

  /**
   * Returns false when the cycle must not continue (upstream failure or stop signal)
   */
  private async runPass(pass: PollPass, result: PollResult, signal?: AbortSignal): Promise<boolean> {
    const { pageSize, order, ascending, requestDelayMs } = this.config;
    let stale = 0;

    const interrupt = (): boolean => {
      result.interrupted = true;
      console.log(`[poller] ${pass.name} pass interrupted after ${result.pages} pages`);
      return false;
    };

    for (let page = 0; page < pass.maxPages; page++) {
      if (signal?.aborted) return interrupt();

      if (result.pages > 0) {
        await sleep(requestDelayMs, signal);
        if (signal?.aborted) return interrupt();
      }

      const offset = page * pageSize;
      let rawPage: unknown[];
      try {
        rawPage = await withRetry(
          () => this.deps.source.fetchPage({ closed: pass.closed, offset, limit: pageSize, order, ascending }, signal),
          {
            ...this.retry,
            signal,
            onRetry: (err, attempt, delayMs) => {
              result.retries++;
              console.warn(`[poller] ${pass.name} offset=${offset} retry ${attempt} in ${delayMs}ms: ${err.message}`);
            },
          }
        );
      } catch (error) {
        if (signal?.aborted) return interrupt();
        result.aborted = true;
        result.error = errorMessage(error);
        console.error(`[poller] ${pass.name} offset=${offset} failed, ending cycle: ${result.error}`);
        return false;
      }

      result.pages++;
      result.fetched += rawPage.length;

      const records: MarketRecord[] = [];
      const now = this.now();
      for (const raw of rawPage) {
        const parsed = parseGammaMarket(raw, now);
        if (!parsed.ok) {
          result.errors++;
          console.warn(`[poller] Skipping market ${parsed.error.marketId ?? '?'}: ${parsed.error.reason}`);
          continue;
        }
        if (pass.since && (!parsed.sourceUpdatedAt || parsed.sourceUpdatedAt < pass.since)) {
          stale++;
          continue;
        }
        records.push(parsed.record);
      }

      if (records.length > 0) {
        const written = await this.deps.store.upsertMarkets(records);
        result.created += written.created;
        result.updated += written.updated;
        result.upserted += written.created + written.updated;
      }

      if (rawPage.length < pageSize) break;
    }

    if (pass.since && stale > 0) {
      console.log(`[poller] closed pass: ${stale} markets outside the lookback window left as is`);
    }
    return true;
  }

  /**
   * pollOnce plus run bookkeeping, metrics and snapshot updates.
   * Only a cycle that ran to the end counts as a success; an interrupted one
   * is recorded as not ok without counting towards the failure streak.
   */
  async runCycle(filter: PollFilter, signal?: AbortSignal): Promise<PollResult> {
    const { runs, metrics } = this.deps;
    const runId = runs ? await runs.startRun(POLLER_JOB_NAME) : null;

    let result: PollResult;
    try {
      result = await this.pollOnce(filter, signal);
    } catch (error) {
      this.snapshot.totalCycles++;
      this.snapshot.lastCycleAt = this.now();
      this.snapshot.consecutiveFailures++;
      metrics?.recordFailure(error instanceof Error ? error.name : 'Error', this.snapshot.consecutiveFailures);
      if (runs && runId !== null) {
        await runs
          .failRun(runId, errorMessage(error), { fetched: 0, written: 0, errors: 0 })
          .catch((recordError: unknown) => {
            console.error(`[poller] Could not record failed run ${runId}: ${errorMessage(recordError)}`);
          });
      }
      throw error;
    }

    this.snapshot.totalCycles++;
    this.snapshot.lastCycleAt = this.now();
    this.snapshot.lastResult = result;
    if (result.aborted) {
      this.snapshot.consecutiveFailures++;
      metrics?.recordFailure('upstream', this.snapshot.consecutiveFailures);
    } else if (!result.interrupted) {
      this.snapshot.consecutiveFailures = 0;
      this.snapshot.lastSuccessAt = this.snapshot.lastCycleAt;
      metrics?.recordSuccess(result);
    }

    if (runs && runId !== null) {
      if (result.aborted) {
        await runs.failRun(runId, result.error ?? 'aborted', countsOf(result));
      } else if (result.interrupted) {
        await runs.failRun(runId, INTERRUPTED_ERROR, countsOf(result));
      } else {
        await runs.completeRun(runId, countsOf(result));
      }
    }

    return result;
  }

  /**
   * Poll every intervalSeconds until stopped or until too many cycles in a
   * row were aborted by upstream failures
   */
  async runLoop(filter: PollFilter, signal: AbortSignal): Promise<LoopSummary> {
    const { intervalSeconds, maxConsecutiveFailures } = this.config;
    let cycles = 0;
    let consecutiveFailures = 0;

    console.log(`[poller] Starting loop (filter=${filter}) every ${intervalSeconds}s`);

    while (!signal.aborted) {
      const result = await this.runCycle(filter, signal);
      cycles++;

      console.log(
        `[poller] Cycle ${cycles}: fetched=${result.fetched} upserted=${result.upserted} ` +
        `(created=${result.created}, updated=${result.updated}) errors=${result.errors} ` +
        `retries=${result.retries} pages=${result.pages} in ${formatDuration(result.durationMs)}`
      );

      if (result.aborted) {
        consecutiveFailures++;
        console.warn(`[poller] Cycle aborted (${consecutiveFailures}/${maxConsecutiveFailures} in a row)`);
        if (consecutiveFailures >= maxConsecutiveFailures) {
          console.error(`[poller] Stopping after ${consecutiveFailures} consecutive failed cycles`);
          return { cycles, stoppedBy: 'failures', consecutiveFailures };
        }
      } else {
        consecutiveFailures = 0;
      }

      if (signal.aborted) break;
      await sleep(intervalSeconds * 1000, signal);
    }

    console.log(`[poller] Stopped after ${cycles} cycles`);
    return { cycles, stoppedBy: 'signal', consecutiveFailures };
  }
}
