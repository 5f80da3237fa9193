import {
  type BackfillResult,
  decodePositionId,
  errorMessage,
  formatDuration,
  sleep,
} from '@freshness/core';
import type { BatchCursor, EnrichmentStore, EnrichmentUpdate, RunRecorder } from '@freshness/db';

export const BACKFILL_JOB_NAME = 'user-transactions-backfill';

export interface BackfillOptions {
  batchSize: number;
  pauseMs: number;
  dryRun?: boolean;
  signal?: AbortSignal;
}

export interface BackfillDeps {
  store: EnrichmentStore;
  runs?: RunRecorder;
}

/**
 * Fill market_id/outcome on user_transactions from position_id.
 *
 * Walks candidates oldest first with a (created_at, tx_id) cursor, one
 * transaction per batch. Rows whose position id cannot be decoded are skipped
 * and stay pending for the next run. Store errors end the run.
 */
export async function runBackfill(deps: BackfillDeps, options: BackfillOptions): Promise<BackfillResult> {
  const { store, runs } = deps;
  const { batchSize, pauseMs, dryRun = false, signal } = options;
  const startTime = Date.now();

  const result: BackfillResult = {
    totalUpdated: 0,
    pendingBefore: 0,
    batches: 0,
    skipped: 0,
    dryRun,
    durationMs: 0,
  };

  result.pendingBefore = await store.countPending();
  console.log(`[backfill] ${result.pendingBefore} rows need market_id/outcome`);

  if (result.pendingBefore === 0 || dryRun) {
    result.durationMs = Date.now() - startTime;
    if (dryRun) console.log('[backfill] Dry run, nothing written');
    return result;
  }

  const runId = runs ? await runs.startRun(BACKFILL_JOB_NAME) : null;

  try {
    let cursor: BatchCursor | null = null;

    while (!signal?.aborted) {
      const batch = await store.selectBatch(batchSize, cursor);
      if (batch.length === 0) break;

      const updates: EnrichmentUpdate[] = [];
      for (const candidate of batch) {
        const decoded = decodePositionId(candidate.positionId);
        if (!decoded) {
          result.skipped++;
          console.warn(`[backfill] Cannot decode position_id "${candidate.positionId}" (tx ${candidate.txId})`);
          continue;
        }
        updates.push({ txId: candidate.txId, marketId: decoded.marketId, outcome: decoded.outcome });
      }

      const updated = await store.applyBatch(updates);
      result.totalUpdated += updated;
      result.batches++;

      const last = batch[batch.length - 1];
      cursor = last ? last.cursor : cursor;

      const progress = result.pendingBefore > 0
        ? ((result.totalUpdated / result.pendingBefore) * 100).toFixed(1)
        : '100.0';
      console.log(
        `[backfill] Batch ${result.batches}: updated ${updated}/${batch.length} ` +
        `(total ${result.totalUpdated}/${result.pendingBefore}, ${progress}%)`
      );

      if (batch.length < batchSize) break;
      await sleep(pauseMs, signal);
    }
  } catch (error) {
    if (runs && runId !== null) {
      await runs
        .failRun(runId, errorMessage(error), { fetched: result.pendingBefore, written: result.totalUpdated, errors: result.skipped })
        .catch((recordError: unknown) => {
          console.error(`[backfill] Could not record failed run ${runId}: ${errorMessage(recordError)}`);
        });
    }
    throw error;
  }

  result.durationMs = Date.now() - startTime;
  if (signal?.aborted) {
    console.log('[backfill] Stop requested, exiting after the last committed batch');
  }
  console.log(
    `[backfill] Done: ${result.totalUpdated} updated, ${result.skipped} skipped in ${result.batches} batches ` +
    `(${formatDuration(result.durationMs)})`
  );

  if (runs && runId !== null) {
    await runs.completeRun(runId, { fetched: result.pendingBefore, written: result.totalUpdated, errors: result.skipped });
  }

  return result;
}
