#!/usr/bin/env node

import 'dotenv/config';
import { Command, InvalidArgumentError, Option } from 'commander';
import {
  type AppConfig,
  type PollFilter,
  errorMessage,
  formatAppConfig,
  loadAppConfig,
  requireDatabaseUrl,
} from '@freshness/core';
import {
  type DbClient,
  EnrichmentRepository,
  FreshnessRepository,
  IngestionRepository,
  MarketRepository,
  MONITORED_TABLE_NAMES,
  createClient,
  disconnect,
  ping,
  runMigrations,
} from '@freshness/db';
import { GammaAdapter } from './adapters/index.js';
import { MarketPoller, POLLER_JOB_NAME } from './pipeline/poller.js';
import { runFreshnessReport } from './pipeline/freshness.js';
import { runBackfill } from './pipeline/backfill.js';
import { runHealthCheck } from './commands/health.js';
import { createHealthApp, startHealthServer, stopHealthServer, thresholdsFor } from './health-server.js';
import { installShutdownHandlers } from './shutdown.js';
import { PollerMetrics } from './metrics.js';

const program = new Command();

function positiveInt(value: string): number {
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

/**
 * One machine-readable line after the human-readable output
 */
function printSummary(command: string, summary: object): void {
  console.log(JSON.stringify({ command, ...summary }));
}

/**
 * Load config, open the pool, run, always close the pool. Failures set exit code 1.
 */
async function withDatabase(
  label: string,
  fn: (client: DbClient, config: AppConfig) => Promise<boolean>
): Promise<void> {
  let client: DbClient | null = null;
  try {
    const config = loadAppConfig();
    client = createClient({
      connectionString: requireDatabaseUrl(config),
      max: config.database.poolMax,
      statementTimeoutMs: config.database.statementTimeoutMs,
    });
    const ok = await fn(client, config);
    if (!ok) {
      process.exitCode = 1;
    }
  } catch (error) {
    console.error(`${label} error: ${errorMessage(error)}`);
    printSummary(label, { ok: false, error: errorMessage(error) });
    process.exitCode = 1;
  } finally {
    if (client) {
      await disconnect(client);
    }
  }
}

interface RunPollerOpts {
  once: boolean;
  filter?: PollFilter;
  interval?: number;
  pageSize?: number;
}

interface FreshnessOpts {
  table: string;
}

interface BackfillOpts {
  table: string;
  batchSize?: number;
  dryRun: boolean;
}

interface HealthOpts {
  maxJobAge: number;
}

program
  .name('worker')
  .description('Market listing poller, freshness report and transaction backfill')
  .version('1.0.0');

// Poller
program
  .command('run-poller')
  .description('Poll the listing API and upsert markets')
  .option('--once', 'Run a single poll cycle and exit', false)
  .addOption(new Option('--filter <filter>', 'Which listings to poll').choices(['open', 'closed', 'all']))
  .option('--interval <seconds>', 'Seconds between cycles (overrides POLL_INTERVAL_SECONDS)', positiveInt)
  .option('--page-size <number>', 'Records per request (overrides POLL_PAGE_SIZE)', positiveInt)
  .action(async (opts: RunPollerOpts) => {
    await withDatabase('run-poller', async (client, baseConfig) => {
      const config: AppConfig = {
        ...baseConfig,
        poller: {
          ...baseConfig.poller,
          intervalSeconds: opts.interval ?? baseConfig.poller.intervalSeconds,
          pageSize: opts.pageSize ?? baseConfig.poller.pageSize,
        },
      };
      const filter: PollFilter = opts.filter ?? (config.poller.includeClosed ? 'all' : 'open');

      console.log(formatAppConfig(config));

      const metrics = new PollerMetrics();
      const poller = new MarketPoller(
        {
          source: new GammaAdapter(config.http),
          store: new MarketRepository(client.db),
          runs: new IngestionRepository(client.db),
          metrics,
        },
        { poller: config.poller, retry: config.http }
      );

      const shutdown = installShutdownHandlers();
      try {
        if (opts.once) {
          const result = await poller.runCycle(filter, shutdown.signal);
          console.log(
            `[poller] fetched=${result.fetched} upserted=${result.upserted} ` +
            `(created=${result.created}, updated=${result.updated}) errors=${result.errors} retries=${result.retries}`
          );
          const ok = !result.aborted && !result.interrupted;
          printSummary('run-poller', { ok, filter, ...result });
          return ok;
        }

        const server = config.healthPort > 0
          ? await startHealthServer(
              createHealthApp(
                POLLER_JOB_NAME,
                () => poller.getSnapshot(),
                thresholdsFor(config.poller.intervalSeconds),
                metrics.registry
              ),
              config.healthPort
            )
          : null;

        try {
          const summary = await poller.runLoop(filter, shutdown.signal);
          printSummary('run-poller', { ok: summary.stoppedBy === 'signal', filter, ...summary });
          return summary.stoppedBy === 'signal';
        } finally {
          if (server) {
            await stopHealthServer(server);
          }
        }
      } finally {
        shutdown.dispose();
      }
    });
  });

// Freshness report
program
  .command('run-freshness-report')
  .description('Report how stale the monitored tables are')
  .option('--table <table>', `Table to check (${MONITORED_TABLE_NAMES.join(', ')}, all)`, 'all')
  .action(async (opts: FreshnessOpts) => {
    await withDatabase('run-freshness-report', async (client, config) => {
      const tables = opts.table === 'all' ? MONITORED_TABLE_NAMES : [opts.table];
      const report = await runFreshnessReport(new FreshnessRepository(client.db), {
        tables,
        expectedIntervalSeconds: config.poller.intervalSeconds,
      });
      printSummary('run-freshness-report', report);
      return true;
    });
  });

// Backfill
program
  .command('run-backfill')
  .description('Derive market_id/outcome for user_transactions from position_id')
  .option('--table <table>', 'Table to backfill', 'user_transactions')
  .option('--batch-size <number>', 'Rows per batch (overrides BACKFILL_BATCH_SIZE)', positiveInt)
  .option('--dry-run', 'Only count rows that need enrichment', false)
  .action(async (opts: BackfillOpts) => {
    await withDatabase('run-backfill', async (client, config) => {
      if (opts.table !== 'user_transactions') {
        throw new Error(`Backfill is only defined for user_transactions, got "${opts.table}"`);
      }

      const shutdown = installShutdownHandlers();
      try {
        const result = await runBackfill(
          { store: new EnrichmentRepository(client.db), runs: new IngestionRepository(client.db) },
          {
            batchSize: opts.batchSize ?? config.backfill.batchSize,
            pauseMs: config.backfill.pauseMs,
            dryRun: opts.dryRun,
            signal: shutdown.signal,
          }
        );
        printSummary('run-backfill', { ok: true, ...result });
        return true;
      } finally {
        shutdown.dispose();
      }
    });
  });

// Health check
program
  .command('health')
  .description('Check database, job history and markets freshness')
  .option('--max-job-age <minutes>', 'Max minutes since the last successful poll', positiveInt, 15)
  .action(async (opts: HealthOpts) => {
    await withDatabase('health', async (client, config) => {
      const result = await runHealthCheck(
        {
          ping: () => ping(client),
          runs: new IngestionRepository(client.db),
          freshness: new FreshnessRepository(client.db),
        },
        {
          maxJobAgeMinutes: opts.maxJobAge,
          maxFailuresInRow: config.poller.maxConsecutiveFailures,
          expectedIntervalSeconds: config.poller.intervalSeconds,
        }
      );
      printSummary('health', result);
      return result.ok;
    });
  });

// Migrations
program
  .command('migrate')
  .description('Apply pending SQL migrations')
  .action(async () => {
    await withDatabase('migrate', async (client) => {
      const result = await runMigrations(client);
      console.log(`[migrate] ${result.applied.length} applied, ${result.skipped.length} already present`);
      printSummary('migrate', { ok: true, ...result });
      return true;
    });
  });

program.parseAsync().catch((error: unknown) => {
  console.error(`worker: ${errorMessage(error)}`);
  process.exitCode = 1;
});
