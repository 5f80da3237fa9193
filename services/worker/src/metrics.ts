import { Counter, Gauge, Histogram, Registry } from 'prom-client';
import type { PollResult } from '@freshness/core';

/**
 * Prometheus metrics for the poller, served by the health server at /metrics.
 * Each instance owns its registry.
 */
export class PollerMetrics {
  readonly registry: Registry;

  private readonly cyclesTotal: Counter;
  private readonly marketsFetchedTotal: Counter;
  private readonly errorsTotal: Counter<'error_type'>;
  private readonly cycleDuration: Histogram;
  private readonly lastCycleDuration: Gauge;
  private readonly marketsCount: Gauge;
  private readonly consecutiveErrors: Gauge;

  constructor(registry: Registry = new Registry()) {
    this.registry = registry;

    this.cyclesTotal = new Counter({
      name: 'poll_cycles_total',
      help: 'Completed poll cycles',
      registers: [registry],
    });
    this.marketsFetchedTotal = new Counter({
      name: 'poll_markets_fetched_total',
      help: 'Market records fetched from the listing API',
      registers: [registry],
    });
    this.errorsTotal = new Counter({
      name: 'poll_errors_total',
      help: 'Failed poll cycles by error type',
      labelNames: ['error_type'],
      registers: [registry],
    });
    this.cycleDuration = new Histogram({
      name: 'poll_cycle_duration_seconds',
      help: 'Duration of completed poll cycles',
      buckets: [0.5, 1, 2, 5, 10, 30, 60, 120],
      registers: [registry],
    });
    this.lastCycleDuration = new Gauge({
      name: 'poll_last_cycle_duration_seconds',
      help: 'Duration of the last completed poll cycle',
      registers: [registry],
    });
    this.marketsCount = new Gauge({
      name: 'poll_markets_count',
      help: 'Markets fetched in the last completed poll cycle',
      registers: [registry],
    });
    this.consecutiveErrors = new Gauge({
      name: 'poll_consecutive_errors',
      help: 'Failed poll cycles in a row',
      registers: [registry],
    });
  }

  recordSuccess(result: PollResult): void {
    const seconds = result.durationMs / 1000;
    this.cyclesTotal.inc();
    this.marketsFetchedTotal.inc(result.fetched);
    this.cycleDuration.observe(seconds);
    this.lastCycleDuration.set(seconds);
    this.marketsCount.set(result.fetched);
    this.consecutiveErrors.set(0);
  }

  recordFailure(errorType: string, consecutiveFailures: number): void {
    this.errorsTotal.inc({ error_type: errorType });
    this.consecutiveErrors.set(consecutiveFailures);
  }
}
