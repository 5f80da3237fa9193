import express, { type Express } from 'express';
import type { Server } from 'node:http';
import type { Registry } from 'prom-client';
import type { PollResult } from '@freshness/core';
import type { PollerSnapshot } from './pipeline/poller.js';

export type ServiceStatus = 'ok' | 'degraded' | 'unhealthy';

export interface HealthThresholds {
  /** Consecutive failed cycles before the service reports unhealthy */
  errorThreshold: number;
  /** Seconds without a successful cycle before it reports degraded */
  degradedAfterSeconds: number;
}

export interface HealthPayload {
  status: ServiceStatus;
  service: string;
  lastSuccess: string | null;
  lastCycle: string | null;
  uptimeSeconds: number;
  consecutiveFailures: number;
  totalCycles: number;
  lastResult: PollResult | null;
}

/**
 * Defaults scaled to the poll interval: degraded after three missed cycles
 */
export function thresholdsFor(intervalSeconds: number, errorThreshold = 3): HealthThresholds {
  return { errorThreshold, degradedAfterSeconds: Math.max(90, intervalSeconds * 3) };
}

export function evaluateHealth(snapshot: PollerSnapshot, now: Date, thresholds: HealthThresholds): ServiceStatus {
  if (snapshot.consecutiveFailures >= thresholds.errorThreshold) {
    return 'unhealthy';
  }

  const reference = snapshot.lastSuccessAt ?? snapshot.startedAt;
  const ageSeconds = (now.getTime() - reference.getTime()) / 1000;
  // Before the first success the grace period counts from start
  return ageSeconds > thresholds.degradedAfterSeconds ? 'degraded' : 'ok';
}

export function buildHealthPayload(
  service: string,
  snapshot: PollerSnapshot,
  now: Date,
  thresholds: HealthThresholds
): HealthPayload {
  return {
    status: evaluateHealth(snapshot, now, thresholds),
    service,
    lastSuccess: snapshot.lastSuccessAt?.toISOString() ?? null,
    lastCycle: snapshot.lastCycleAt?.toISOString() ?? null,
    uptimeSeconds: Math.round((now.getTime() - snapshot.startedAt.getTime()) / 10) / 100,
    consecutiveFailures: snapshot.consecutiveFailures,
    totalCycles: snapshot.totalCycles,
    lastResult: snapshot.lastResult,
  };
}

export function createHealthApp(
  service: string,
  getSnapshot: () => PollerSnapshot,
  thresholds: HealthThresholds,
  registry?: Registry
): Express {
  const app = express();

  app.get('/', (_req, res) => {
    const endpoints = registry ? { health: 'GET /health', metrics: 'GET /metrics' } : { health: 'GET /health' };
    res.json({ service, endpoints });
  });

  app.get('/health', (_req, res) => {
    const payload = buildHealthPayload(service, getSnapshot(), new Date(), thresholds);
    res.status(payload.status === 'unhealthy' ? 503 : 200).json(payload);
  });

  if (registry) {
    // Prometheus text exposition
    app.get('/metrics', async (_req, res) => {
      try {
        const body = await registry.metrics();
        res.set('Content-Type', registry.contentType).send(body);
      } catch (error) {
        console.error('[health] Error rendering metrics:', error);
        res.status(500).json({ error: 'Failed to render metrics' });
      }
    });
  }

  return app;
}

export function startHealthServer(app: Express, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, '0.0.0.0', () => {
      console.log(`[health] Listening on http://0.0.0.0:${port}/health`);
      resolve(server);
    });
    server.once('error', reject);
  });
}

export function stopHealthServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}
