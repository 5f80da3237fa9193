import pg from 'pg';
import type { Pool } from 'pg';
import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import * as schema from './schema.js';

export type Database = NodePgDatabase<typeof schema>;

export interface DbClientOptions {
  connectionString: string;
  /** Pool size shared by poller, freshness and backfill */
  max?: number;
  /** Server-side per-statement timeout */
  statementTimeoutMs?: number;
}

export interface DbClient {
  db: Database;
  pool: Pool;
}

/**
 * Create the pooled client. One per process, built at start and passed down.
 * Every query checks a connection out of the pool and returns it when done;
 * transactions hold one connection for their duration only.
 */
export function createClient(options: DbClientOptions): DbClient {
  const pool = new pg.Pool({
    connectionString: options.connectionString,
    max: options.max ?? 10,
    statement_timeout: options.statementTimeoutMs ?? 30000,
    connectionTimeoutMillis: 10000,
  });

  // Idle clients can error (server restart); without a listener that crashes the process
  pool.on('error', (err) => {
    console.error(`[db] Idle client error: ${err.message}`);
  });

  return {
    pool,
    db: drizzle(pool, { schema }),
  };
}

/**
 * Round-trip check used by health and CLI startup
 */
export async function ping(client: DbClient): Promise<void> {
  await client.pool.query('SELECT 1');
}

/**
 * Close every pooled connection
 */
export async function disconnect(client: DbClient): Promise<void> {
  await client.pool.end();
}
