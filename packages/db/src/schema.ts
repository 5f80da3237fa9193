/**
 * Postgres schema (drizzle-orm)
 *
 * Mirrors migrations/*.sql; the SQL files are what actually creates the tables.
 */

import { sql } from 'drizzle-orm';
import {
  pgTable,
  text,
  boolean,
  integer,
  serial,
  doublePrecision,
  timestamp,
  index,
} from 'drizzle-orm/pg-core';

export const MARKET_STATUS_VALUES = ['ACTIVE', 'CLOSED', 'RESOLVED', 'ARCHIVED'] as const;

// ============================================
// MARKETS (one row per upstream market, upserted by the poller)
// ============================================

export const markets = pgTable('markets', {
  marketId: text('market_id').primaryKey(),
  conditionId: text('condition_id'),
  slug: text('slug'),
  title: text('title').notNull(),
  category: text('category'),
  status: text('status', { enum: MARKET_STATUS_VALUES }).notNull(),
  acceptingOrders: boolean('accepting_orders').notNull().default(false),
  volume: doublePrecision('volume').notNull().default(0),
  liquidity: doublePrecision('liquidity').notNull().default(0),
  outcomes: text('outcomes').array().notNull().default(sql`'{}'::text[]`),
  outcomePrices: doublePrecision('outcome_prices').array().notNull().default(sql`'{}'::double precision[]`),
  lastMidPrice: doublePrecision('last_mid_price'),
  endDate: timestamp('end_date', { withTimezone: true }),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  index('markets_updated_at_idx').on(table.updatedAt),
  index('markets_status_idx').on(table.status),
  index('markets_volume_idx').on(table.volume),
]);

// ============================================
// USER TRANSACTIONS (written upstream, enriched by the backfill)
// ============================================

export const userTransactions = pgTable('user_transactions', {
  txId: text('tx_id').primaryKey(),
  userAddress: text('user_address').notNull(),
  positionId: text('position_id'),
  // Derived from position_id; NULL until backfilled
  marketId: text('market_id'),
  outcome: integer('outcome'),
  amount: doublePrecision('amount'),
  price: doublePrecision('price'),
  txHash: text('tx_hash'),
  timestamp: timestamp('timestamp', { withTimezone: true }).notNull(),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  index('user_transactions_user_ts_idx').on(table.userAddress, table.timestamp),
  index('user_transactions_market_ts_idx').on(table.marketId, table.timestamp),
  index('user_transactions_pending_idx')
    .on(table.createdAt, table.txId)
    .where(sql`${table.marketId} is null and ${table.positionId} is not null`),
]);

// ============================================
// INGESTION RUNS (one row per poll cycle / backfill run)
// ============================================

export const ingestionRuns = pgTable('ingestion_runs', {
  id: serial('id').primaryKey(),
  jobName: text('job_name').notNull(),
  startedAt: timestamp('started_at', { withTimezone: true }).notNull().defaultNow(),
  finishedAt: timestamp('finished_at', { withTimezone: true }),
  ok: boolean('ok'),
  fetched: integer('fetched').notNull().default(0),
  written: integer('written').notNull().default(0),
  errors: integer('errors').notNull().default(0),
  errorText: text('error_text'),
}, (table) => [
  index('ingestion_runs_job_started_idx').on(table.jobName, table.startedAt),
]);

export type MarketRow = typeof markets.$inferSelect;
export type NewMarketRow = typeof markets.$inferInsert;
export type UserTransactionRow = typeof userTransactions.$inferSelect;
export type IngestionRunRow = typeof ingestionRuns.$inferSelect;
