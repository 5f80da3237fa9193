import { eq, sql } from 'drizzle-orm';
import type { MarketRecord, StoredMarket, UpsertOutcome } from '@freshness/core';
import type { Database } from '../client.js';
import { markets, type MarketRow, type NewMarketRow } from '../schema.js';

export interface UpsertMarketsResult {
  created: number;
  updated: number;
}

/**
 * Write side used by the poller. Implemented by MarketRepository and by the
 * in-memory store the worker tests run against.
 */
export interface MarketStore {
  upsertMarket(record: MarketRecord): Promise<UpsertOutcome>;
  upsertMarkets(records: MarketRecord[]): Promise<UpsertMarketsResult>;
}

function toRow(record: MarketRecord): NewMarketRow {
  return {
    marketId: record.marketId,
    conditionId: record.conditionId,
    slug: record.slug,
    title: record.title,
    category: record.category,
    status: record.status,
    acceptingOrders: record.acceptingOrders,
    volume: record.volume,
    liquidity: record.liquidity,
    outcomes: record.outcomes,
    outcomePrices: record.outcomePrices,
    lastMidPrice: record.lastMidPrice,
    endDate: record.endDate,
  };
}

function fromRow(row: MarketRow): StoredMarket {
  return {
    marketId: row.marketId,
    title: row.title,
    status: row.status,
    acceptingOrders: row.acceptingOrders,
    volume: row.volume,
    liquidity: row.liquidity,
    outcomePrices: row.outcomePrices,
    lastMidPrice: row.lastMidPrice,
    conditionId: row.conditionId,
    slug: row.slug,
    category: row.category,
    outcomes: row.outcomes,
    endDate: row.endDate,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

/**
 * Repository for market operations
 */
export class MarketRepository implements MarketStore {
  constructor(private readonly db: Database) {}

  /**
   * INSERT ... ON CONFLICT (market_id) DO UPDATE for one record.
   * created_at is only ever written by the column default on insert.
   */
  upsertQuery(record: MarketRecord, db: Pick<Database, 'insert'> = this.db) {
    const row = toRow(record);
    const { marketId: _marketId, ...mutable } = row;

    return db
      .insert(markets)
      .values(row)
      .onConflictDoUpdate({
        target: markets.marketId,
        set: {
          ...mutable,
          updatedAt: sql`now()`,
        },
      })
      .returning({
        createdAt: markets.createdAt,
        updatedAt: markets.updatedAt,
        // xmax is 0 only for a freshly inserted tuple
        inserted: sql<boolean>`(xmax = 0)`,
      });
  }

  async upsertMarket(record: MarketRecord, db: Pick<Database, 'insert'> = this.db): Promise<UpsertOutcome> {
    const [row] = await this.upsertQuery(record, db);

    if (!row) {
      throw new Error(`Upsert of market ${record.marketId} returned no row`);
    }

    return {
      created: row.inserted,
      createdAt: row.createdAt,
      updatedAt: row.updatedAt,
    };
  }

  /**
   * Upsert one page of markets in a single transaction
   */
  async upsertMarkets(records: MarketRecord[]): Promise<UpsertMarketsResult> {
    if (records.length === 0) {
      return { created: 0, updated: 0 };
    }

    return this.db.transaction(async (tx) => {
      let created = 0;
      let updated = 0;
      for (const record of records) {
        const outcome = await this.upsertMarket(record, tx);
        if (outcome.created) {
          created++;
        } else {
          updated++;
        }
      }
      return { created, updated };
    });
  }

  async findById(marketId: string): Promise<StoredMarket | null> {
    const rows = await this.db.select().from(markets).where(eq(markets.marketId, marketId)).limit(1);
    const row = rows[0];
    return row ? fromRow(row) : null;
  }

  /**
   * Row count per status, for the health command
   */
  async countByStatus(): Promise<Record<string, number>> {
    const rows = await this.db
      .select({ status: markets.status, count: sql<number>`count(*)::int` })
      .from(markets)
      .groupBy(markets.status);

    const counts: Record<string, number> = {};
    for (const row of rows) {
      counts[row.status] = row.count;
    }
    return counts;
  }
}
