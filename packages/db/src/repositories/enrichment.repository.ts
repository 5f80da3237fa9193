import { and, asc, isNotNull, isNull, sql, type SQL } from 'drizzle-orm';
import type { Database } from '../client.js';
import { userTransactions } from '../schema.js';

/**
 * Position in the (created_at, tx_id) ordering. createdAt is the server's own
 * text rendering so the microsecond part survives the round trip.
 */
export interface BatchCursor {
  createdAt: string;
  txId: string;
}

export interface EnrichmentCandidate {
  txId: string;
  positionId: string;
  cursor: BatchCursor;
}

export interface EnrichmentUpdate {
  txId: string;
  marketId: string;
  outcome: number;
}

export interface EnrichmentStore {
  /** Rows with a position id and no market id yet */
  countPending(): Promise<number>;
  /** Next candidates strictly after `after`, oldest first */
  selectBatch(limit: number, after: BatchCursor | null): Promise<EnrichmentCandidate[]>;
  /** Apply updates atomically; rows enriched in the meantime are left alone. Returns rows changed. */
  applyBatch(updates: EnrichmentUpdate[]): Promise<number>;
}

// Three bind parameters per row; Postgres caps a statement at 65535
export const UPDATE_CHUNK_ROWS = 5000;

const pending = and(isNull(userTransactions.marketId), isNotNull(userTransactions.positionId));

/**
 * Repository for the user_transactions backfill
 */
export class EnrichmentRepository implements EnrichmentStore {
  constructor(private readonly db: Database) {}

  async countPending(): Promise<number> {
    const [row] = await this.db
      .select({ count: sql<number>`count(*)::int` })
      .from(userTransactions)
      .where(pending);
    return row?.count ?? 0;
  }

  /**
   * Keyset page over pending rows ordered by (created_at, tx_id)
   */
  selectBatchQuery(limit: number, after: BatchCursor | null) {
    const afterCursor = after
      ? sql`(${userTransactions.createdAt}, ${userTransactions.txId}) > (${after.createdAt}::timestamptz, ${after.txId})`
      : undefined;

    return this.db
      .select({
        txId: userTransactions.txId,
        positionId: userTransactions.positionId,
        createdAt: sql<string>`${userTransactions.createdAt}::text`,
      })
      .from(userTransactions)
      .where(and(pending, afterCursor))
      .orderBy(asc(userTransactions.createdAt), asc(userTransactions.txId))
      .limit(limit);
  }

  async selectBatch(limit: number, after: BatchCursor | null): Promise<EnrichmentCandidate[]> {
    const rows = await this.selectBatchQuery(limit, after);

    return rows.flatMap((row) =>
      row.positionId === null
        ? []
        : [{ txId: row.txId, positionId: row.positionId, cursor: { createdAt: row.createdAt, txId: row.txId } }]
    );
  }

  /**
   * One UPDATE ... FROM (VALUES ...) for a chunk of the batch. Rows that already
   * have a market_id are not touched.
   */
  applyBatchStatement(updates: EnrichmentUpdate[]): SQL {
    const values = sql.join(
      updates.map((update) => sql`(${update.txId}::text, ${update.marketId}::text, ${update.outcome}::int)`),
      sql`, `
    );

    return sql`
      update ${userTransactions}
      set market_id = v.market_id, outcome = v.outcome
      from (values ${values}) as v(tx_id, market_id, outcome)
      where ${userTransactions.txId} = v.tx_id and ${userTransactions.marketId} is null
    `;
  }

  async applyBatch(updates: EnrichmentUpdate[]): Promise<number> {
    if (updates.length === 0) return 0;

    return this.db.transaction(async (tx) => {
      let updated = 0;
      for (let i = 0; i < updates.length; i += UPDATE_CHUNK_ROWS) {
        const result = await tx.execute(this.applyBatchStatement(updates.slice(i, i + UPDATE_CHUNK_ROWS)));
        updated += result.rowCount ?? 0;
      }
      return updated;
    });
  }
}
