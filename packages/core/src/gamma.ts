/**
 * Gamma listing records -> MarketRecord
 *
 * Everything downstream of the ingestion boundary works on MarketRecord only;
 * raw payloads are validated here and either become a record or a parse error.
 */

import { z } from 'zod';
import type { MarketRecord, MarketStatus } from './types.js';
import { normalizeTimestamp } from './utils.js';

const numberLike = z.union([z.number(), z.string()]);
const listLike = z.union([z.string(), z.array(z.union([z.string(), z.number()]))]);
const optionalText = z.string().nullish();

export const gammaMarketSchema = z.object({
  id: z.union([z.string().trim().min(1), z.number().int()]),
  question: z.string().trim().min(1),
  conditionId: optionalText,
  slug: optionalText,
  category: optionalText,
  active: z.boolean().nullish(),
  closed: z.boolean().nullish(),
  archived: z.boolean().nullish(),
  acceptingOrders: z.boolean().nullish(),
  volume: numberLike.nullish(),
  volumeNum: z.number().nullish(),
  liquidity: numberLike.nullish(),
  liquidityNum: z.number().nullish(),
  outcomes: listLike.nullish(),
  outcomePrices: listLike.nullish(),
  bestBid: numberLike.nullish(),
  bestAsk: numberLike.nullish(),
  endDate: optionalText,
  updatedAt: z.union([z.string(), z.number()]).nullish(),
});

export type GammaMarket = z.infer<typeof gammaMarketSchema>;

export interface MarketParseError {
  marketId: string | null;
  reason: string;
}

export type MarketParseResult =
  | { ok: true; record: MarketRecord; sourceUpdatedAt: Date | null }
  | { ok: false; error: MarketParseError };

class RecordRejected extends Error {}

function reject(reason: string): never {
  throw new RecordRejected(reason);
}

/**
 * Accept a bare array or an object with a `data` array
 */
export function extractMarketList(payload: unknown): unknown[] {
  if (Array.isArray(payload)) {
    return payload;
  }
  if (typeof payload === 'object' && payload !== null && 'data' in payload && Array.isArray(payload.data)) {
    return payload.data;
  }
  throw new Error('Unexpected listing payload: expected an array of markets');
}

function toNumber(value: number | string | null | undefined, field: string): number | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' && value.trim() === '') return null;
  const parsed = typeof value === 'number' ? value : Number(value);
  if (!Number.isFinite(parsed)) {
    reject(`${field} is not numeric: ${String(value)}`);
  }
  return parsed;
}

function toList(value: string | Array<string | number> | null | undefined, field: string): Array<string | number> {
  if (value === null || value === undefined) return [];
  if (Array.isArray(value)) return value;
  if (value.trim() === '') return [];

  let decoded: unknown;
  try {
    decoded = JSON.parse(value);
  } catch {
    reject(`${field} is not valid JSON`);
  }
  const list = z.array(z.union([z.string(), z.number()])).safeParse(decoded);
  if (!list.success) {
    reject(`${field} is not a list`);
  }
  return list.data;
}

function round4(value: number): number {
  return Math.round(value * 10000) / 10000;
}

function toDate(value: string | number | null | undefined): Date | null {
  if (value === null || value === undefined || value === '') return null;
  const date = normalizeTimestamp(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

/**
 * Upstream publishes [0, 1] / [1, 0] before real prices exist, and the
 * prices of one market must sum to ~1.
 */
export function isUsablePriceSet(prices: number[]): boolean {
  if (prices.length < 2) return false;
  if (prices.length === 2 && prices.every((p) => p === 0 || p === 1)) return false;
  const sum = prices.reduce((acc, p) => acc + p, 0);
  return Math.abs(round4(sum) - 1) <= 0.01;
}

export function deriveStatus(market: GammaMarket, endDate: Date | null, now: Date): MarketStatus {
  if (market.archived) return 'ARCHIVED';
  if (market.closed && market.active === false) return 'RESOLVED';
  if (market.closed) return 'CLOSED';
  if (endDate && endDate.getTime() < now.getTime()) return 'CLOSED';
  return 'ACTIVE';
}

function midPrice(bestBid: number | null, bestAsk: number | null): number | null {
  if (bestBid !== null && bestAsk !== null) return round4((bestBid + bestAsk) / 2);
  if (bestBid !== null) return round4(bestBid);
  if (bestAsk !== null) return round4(bestAsk);
  return null;
}

function rawId(raw: unknown): string | null {
  if (typeof raw !== 'object' || raw === null || !('id' in raw)) return null;
  const { id } = raw;
  return typeof id === 'string' || typeof id === 'number' ? String(id) : null;
}

/**
 * Validate and normalize one raw listing record
 */
export function parseGammaMarket(raw: unknown, now: Date = new Date()): MarketParseResult {
  const parsed = gammaMarketSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const path = issue?.path.join('.') || 'record';
    return { ok: false, error: { marketId: rawId(raw), reason: `${path}: ${issue?.message ?? 'invalid'}` } };
  }

  const market = parsed.data;
  const marketId = String(market.id);

  try {
    const volume = toNumber(market.volumeNum ?? market.volume, 'volume') ?? 0;
    const liquidity = toNumber(market.liquidityNum ?? market.liquidity, 'liquidity') ?? 0;
    if (volume < 0) reject(`volume is negative: ${volume}`);
    if (liquidity < 0) reject(`liquidity is negative: ${liquidity}`);

    const prices = toList(market.outcomePrices, 'outcomePrices').map((p) => {
      const price = toNumber(p, 'outcomePrices');
      if (price === null) reject('outcomePrices contains an empty value');
      if (price < 0 || price > 1) reject(`outcome price out of [0,1]: ${price}`);
      return round4(price);
    });

    const bestBid = toNumber(market.bestBid, 'bestBid');
    const bestAsk = toNumber(market.bestAsk, 'bestAsk');
    const endDate = toDate(market.endDate);
    const status = deriveStatus(market, endDate, now);

    const record: MarketRecord = {
      marketId,
      title: market.question,
      status,
      acceptingOrders: status === 'ACTIVE' && (market.acceptingOrders ?? market.active ?? false),
      volume: round4(volume),
      liquidity: round4(liquidity),
      outcomePrices: isUsablePriceSet(prices) ? prices : [],
      lastMidPrice: midPrice(bestBid, bestAsk),
      conditionId: market.conditionId || null,
      slug: market.slug || null,
      category: market.category || null,
      outcomes: toList(market.outcomes, 'outcomes').map(String),
      endDate,
    };

    return { ok: true, record, sourceUpdatedAt: toDate(market.updatedAt) };
  } catch (error) {
    if (error instanceof RecordRejected) {
      return { ok: false, error: { marketId, reason: error.message } };
    }
    throw error;
  }
}
