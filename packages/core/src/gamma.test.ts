/**
 * Unit tests for gamma.ts (listing record validation)
 * Run with: npx tsx --test packages/core/src/gamma.test.ts
 */
import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { extractMarketList, isUsablePriceSet, parseGammaMarket, type MarketParseResult } from './gamma.js';
import type { MarketRecord } from './types.js';

const NOW = new Date('2025-06-01T00:00:00Z');

function baseRaw(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: 12345,
    question: 'Will it rain in Paris tomorrow?',
    conditionId: '0xabc',
    slug: 'rain-paris',
    active: true,
    closed: false,
    acceptingOrders: true,
    volumeNum: 1234.56789,
    liquidity: '500.5',
    outcomes: '["Yes","No"]',
    outcomePrices: '["0.65","0.35"]',
    bestBid: '0.64',
    bestAsk: 0.66,
    endDate: '2025-12-31T00:00:00Z',
    updatedAt: '2025-05-31T23:00:00Z',
    ...overrides,
  };
}

function expectRecord(result: MarketParseResult): MarketRecord {
  if (!result.ok) {
    assert.fail(`expected a record, got error: ${result.error.reason}`);
  }
  return result.record;
}

function expectError(result: MarketParseResult): { marketId: string | null; reason: string } {
  if (result.ok) {
    assert.fail(`expected a parse error, got record ${result.record.marketId}`);
  }
  return result.error;
}

describe('parseGammaMarket', () => {
  it('should normalize a well-formed record', () => {
    const result = parseGammaMarket(baseRaw(), NOW);
    const record = expectRecord(result);

    assert.deepEqual(record, {
      marketId: '12345',
      title: 'Will it rain in Paris tomorrow?',
      status: 'ACTIVE',
      acceptingOrders: true,
      volume: 1234.5679,
      liquidity: 500.5,
      outcomePrices: [0.65, 0.35],
      lastMidPrice: 0.65,
      conditionId: '0xabc',
      slug: 'rain-paris',
      category: null,
      outcomes: ['Yes', 'No'],
      endDate: new Date('2025-12-31T00:00:00Z'),
    });
    assert.ok(result.ok);
    assert.equal(result.sourceUpdatedAt?.toISOString(), '2025-05-31T23:00:00.000Z');
  });

  it('should accept prices sent as arrays', () => {
    const record = expectRecord(parseGammaMarket(baseRaw({ outcomePrices: [0.2, '0.8'] }), NOW));
    assert.deepEqual(record.outcomePrices, [0.2, 0.8]);
  });

  it('should default missing volume and liquidity to zero', () => {
    const record = expectRecord(parseGammaMarket(baseRaw({ volumeNum: undefined, volume: undefined, liquidity: '' }), NOW));
    assert.equal(record.volume, 0);
    assert.equal(record.liquidity, 0);
  });

  describe('status', () => {
    it('should mark closed and inactive markets RESOLVED', () => {
      const record = expectRecord(parseGammaMarket(baseRaw({ closed: true, active: false }), NOW));
      assert.equal(record.status, 'RESOLVED');
      assert.equal(record.acceptingOrders, false);
    });

    it('should mark closed but active markets CLOSED', () => {
      const record = expectRecord(parseGammaMarket(baseRaw({ closed: true, active: true }), NOW));
      assert.equal(record.status, 'CLOSED');
      assert.equal(record.acceptingOrders, false);
    });

    it('should mark markets past their end date CLOSED', () => {
      const record = expectRecord(parseGammaMarket(baseRaw({ endDate: '2025-05-01T00:00:00Z' }), NOW));
      assert.equal(record.status, 'CLOSED');
    });

    it('should mark archived markets ARCHIVED', () => {
      const record = expectRecord(parseGammaMarket(baseRaw({ archived: true, closed: true, active: false }), NOW));
      assert.equal(record.status, 'ARCHIVED');
    });

    it('should fall back to the active flag for accepting orders', () => {
      const record = expectRecord(parseGammaMarket(baseRaw({ acceptingOrders: undefined }), NOW));
      assert.equal(record.acceptingOrders, true);

      const inactive = expectRecord(parseGammaMarket(baseRaw({ acceptingOrders: undefined, active: undefined }), NOW));
      assert.equal(inactive.acceptingOrders, false);
    });
  });

  describe('prices', () => {
    it('should drop placeholder prices', () => {
      const record = expectRecord(parseGammaMarket(baseRaw({ outcomePrices: '["0","1"]' }), NOW));
      assert.deepEqual(record.outcomePrices, []);
    });

    it('should drop price sets that do not sum to one', () => {
      const record = expectRecord(parseGammaMarket(baseRaw({ outcomePrices: '["0.5","0.3"]' }), NOW));
      assert.deepEqual(record.outcomePrices, []);
    });

    it('should use a single side when only one quote exists', () => {
      const record = expectRecord(parseGammaMarket(baseRaw({ bestAsk: undefined }), NOW));
      assert.equal(record.lastMidPrice, 0.64);

      const none = expectRecord(parseGammaMarket(baseRaw({ bestBid: undefined, bestAsk: undefined }), NOW));
      assert.equal(none.lastMidPrice, null);
    });
  });

  describe('malformed records', () => {
    it('should reject a price outside [0,1]', () => {
      const error = expectError(parseGammaMarket(baseRaw({ id: '7', outcomePrices: '["1.5","-0.5"]' }), NOW));
      assert.deepEqual(error, { marketId: '7', reason: 'outcome price out of [0,1]: 1.5' });
    });

    it('should reject negative volume', () => {
      const error = expectError(parseGammaMarket(baseRaw({ volumeNum: -3 }), NOW));
      assert.deepEqual(error, { marketId: '12345', reason: 'volume is negative: -3' });
    });

    it('should reject non-numeric liquidity', () => {
      const error = expectError(parseGammaMarket(baseRaw({ liquidity: 'lots' }), NOW));
      assert.equal(error.reason, 'liquidity is not numeric: lots');
    });

    it('should reject prices that are not JSON', () => {
      const error = expectError(parseGammaMarket(baseRaw({ outcomePrices: 'not json' }), NOW));
      assert.equal(error.reason, 'outcomePrices is not valid JSON');
    });

    it('should reject a record without a question', () => {
      const error = expectError(parseGammaMarket(baseRaw({ question: undefined }), NOW));
      assert.equal(error.marketId, '12345');
      assert.ok(error.reason.startsWith('question:'));
    });

    it('should reject values that are not objects', () => {
      const error = expectError(parseGammaMarket('junk', NOW));
      assert.equal(error.marketId, null);
    });
  });
});

describe('isUsablePriceSet', () => {
  it('should keep near-certain markets', () => {
    assert.ok(isUsablePriceSet([0.02, 0.98]));
  });

  it('should reject single prices', () => {
    assert.ok(!isUsablePriceSet([1]));
  });
});

describe('extractMarketList', () => {
  it('should accept arrays and data envelopes', () => {
    assert.deepEqual(extractMarketList([{ id: 1 }]), [{ id: 1 }]);
    assert.deepEqual(extractMarketList({ data: [{ id: 2 }] }), [{ id: 2 }]);
  });

  it('should throw on anything else', () => {
    assert.throws(() => extractMarketList({ markets: [] }), /Unexpected listing payload/);
  });
});
