import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { freshnessOf, gradeFreshness, EMPTY_FRESHNESS } from './freshness.js';
import { percentileCont } from './percentile.js';

const NOW = new Date('2025-06-01T12:00:00Z');

function secondsAgo(seconds: number): Date {
  return new Date(NOW.getTime() - seconds * 1000);
}

describe('percentileCont', () => {
  it('should interpolate between closest ranks', () => {
    assert.equal(percentileCont([1, 2, 3, 4], 0.5), 2.5);
    assert.equal(percentileCont([10, 20], 0.25), 12.5);
  });

  it('should not depend on input order', () => {
    assert.equal(percentileCont([4, 1, 3, 2], 1), 4);
    assert.equal(percentileCont([4, 1, 3, 2], 0), 1);
  });

  it('should return null for an empty sample', () => {
    assert.equal(percentileCont([], 0.95), null);
  });

  it('should reject fractions outside [0, 1]', () => {
    assert.throws(() => percentileCont([1], 1.5), RangeError);
  });
});

describe('freshnessOf', () => {
  it('should measure staleness of the newest row, not an average', () => {
    const stats = freshnessOf([secondsAgo(300), secondsAgo(30), secondsAgo(600)], NOW);

    assert.equal(stats.totalRecords, 3);
    assert.equal(stats.latestUpdate?.toISOString(), secondsAgo(30).toISOString());
    assert.equal(stats.freshnessSeconds, 30);
  });

  it('should put p95 of 100 evenly spread rows between 94 and 95 seconds', () => {
    const timestamps = Array.from({ length: 100 }, (_, i) => secondsAgo(i));
    const stats = freshnessOf(timestamps, NOW);

    assert.equal(stats.totalRecords, 100);
    assert.equal(stats.freshnessSeconds, 0);
    const p95 = stats.p95FreshnessSeconds;
    assert.ok(p95 !== null && p95 >= 94 && p95 <= 95, `p95 was ${p95}`);
    assert.ok(p95 !== null && Math.abs(p95 - 94.05) < 1e-9);
  });

  it('should return an absent result for an empty set', () => {
    assert.deepEqual(freshnessOf([], NOW), EMPTY_FRESHNESS);
  });
});

describe('gradeFreshness', () => {
  const stats = (p95: number) => ({ totalRecords: 10, latestUpdate: NOW, freshnessSeconds: 1, p95FreshnessSeconds: p95 });

  it('should grade against the expected interval', () => {
    assert.equal(gradeFreshness(stats(80), 60), 'HEALTHY');
    assert.equal(gradeFreshness(stats(90), 60), 'HEALTHY');
    assert.equal(gradeFreshness(stats(150), 60), 'DEGRADED');
    assert.equal(gradeFreshness(stats(181), 60), 'STALE');
  });

  it('should grade empty tables EMPTY', () => {
    assert.equal(gradeFreshness(EMPTY_FRESHNESS, 60), 'EMPTY');
  });
});
