import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { decodePositionId } from './position.js';

describe('decodePositionId', () => {
  it('should split an odd id into parent market and outcome 1', () => {
    assert.deepEqual(decodePositionId('7'), { marketId: '3', outcome: 1 });
  });

  it('should split an even id into parent market and outcome 0', () => {
    assert.deepEqual(decodePositionId('10'), { marketId: '5', outcome: 0 });
    assert.deepEqual(decodePositionId('0'), { marketId: '0', outcome: 0 });
  });

  it('should agree with floor/mod for a range of ids', () => {
    for (let id = 0; id < 50; id++) {
      assert.deepEqual(decodePositionId(String(id)), { marketId: String(Math.floor(id / 2)), outcome: id % 2 });
    }
  });

  it('should keep full precision for 256-bit ids', () => {
    const positionId = '115792089237316195423570985008687907853269984665640564039457584007913129639935';
    assert.deepEqual(decodePositionId(positionId), {
      marketId: '57896044618658097711785492504343953926634992332820282019728792003956564819967',
      outcome: 1,
    });
  });

  it('should trim surrounding whitespace', () => {
    assert.deepEqual(decodePositionId(' 9 '), { marketId: '4', outcome: 1 });
  });

  it('should return null for undecodable ids', () => {
    assert.equal(decodePositionId(''), null);
    assert.equal(decodePositionId('0x1f'), null);
    assert.equal(decodePositionId('-4'), null);
    assert.equal(decodePositionId('12.5'), null);
  });
});
