import type { DecodedPosition } from './types.js';

const DECIMAL = /^\d+$/;

/**
 * Decode a position id into its parent market and outcome index.
 *
 * position_id = market_id * 2 + outcome, so market_id = floor(position_id / 2)
 * and outcome = position_id mod 2. Ids routinely exceed 2^53, hence BigInt.
 * Returns null for anything that is not a non-negative decimal integer.
 */
export function decodePositionId(positionId: string): DecodedPosition | null {
  const trimmed = positionId.trim();
  if (!DECIMAL.test(trimmed)) {
    return null;
  }

  const value = BigInt(trimmed);
  return {
    marketId: (value / 2n).toString(),
    outcome: Number(value % 2n),
  };
}
