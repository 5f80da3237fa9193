/**
 * Continuous percentile with linear interpolation between the closest ranks,
 * the same definition as Postgres `percentile_cont`.
 * Returns null for an empty sample.
 */
export function percentileCont(values: readonly number[], fraction: number): number | null {
  if (fraction < 0 || fraction > 1) {
    throw new RangeError(`percentile fraction must be within [0, 1], got ${fraction}`);
  }
  if (values.length === 0) {
    return null;
  }

  const sorted = [...values].sort((a, b) => a - b);
  const position = fraction * (sorted.length - 1);
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  const weight = position - lower;

  return sorted[lower] + (sorted[upper] - sorted[lower]) * weight;
}
