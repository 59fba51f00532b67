/**
 * Nearest-rank percentile over an ascending array: the smallest value such that
 * at least `p` percent of the samples are less than or equal to it.
 * Returns null for an empty input.
 */
export function nearestRank(sorted: readonly number[], p: number): number | null {
  if (sorted.length === 0) {
    return null;
  }
  if (!(p > 0 && p <= 100)) {
    throw new RangeError(`Percentile must be in (0, 100], got ${p}`);
  }
  const rank = Math.ceil((p * sorted.length) / 100);
  const index = Math.min(sorted.length - 1, Math.max(0, rank - 1));
  return sorted[index] ?? null;
}
