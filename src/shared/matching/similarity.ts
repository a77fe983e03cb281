import { DimensionMismatchError, Vector } from '../types';

/**
 * Cosine similarity: both vectors are L2-normalized independently and then
 * dotted, so the result lies in [-1, 1]. A zero vector has no direction and
 * scores 0 against anything.
 */
export function similarity(a: Vector, b: Vector): number {
  if (a.length !== b.length) {
    throw new DimensionMismatchError(a.length, b.length);
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const magnitude = Math.sqrt(normA) * Math.sqrt(normB);
  if (magnitude === 0) return 0;

  return dot / magnitude;
}

/**
 * Weak percentile rank: the share (x100) of `values` that are <= `value`.
 * The maximum of a non-empty set always ranks 100; an empty set has no rank (NaN).
 */
export function percentileRank(values: readonly number[], value: number): number {
  if (values.length === 0) return NaN;

  let atOrBelow = 0;
  for (const v of values) {
    if (v <= value) atOrBelow++;
  }
  return (100 * atOrBelow) / values.length;
}

/**
 * Weak percentile rank of every entry of `values` within `values`, in input
 * order. Equal values share the same (inclusive) rank.
 */
export function percentileRanks(values: readonly number[]): number[] {
  const sorted = [...values].sort((a, b) => a - b);
  return values.map((value) => (100 * upperBound(sorted, value)) / sorted.length);
}

// Number of entries in ascending `sorted` that are <= value
function upperBound(sorted: readonly number[], value: number): number {
  let lo = 0;
  let hi = sorted.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (sorted[mid] <= value) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}
