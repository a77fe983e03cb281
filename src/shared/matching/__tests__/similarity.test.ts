/**
 * Unit tests for similarity and percentile ranking
 */

import { similarity, percentileRank, percentileRanks } from '../similarity';
import { DimensionMismatchError } from '../../types';

describe('similarity', () => {
  it('is 1 for a vector against itself and -1 against its negation', () => {
    const v = [0.3, -1.2, 2.5, 0.7];
    expect(similarity(v, v)).toBeCloseTo(1, 12);
    expect(similarity(v, v.map((x) => -x))).toBeCloseTo(-1, 12);
  });

  it('normalizes both inputs, so magnitude does not matter', () => {
    expect(similarity([1, 2], [2, 4])).toBeCloseTo(1, 12);
    expect(similarity([3, 4], [4, 3])).toBeCloseTo(24 / 25, 12);
  });

  it('is 0 for orthogonal vectors', () => {
    expect(similarity([1, 0, 0], [0, 5, 0])).toBe(0);
  });

  it('scores a zero vector as 0 rather than NaN', () => {
    expect(similarity([0, 0], [1, 1])).toBe(0);
  });

  it('throws DimensionMismatchError for vectors of different length', () => {
    expect(() => similarity([1, 0], [1, 0, 0])).toThrow(DimensionMismatchError);
    expect(() => similarity([1, 0], [1, 0, 0])).toThrow('Vector dimension mismatch: 2 vs 3');
  });
});

describe('percentileRank', () => {
  it('counts values at or below the given value', () => {
    expect(percentileRank([0.9, 0.5, 0.3], 0.5)).toBeCloseTo(200 / 3, 10);
    expect(percentileRank([0.9, 0.5, 0.3], 0.3)).toBeCloseTo(100 / 3, 10);
  });

  it('counts ties inclusively', () => {
    expect(percentileRank([0.5, 0.5, 0.1, 0.9], 0.5)).toBe(75);
  });

  it('ranks the maximum at 100', () => {
    expect(percentileRank([0.2, 0.7, 0.4], 0.7)).toBe(100);
    expect(percentileRank([0.42], 0.42)).toBe(100);
  });

  it('has no rank within an empty set', () => {
    expect(percentileRank([], 0.5)).toBeNaN();
  });
});

describe('percentileRanks', () => {
  it('ranks every entry in input order', () => {
    const ranks = percentileRanks([0.3, 0.9, 0.3]);
    expect(ranks[0]).toBeCloseTo(200 / 3, 10);
    expect(ranks[1]).toBe(100);
    expect(ranks[2]).toBeCloseTo(200 / 3, 10);
  });

  it('agrees with percentileRank entry by entry', () => {
    const values = [0.12, -0.4, 0.88, 0.12, 0.5, 0.5, 0.5, 0.01];
    const ranks = percentileRanks(values);
    values.forEach((value, i) => {
      expect(ranks[i]).toBe(percentileRank(values, value));
    });
  });

  it('returns an empty list for no values', () => {
    expect(percentileRanks([])).toEqual([]);
  });
});
