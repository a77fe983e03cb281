import { DimensionMismatchError, Vector } from '../types';

/**
 * Element-wise mean of the vectors that are available. An image embedding
 * and a text embedding from the same model blend into one query vector;
 * when one of them is missing the other is used alone.
 */
export function blendEmbeddings(vectors: ReadonlyArray<Vector | null>): Vector | null {
  const available = vectors.filter((v): v is Vector => v !== null);
  if (available.length === 0) return null;

  const dimensions = available[0].length;
  const sum = new Array<number>(dimensions).fill(0);

  for (const vector of available) {
    if (vector.length !== dimensions) {
      throw new DimensionMismatchError(dimensions, vector.length);
    }
    for (let i = 0; i < dimensions; i++) {
      sum[i] += vector[i];
    }
  }

  return sum.map((value) => value / available.length);
}
