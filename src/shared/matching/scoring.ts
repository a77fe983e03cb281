import {
  DimensionMismatchError,
  EmbeddingSpaceMismatchError,
  MatchOptions,
  MatchStats,
  TaxonomyTree,
  Vector,
} from '../types';
import { similarity } from './similarity';

export function assertSameSpace(tree: TaxonomyTree, options: MatchOptions): void {
  if (options.provider !== undefined && options.provider !== tree.provider) {
    throw new EmbeddingSpaceMismatchError(tree.provider, options.provider);
  }
}

/**
 * Similarity of one candidate, or null when the comparison has to be skipped
 * (mismatched dimensions, non-finite score). Skips are counted in `stats`.
 */
export function scoreCandidate(query: Vector, embedding: Vector, stats?: MatchStats): number | null {
  let score: number;
  try {
    score = similarity(query, embedding);
  } catch (error) {
    if (!(error instanceof DimensionMismatchError)) throw error;
    if (stats) stats.skippedComparisons++;
    return null;
  }

  if (!Number.isFinite(score)) {
    if (stats) stats.skippedComparisons++;
    return null;
  }
  return score;
}
