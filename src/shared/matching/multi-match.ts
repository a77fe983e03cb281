import { MatchOptions, MatchResult, Path, TaxonomyTree, Vector } from '../types';
import { assertSameSpace, scoreCandidate } from './scoring';
import { percentileRanks } from './similarity';

/** Similarity weighted by the leaf's weak percentile rank, in [-1, 1]. */
export function combinedScore(result: Pick<MatchResult, 'similarity' | 'rank'>): number {
  return (result.similarity * result.rank) / 100;
}

/**
 * Every leaf whose similarity x percentile rank / 100 reaches `threshold`,
 * in depth-first order. Ranks are taken over all leaves that could be
 * scored, so the same similarity can qualify in one tree and not in another.
 *
 * The threshold is not validated; a negative one lets every leaf through.
 */
export function multiMatch(
  tree: TaxonomyTree,
  query: Vector,
  threshold: number,
  options: MatchOptions = {}
): MatchResult[] {
  assertSameSpace(tree, options);

  const scored: Array<{ path: Path; similarity: number }> = [];
  for (const leaf of tree.leaves) {
    const score = scoreCandidate(query, leaf.embedding, options.stats);
    if (score !== null) {
      scored.push({ path: leaf.path, similarity: score });
    }
  }

  if (scored.length === 0) return [];

  const ranks = percentileRanks(scored.map((entry) => entry.similarity));

  const results: MatchResult[] = [];
  scored.forEach((entry, i) => {
    const result = { path: [...entry.path], similarity: entry.similarity, rank: ranks[i] };
    if (combinedScore(result) >= threshold) {
      results.push(result);
    }
  });
  return results;
}
