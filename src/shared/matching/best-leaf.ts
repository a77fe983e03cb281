import { LeafEntry, MatchOptions, Path, TaxonomyTree, Vector } from '../types';
import { assertSameSpace, scoreCandidate } from './scoring';

/**
 * Path of the leaf most similar to the query across the whole tree. The first
 * leaf in depth-first order wins ties. Empty when no leaf can be scored.
 */
export function bestLeaf(tree: TaxonomyTree, query: Vector, options: MatchOptions = {}): Path {
  assertSameSpace(tree, options);

  let best: LeafEntry | null = null;
  let bestScore = -Infinity;

  for (const leaf of tree.leaves) {
    const score = scoreCandidate(query, leaf.embedding, options.stats);
    if (score === null) continue;

    if (best === null || score > bestScore) {
      best = leaf;
      bestScore = score;
    }
  }

  return best ? [...best.path] : [];
}
