import { InternalNode, MatchOptions, Path, TaxonomyNode, TaxonomyTree, Vector } from '../types';
import { assertSameSpace, scoreCandidate } from './scoring';

/**
 * Walks down from the root, at each level taking the immediate child most
 * similar to the query. Children without an embedding are not candidates.
 * Ties keep the earlier child. Never backtracks.
 *
 * Returns the labels of every node taken; stops at a leaf, or early with the
 * prefix matched so far when no child of the current node can be scored.
 */
export function greedyMatch(tree: TaxonomyTree, query: Vector, options: MatchOptions = {}): Path {
  assertSameSpace(tree, options);

  const path: Path = [];
  let node: InternalNode = tree.root;

  for (;;) {
    const next = bestChild(node, query, options);
    if (!next) return path;

    path.push(next.label);
    if (next.child.kind === 'leaf') return path;
    node = next.child;
  }
}

function bestChild(
  node: InternalNode,
  query: Vector,
  options: MatchOptions
): { label: string; child: TaxonomyNode } | null {
  let best: { label: string; child: TaxonomyNode } | null = null;
  let bestScore = -Infinity;

  for (const [label, child] of node.children) {
    if (!child.embedding) continue;

    const score = scoreCandidate(query, child.embedding, options.stats);
    if (score === null) continue;

    if (best === null || score > bestScore) {
      best = { label, child };
      bestScore = score;
    }
  }

  return best;
}
