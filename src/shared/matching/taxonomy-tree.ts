import {
  EmbeddingModel,
  EmbeddingPolicy,
  EmbeddingProvider,
  InternalNode,
  LeafEntry,
  LeafNode,
  Path,
  RawHierarchy,
  TaxonomyNode,
  TaxonomyTree,
  Vector,
} from '../types';
import { getLogger } from '../utils/logger';

const logger = getLogger();

export function leafNode(label: string, embedding: Vector | null): LeafNode {
  return { kind: 'leaf', label, embedding };
}

export function internalNode(
  label: string,
  children: readonly TaxonomyNode[],
  embedding: Vector | null = null
): InternalNode {
  const byLabel = new Map<string, TaxonomyNode>();
  for (const child of children) {
    if (!byLabel.has(child.label)) byLabel.set(child.label, child);
  }
  return { kind: 'internal', label, embedding, children: byLabel };
}

/**
 * Flattens the leaves that carry an embedding, depth-first in child
 * insertion order. This is the traversal order the exhaustive matchers
 * break ties on.
 */
export function collectLeaves(root: InternalNode): LeafEntry[] {
  const leaves: LeafEntry[] = [];

  const visit = (node: InternalNode, prefix: Path): void => {
    for (const [label, child] of node.children) {
      const path = [...prefix, label];
      if (child.kind === 'internal') {
        visit(child, path);
      } else if (child.embedding) {
        leaves.push({ path, embedding: child.embedding });
      }
    }
  };

  visit(root, []);
  return leaves;
}

/** Wraps an already-embedded root into a tree and indexes its leaves. */
export function createTree(
  root: InternalNode,
  provider: EmbeddingModel,
  policy: EmbeddingPolicy,
  missing: readonly Path[] = []
): TaxonomyTree {
  return { root, provider, policy, leaves: collectLeaves(root), missing };
}

/**
 * Text embedded for a leaf under the 'path' policy: the labels from the leaf
 * up to the root, framed as a photo caption.
 */
export function pathPhrase(path: Path): string {
  return `a photo of a ${[...path].reverse().join(' ').toLowerCase()}`.trim();
}

interface BuildContext {
  provider: EmbeddingProvider;
  policy: EmbeddingPolicy;
  missing: Path[];
}

/**
 * Embeds a raw label hierarchy. Nodes the provider cannot embed keep a null
 * embedding and are listed in `missing`; the build itself does not fail.
 */
export async function buildTree(
  raw: RawHierarchy,
  provider: EmbeddingProvider,
  policy: EmbeddingPolicy
): Promise<TaxonomyTree> {
  const startTime = Date.now();
  const context: BuildContext = { provider, policy, missing: [] };

  const children = await buildChildren(raw, [], context);
  const root: InternalNode = { kind: 'internal', label: '', embedding: null, children };
  const tree = createTree(root, provider.model, policy, context.missing);

  logger.debug('Taxonomy tree built', {
    provider: provider.model,
    policy,
    leaf_count: tree.leaves.length,
    missing_count: tree.missing.length,
    build_time_ms: Date.now() - startTime,
  });

  return tree;
}

async function buildChildren(
  raw: RawHierarchy | string[],
  parentPath: Path,
  context: BuildContext
): Promise<Map<string, TaxonomyNode>> {
  const entries: Array<[string, RawHierarchy | string[]]> = Array.isArray(raw)
    ? raw.map((label): [string, RawHierarchy] => [label, {}])
    : Object.entries(raw);

  const children = new Map<string, TaxonomyNode>();
  for (const [label, value] of entries) {
    if (children.has(label)) continue;
    children.set(label, await buildNode(label, value, [...parentPath, label], context));
  }
  return children;
}

async function buildNode(
  label: string,
  value: RawHierarchy | string[],
  path: Path,
  context: BuildContext
): Promise<TaxonomyNode> {
  const isLeaf = Array.isArray(value) ? value.length === 0 : Object.keys(value).length === 0;

  if (isLeaf) {
    const text = context.policy === 'label' ? label : pathPhrase(path);
    return leafNode(label, await embedNode(text, path, context));
  }

  // Parent first, so provider calls follow the same pre-order as matching
  const embedding = context.policy === 'label' ? await embedNode(label, path, context) : null;
  const children = await buildChildren(value, path, context);
  return { kind: 'internal', label, embedding, children };
}

async function embedNode(text: string, path: Path, context: BuildContext): Promise<Vector | null> {
  const embedding = await context.provider.embedText(text);
  if (!embedding) {
    context.missing.push(path);
  }
  return embedding;
}
