import { AppConfig, loadConfig } from '../../shared/config';
import { getEmbeddingProvider } from '../../shared/embeddings';
import { buildTree } from '../../shared/matching';
import { ProcessingError, TaxonomyTree } from '../../shared/types';
import { getLogger } from '../../shared/utils/logger';
import { getAttributeHierarchies, getCategoryHierarchy } from '../../shared/utils/taxonomy-loader';

const logger = getLogger();

export interface TaxonomyTrees {
  /** Label-embedded, matched greedily */
  categories: TaxonomyTree;
  /** Path-embedded, one per attribute, in taxonomy file order */
  attributes: ReadonlyMap<string, TaxonomyTree>;
}

// Built once per cold start. A failed or partial build is redone on the next call.
let treesPromise: Promise<TaxonomyTrees> | null = null;

function logMissing(taxonomy: string, tree: TaxonomyTree): void {
  for (const path of tree.missing) {
    logger.warn('Taxonomy node has no embedding and will not be matched', {
      taxonomy,
      path: path.join(' > '),
      provider: tree.provider,
    });
  }
}

async function buildTaxonomyTrees(config: AppConfig): Promise<TaxonomyTrees> {
  const startTime = Date.now();
  const categoryProvider = getEmbeddingProvider(config.categoryModel, config);
  const attributeProvider = getEmbeddingProvider(config.attributeModel, config);

  const categories = await buildTree(getCategoryHierarchy(), categoryProvider, 'label');
  logMissing('categories', categories);

  const attributes = new Map<string, TaxonomyTree>();
  for (const [name, hierarchy] of Object.entries(getAttributeHierarchies())) {
    const tree = await buildTree(hierarchy, attributeProvider, 'path');
    logMissing(name, tree);
    attributes.set(name, tree);
  }

  const trees = { categories, attributes };
  const unusable = [...namedTrees(trees)].filter(([, tree]) => tree.leaves.length === 0).map(([name]) => name);
  if (unusable.length > 0) {
    throw new ProcessingError('Taxonomy trees have no embedded leaves', true, { taxonomies: unusable });
  }

  logger.info('Taxonomy trees ready', {
    category_leaves: categories.leaves.length,
    attributes: [...attributes.keys()],
    missing_nodes: missingCount(trees),
    build_time_ms: Date.now() - startTime,
  });

  return trees;
}

function* namedTrees(trees: TaxonomyTrees): Iterable<[string, TaxonomyTree]> {
  yield ['categories', trees.categories];
  yield* trees.attributes;
}

function missingCount(trees: TaxonomyTrees): number {
  let count = 0;
  for (const [, tree] of namedTrees(trees)) count += tree.missing.length;
  return count;
}

/**
 * Trees shared by every record of the container. A build where a whole
 * taxonomy came back without leaves rejects; one with some missing nodes is
 * used for the current call and not kept, so a provider outage during the
 * cold start does not outlive it.
 */
export function getTaxonomyTrees(config: AppConfig = loadConfig()): Promise<TaxonomyTrees> {
  if (!treesPromise) {
    const pending = buildTaxonomyTrees(config).then(
      (trees) => {
        if (missingCount(trees) > 0 && treesPromise === pending) {
          treesPromise = null;
        }
        return trees;
      },
      (error: unknown) => {
        if (treesPromise === pending) {
          treesPromise = null;
        }
        throw error;
      }
    );
    treesPromise = pending;
  }
  return treesPromise;
}

export function clearTreeCache(): void {
  treesPromise = null;
}
