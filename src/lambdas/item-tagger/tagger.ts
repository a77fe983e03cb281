/**
 * Tags one catalog item: a category path from the category tree and, per
 * attribute, the best leaf plus every leaf that clears the percentile-weighted
 * threshold.
 *
 * Each taxonomy is queried with a blend of the item's image and text
 * embeddings from that taxonomy's model. Inputs the provider cannot embed are
 * reported in `unavailable`; with no input left the taxonomy is not matched.
 */

import { blendEmbeddings } from '../../shared/embeddings';
import { bestLeaf, combinedScore, greedyMatch, multiMatch } from '../../shared/matching';
import {
  AttributeTag,
  EmbeddingProvider,
  ImageRef,
  ItemTaggingResult,
  MatchStats,
  UsageTally,
  Vector,
} from '../../shared/types';
import { buildItemText, FULL_TEXT_FIELDS, SHORT_TEXT_FIELDS, TaggableItem } from './catalog';
import { TaxonomyTrees } from './trees';

export interface TaggingContext {
  trees: TaxonomyTrees;
  categoryProvider: EmbeddingProvider;
  attributeProvider: EmbeddingProvider;
  attributeThreshold: number;
  cookies?: Record<string, string>;
}

export interface TaggingOutcome {
  result: ItemTaggingResult;
  embeddingCalls: number;
  /** Billed input tokens of this item's embedding calls */
  inputTokens: number;
}

type EmbeddingInputName = 'category_image' | 'category_text' | 'attribute_image' | 'attribute_text';

export async function tagItem(item: TaggableItem, context: TaggingContext): Promise<TaggingOutcome> {
  const { trees, categoryProvider, attributeProvider } = context;
  const unavailable: EmbeddingInputName[] = [];
  const tally: UsageTally = { inputTokens: 0 };
  let embeddingCalls = 0;

  const embed = async (
    name: EmbeddingInputName,
    call: (() => Promise<Vector | null>) | null
  ): Promise<Vector | null> => {
    const vector = call ? await call() : null;
    if (call) embeddingCalls++;
    if (vector === null) unavailable.push(name);
    return vector;
  };

  const image: ImageRef = { url: item.image_url, cookies: context.cookies };
  const shortText = buildItemText(item, SHORT_TEXT_FIELDS);
  const fullText = buildItemText(item, FULL_TEXT_FIELDS);

  const categoryQuery = blendEmbeddings([
    await embed('category_image', () => categoryProvider.embedImage(image, tally)),
    await embed('category_text', fullText ? () => categoryProvider.embedText(fullText, tally) : null),
  ]);
  const attributeQuery = blendEmbeddings([
    await embed('attribute_image', () => attributeProvider.embedImage(image, tally)),
    await embed('attribute_text', shortText ? () => attributeProvider.embedText(shortText, tally) : null),
  ]);

  const stats: MatchStats = { skippedComparisons: 0 };

  const categories = categoryQuery
    ? greedyMatch(trees.categories, categoryQuery, { stats, provider: categoryProvider.model })
    : [];

  const attributes: Record<string, string> = {};
  const attributeTags: Record<string, AttributeTag[]> = {};

  if (attributeQuery) {
    const options = { stats, provider: attributeProvider.model };
    for (const [name, tree] of trees.attributes) {
      const best = bestLeaf(tree, attributeQuery, options);
      if (best.length > 0) {
        attributes[name] = best.join(' ').trim();
      }

      attributeTags[name] = multiMatch(tree, attributeQuery, context.attributeThreshold, options)
        .sort((a, b) => combinedScore(b) - combinedScore(a))
        .map((match) => ({
          value: match.path.join(' ').trim(),
          similarity: match.similarity,
          rank: match.rank,
        }));
    }
  }

  return {
    result: {
      item_id: item.item_id,
      categories,
      attributes,
      attribute_tags: attributeTags,
      skipped_comparisons: stats.skippedComparisons,
      unavailable,
    },
    embeddingCalls,
    inputTokens: tally.inputTokens,
  };
}
