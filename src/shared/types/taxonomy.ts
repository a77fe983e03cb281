import { z } from 'zod';
import { EmbeddingModel, Vector } from './embedding';

// Raw label hierarchy as written in taxonomy-v1.json.
// An empty object is a leaf; an array lists leaf labels.
export type RawHierarchy = { [label: string]: RawHierarchy | string[] };

export const RawHierarchySchema: z.ZodType<RawHierarchy> = z.lazy(() =>
  z.record(z.union([RawHierarchySchema, z.array(z.string())]))
);

export const TaxonomyMetadataSchema = z.object({
  version: z.string(),
  generated_date: z.string(),
  description: z.string(),
});

export const TaxonomyFileSchema = z.object({
  metadata: TaxonomyMetadataSchema,
  categories: RawHierarchySchema,
  attributes: z.record(RawHierarchySchema),
});

export type TaxonomyFile = z.infer<typeof TaxonomyFileSchema>;

/** Labels from the root (exclusive) down to a node. */
export type Path = string[];

/**
 * 'label' embeds every node from its own label (greedy and best-leaf trees).
 * 'path' embeds leaves only, from the reversed label path (percentile trees).
 */
export type EmbeddingPolicy = 'label' | 'path';

export interface LeafNode {
  readonly kind: 'leaf';
  readonly label: string;
  readonly embedding: Vector | null;
}

export interface InternalNode {
  readonly kind: 'internal';
  readonly label: string;
  readonly embedding: Vector | null;
  readonly children: ReadonlyMap<string, TaxonomyNode>;
}

export type TaxonomyNode = InternalNode | LeafNode;

export interface LeafEntry {
  readonly path: Path;
  readonly embedding: Vector;
}

export interface TaxonomyTree {
  readonly root: InternalNode;
  readonly provider: EmbeddingModel;
  readonly policy: EmbeddingPolicy;
  /** Depth-first, child-insertion order; leaves without an embedding are left out */
  readonly leaves: readonly LeafEntry[];
  /** Nodes whose embedding the provider could not produce */
  readonly missing: readonly Path[];
}

export interface MatchResult {
  path: Path;
  similarity: number;
  /** Weak percentile rank (0-100) among all leaves searched */
  rank: number;
}

export interface MatchStats {
  skippedComparisons: number;
}

export interface MatchOptions {
  stats?: MatchStats;
  /** Model the query came from; rejected when it differs from the tree's */
  provider?: EmbeddingModel;
}
