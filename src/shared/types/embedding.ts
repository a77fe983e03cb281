import { z } from 'zod';

/**
 * Embedding model variants. Each one maps to a provider implementation
 * resolved once per process (see shared/embeddings/registry.ts).
 */
export enum EmbeddingModel {
  BASELINE = 'baseline',
  FAST = 'fast',
  MULTILINGUAL = 'multilingual',
}

export const EmbeddingModelSchema = z.nativeEnum(EmbeddingModel);

/** Fixed-length embedding. Never mutated once produced. */
export type Vector = readonly number[];

export interface ImageRef {
  url: string;
  cookies?: Record<string, string>;
}

/** Caller-owned counter; a provider adds the input tokens each call is billed for. */
export interface UsageTally {
  inputTokens: number;
}

/**
 * Turns text or an image into a vector. Provider failures (network, model,
 * malformed response) resolve to null instead of rejecting so callers can
 * skip the node or attribute.
 */
export interface EmbeddingProvider {
  readonly model: EmbeddingModel;
  readonly dimensions: number;
  embedText(text: string, tally?: UsageTally): Promise<Vector | null>;
  embedImage(ref: ImageRef, tally?: UsageTally): Promise<Vector | null>;
}
