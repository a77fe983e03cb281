/**
 * Bedrock client for embedding models.
 *
 * Responsibilities:
 *  - Build the InvokeModel request body for each model family
 *  - Validate the response body and the vector length
 */

import { BedrockRuntimeClient, InvokeModelCommand } from '@aws-sdk/client-bedrock-runtime';
import { z } from 'zod';
import { EmbeddingModel, ProcessingError, Vector } from '../types';
import { getLogger } from '../utils/logger';

const logger = getLogger();

export type ModelFamily = 'titan' | 'cohere';

export interface EmbeddingModelSpec {
  model: EmbeddingModel;
  modelId: string;
  family: ModelFamily;
  dimensions: number;
}

export type EmbeddingInput =
  | { kind: 'text'; text: string }
  | { kind: 'image'; base64: string; contentType: string };

export interface EmbeddingResult {
  embedding: Vector;
  inputTokens: number;
}

const TitanResponseSchema = z.object({
  embedding: z.array(z.number()),
  inputTextTokenCount: z.number().optional(),
});

const CohereResponseSchema = z.object({
  embeddings: z.array(z.array(z.number())).min(1),
});

export function buildRequestBody(spec: EmbeddingModelSpec, input: EmbeddingInput): Record<string, unknown> {
  if (spec.family === 'titan') {
    const embeddingConfig = { outputEmbeddingLength: spec.dimensions };
    return input.kind === 'text'
      ? { inputText: input.text, embeddingConfig }
      : { inputImage: input.base64, embeddingConfig };
  }

  return input.kind === 'text'
    ? { texts: [input.text], input_type: 'search_document', truncate: 'END' }
    : { images: [`data:${input.contentType};base64,${input.base64}`], input_type: 'image' };
}

export function parseResponseBody(spec: EmbeddingModelSpec, body: unknown): EmbeddingResult {
  let result: EmbeddingResult;

  if (spec.family === 'titan') {
    const parsed = TitanResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ProcessingError(`Unexpected ${spec.modelId} response`, false, parsed.error.issues);
    }
    result = { embedding: parsed.data.embedding, inputTokens: parsed.data.inputTextTokenCount ?? 0 };
  } else {
    const parsed = CohereResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ProcessingError(`Unexpected ${spec.modelId} response`, false, parsed.error.issues);
    }
    result = { embedding: parsed.data.embeddings[0], inputTokens: 0 };
  }

  if (result.embedding.length !== spec.dimensions) {
    throw new ProcessingError(
      `${spec.modelId} returned ${result.embedding.length} dimensions, expected ${spec.dimensions}`,
      false
    );
  }
  return result;
}

/**
 * Embed one text or image with the model described by `spec`.
 * Errors from the SDK (throttling, model not ready) propagate untouched so
 * the caller's retry policy can classify them.
 */
export async function invokeEmbeddingModel(
  client: BedrockRuntimeClient,
  spec: EmbeddingModelSpec,
  input: EmbeddingInput
): Promise<EmbeddingResult> {
  const command = new InvokeModelCommand({
    modelId: spec.modelId,
    contentType: 'application/json',
    accept: 'application/json',
    body: JSON.stringify(buildRequestBody(spec, input)),
  });

  const response = await client.send(command);
  const body: unknown = JSON.parse(new TextDecoder().decode(response.body));
  const result = parseResponseBody(spec, body);

  logger.debug('Bedrock embedding received', {
    model_id: spec.modelId,
    input_kind: input.kind,
    dimensions: result.embedding.length,
    input_tokens: result.inputTokens,
  });

  return result;
}

/**
 * Deterministic stand-in vector for mock mode: unit length, seeded from the
 * input so equal inputs embed identically.
 */
export function mockEmbedding(seed: string, dimensions: number): Vector {
  // FNV-1a
  let hash = 0x811c9dc5;
  for (let i = 0; i < seed.length; i++) {
    hash ^= seed.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }

  let state = hash >>> 0;
  const next = (): number => {
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };

  const values = Array.from({ length: dimensions }, () => next() * 2 - 1);
  const norm = Math.sqrt(values.reduce((sum, v) => sum + v * v, 0)) || 1;
  return values.map((v) => v / norm);
}
