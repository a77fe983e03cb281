import { BedrockRuntimeClient } from '@aws-sdk/client-bedrock-runtime';
import { EmbeddingModel, EmbeddingProvider, ImageRef, UsageTally, Vector } from '../types';
import { CircuitBreaker } from '../utils/circuit-breaker';
import { getLogger } from '../utils/logger';
import { retryWithBackoff, toError } from '../utils/retry';
import { FetchedImage, fetchImage } from '../utils/web-fetch';
import {
  EmbeddingInput,
  EmbeddingModelSpec,
  invokeEmbeddingModel,
  mockEmbedding,
} from './bedrock-client';

const logger = getLogger();

export interface BedrockProviderOptions {
  client: BedrockRuntimeClient;
  breaker: CircuitBreaker;
  maxAttempts: number;
  httpTimeoutMs: number;
  /** Skip Bedrock and image downloads; return seeded vectors instead */
  mockEnabled: boolean;
}

export interface ProviderUsage {
  textCalls: number;
  imageCalls: number;
  inputTokens: number;
  failures: number;
}

/**
 * EmbeddingProvider backed by one Bedrock embedding model. Every failure
 * (download, throttling after retries, open circuit, malformed response) is
 * logged and turned into a null vector.
 */
export class BedrockEmbeddingProvider implements EmbeddingProvider {
  private readonly usage: ProviderUsage = { textCalls: 0, imageCalls: 0, inputTokens: 0, failures: 0 };

  constructor(
    private readonly spec: EmbeddingModelSpec,
    private readonly options: BedrockProviderOptions
  ) {}

  get model(): EmbeddingModel {
    return this.spec.model;
  }

  get dimensions(): number {
    return this.spec.dimensions;
  }

  async embedText(text: string, tally?: UsageTally): Promise<Vector | null> {
    this.usage.textCalls++;
    if (this.options.mockEnabled) {
      return mockEmbedding(`${this.spec.model}:text:${text}`, this.spec.dimensions);
    }
    return this.embed({ kind: 'text', text }, { text_length: text.length }, tally);
  }

  async embedImage(ref: ImageRef, tally?: UsageTally): Promise<Vector | null> {
    this.usage.imageCalls++;
    if (this.options.mockEnabled) {
      return mockEmbedding(`${this.spec.model}:image:${ref.url}`, this.spec.dimensions);
    }

    let image: FetchedImage;
    try {
      image = await fetchImage(ref, this.options.httpTimeoutMs);
    } catch (error) {
      this.usage.failures++;
      logger.warn('Image download failed, image embedding unavailable', { image_url: ref.url }, toError(error));
      return null;
    }

    return this.embed({ kind: 'image', ...image }, { image_url: ref.url }, tally);
  }

  getUsage(): ProviderUsage {
    return { ...this.usage };
  }

  private async embed(
    input: EmbeddingInput,
    context: Record<string, unknown>,
    tally?: UsageTally
  ): Promise<Vector | null> {
    try {
      const result = await this.options.breaker.execute(() =>
        retryWithBackoff(
          () => invokeEmbeddingModel(this.options.client, this.spec, input),
          { maxAttempts: this.options.maxAttempts },
          { ...context, model: this.spec.model, model_id: this.spec.modelId }
        )
      );
      this.usage.inputTokens += result.inputTokens;
      if (tally) tally.inputTokens += result.inputTokens;
      return result.embedding;
    } catch (error) {
      this.usage.failures++;
      logger.warn(
        'Embedding unavailable',
        { ...context, model: this.spec.model, input_kind: input.kind },
        toError(error)
      );
      return null;
    }
  }
}
