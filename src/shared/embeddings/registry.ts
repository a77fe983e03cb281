import { BedrockRuntimeClient } from '@aws-sdk/client-bedrock-runtime';
import { AppConfig, loadConfig } from '../config';
import { EmbeddingModel } from '../types';
import { getCircuitBreaker } from '../utils/circuit-breaker';
import { EmbeddingModelSpec } from './bedrock-client';
import { BedrockEmbeddingProvider } from './bedrock-provider';

export function modelSpec(model: EmbeddingModel, config: AppConfig): EmbeddingModelSpec {
  switch (model) {
    case EmbeddingModel.BASELINE:
      return { model, modelId: config.baselineModelId, family: 'titan', dimensions: 1024 };
    case EmbeddingModel.FAST:
      return { model, modelId: config.fastModelId, family: 'titan', dimensions: 384 };
    case EmbeddingModel.MULTILINGUAL:
      return { model, modelId: config.multilingualModelId, family: 'cohere', dimensions: 1024 };
  }
}

// Resolved once per process, reused by every tree build and item
const providers = new Map<EmbeddingModel, BedrockEmbeddingProvider>();
let bedrockClient: BedrockRuntimeClient | null = null;

export function getEmbeddingProvider(
  model: EmbeddingModel,
  config: AppConfig = loadConfig()
): BedrockEmbeddingProvider {
  const cached = providers.get(model);
  if (cached) return cached;

  if (!bedrockClient) {
    bedrockClient = new BedrockRuntimeClient({ region: config.bedrockRegion });
  }

  const provider = new BedrockEmbeddingProvider(modelSpec(model, config), {
    client: bedrockClient,
    breaker: getCircuitBreaker('bedrock-embeddings', {
      failureThreshold: config.circuitBreakerThreshold,
      timeout: config.circuitBreakerTimeout,
    }),
    maxAttempts: config.maxRetries,
    httpTimeoutMs: config.httpTimeoutMs,
    mockEnabled: config.embeddingMockEnabled,
  });
  providers.set(model, provider);
  return provider;
}

export function clearProviderCache(): void {
  providers.clear();
  bedrockClient = null;
}
