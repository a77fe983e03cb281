export { blendEmbeddings } from './blend';
export { BedrockEmbeddingProvider } from './bedrock-provider';
export type { BedrockProviderOptions, ProviderUsage } from './bedrock-provider';
export { getEmbeddingProvider, clearProviderCache, modelSpec } from './registry';
export { invokeEmbeddingModel, mockEmbedding } from './bedrock-client';
export type { EmbeddingModelSpec, EmbeddingInput } from './bedrock-client';
