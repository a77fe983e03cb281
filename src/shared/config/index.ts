import { EmbeddingModel, EmbeddingModelSchema } from '../types/embedding';

// Environment configuration with validation
export interface AppConfig {
  // AWS Region
  region: string;

  // DynamoDB
  itemTagsTableName: string;

  // Bedrock embedding models, one per provider variant
  bedrockRegion: string;
  baselineModelId: string;
  fastModelId: string;
  multilingualModelId: string;

  // Which provider embeds which taxonomy
  categoryModel: EmbeddingModel;
  attributeModel: EmbeddingModel;

  // Percentile-weighted score an attribute tag must reach
  attributeThreshold: number;

  // Taxonomy source
  taxonomyPath: string;

  // Processing limits
  maxRetries: number;
  httpTimeoutMs: number;

  // Circuit breaker settings
  circuitBreakerThreshold: number;
  circuitBreakerTimeout: number;

  // Metrics
  metricsEnabled: boolean;
  metricsTableName: string;

  // Feature flags
  embeddingMockEnabled: boolean;
}

function parseEmbeddingModel(value: string | undefined, fallback: EmbeddingModel): EmbeddingModel {
  if (!value) return fallback;
  const parsed = EmbeddingModelSchema.safeParse(value);
  if (!parsed.success) {
    throw new Error(
      `Unknown embedding model "${value}". Expected one of: ${Object.values(EmbeddingModel).join(', ')}`
    );
  }
  return parsed.data;
}

// Load config from environment with defaults
export function loadConfig(): AppConfig {
  return {
    region: process.env.AWS_REGION || 'us-east-1',

    // DynamoDB
    itemTagsTableName: process.env.ITEM_TAGS_TABLE_NAME || 'item-tags',

    // Bedrock - Titan multimodal for both image and text, Cohere for multilingual text
    bedrockRegion: process.env.BEDROCK_REGION || 'us-east-1',
    baselineModelId: process.env.BASELINE_MODEL_ID || 'amazon.titan-embed-image-v1',
    fastModelId: process.env.FAST_MODEL_ID || 'amazon.titan-embed-image-v1',
    multilingualModelId: process.env.MULTILINGUAL_MODEL_ID || 'cohere.embed-multilingual-v3',

    categoryModel: parseEmbeddingModel(process.env.CATEGORY_MODEL, EmbeddingModel.BASELINE),
    attributeModel: parseEmbeddingModel(process.env.ATTRIBUTE_MODEL, EmbeddingModel.FAST),

    attributeThreshold: parseFloat(process.env.ATTRIBUTE_THRESHOLD || '0.25'),

    taxonomyPath: process.env.TAXONOMY_PATH || '',

    // Processing limits
    maxRetries: parseInt(process.env.MAX_RETRIES || '3', 10),
    httpTimeoutMs: parseInt(process.env.HTTP_TIMEOUT_MS || '15000', 10),

    // Circuit breaker - open after 5 failures, reset after 60s
    circuitBreakerThreshold: parseInt(process.env.CIRCUIT_BREAKER_THRESHOLD || '5', 10),
    circuitBreakerTimeout: parseInt(process.env.CIRCUIT_BREAKER_TIMEOUT || '60000', 10),

    // Metrics
    metricsEnabled: process.env.METRICS_ENABLED === 'true',
    metricsTableName: process.env.METRICS_TABLE_NAME || 'tagging-metrics',

    // Feature flags
    embeddingMockEnabled: process.env.EMBEDDING_MOCK_ENABLED === 'true',
  };
}

// Validate required config on startup
export function validateConfig(config: AppConfig): void {
  const required: Array<keyof AppConfig> = ['itemTagsTableName', 'bedrockRegion'];

  const missing = required.filter((key) => !config[key]);

  if (missing.length > 0) {
    throw new Error(`Missing required configuration: ${missing.join(', ')}`);
  }

  if (!Number.isFinite(config.attributeThreshold)) {
    throw new Error('ATTRIBUTE_THRESHOLD must be a number');
  }
}
