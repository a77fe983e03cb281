import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient, PutCommand } from '@aws-sdk/lib-dynamodb';
import { loadConfig } from '../config';
import { ProcessingStatus } from '../types';
import { getLogger } from './logger';
import { toError } from './retry';

const logger = getLogger();

const RETENTION_SECONDS = 90 * 24 * 60 * 60;

// One row per tagged item
export interface TaggingMetrics {
  item_id: string;
  trace_id: string;
  category_model: string;
  attribute_model: string;
  processing_time_ms: number;
  embedding_calls: number;
  input_tokens: number;
  skipped_comparisons: number;
  unavailable_inputs: string[];
  status: ProcessingStatus;
  timestamp: string;
  error_type?: string;
}

/**
 * Writes per-item tagging metrics to DynamoDB. A failed write is logged
 * and swallowed so it never fails the tagging request.
 */
export class MetricsCollector {
  private readonly dynamoClient: DynamoDBDocumentClient;

  constructor(
    private readonly tableName: string,
    private readonly enabled: boolean = true,
    client: DynamoDBDocumentClient = DynamoDBDocumentClient.from(new DynamoDBClient({}))
  ) {
    this.dynamoClient = client;
  }

  async trackTagging(metrics: TaggingMetrics): Promise<void> {
    if (!this.enabled) return;

    try {
      await this.dynamoClient.send(
        new PutCommand({
          TableName: this.tableName,
          Item: {
            pk: `ITEM#${metrics.item_id}`,
            sk: `TAGGING#${metrics.timestamp}`,
            ...metrics,
            ttl: Math.floor(Date.now() / 1000) + RETENTION_SECONDS,
          },
        })
      );

      logger.debug('Tagging metrics tracked', {
        item_id: metrics.item_id,
        processing_time_ms: metrics.processing_time_ms,
        embedding_calls: metrics.embedding_calls,
        input_tokens: metrics.input_tokens,
      });
    } catch (error) {
      logger.warn('Failed to track tagging metrics', { item_id: metrics.item_id }, toError(error));
    }
  }
}

let metricsCollectorInstance: MetricsCollector | null = null;

export function getMetricsCollector(): MetricsCollector {
  if (!metricsCollectorInstance) {
    const config = loadConfig();
    metricsCollectorInstance = new MetricsCollector(config.metricsTableName, config.metricsEnabled);
  }
  return metricsCollectorInstance;
}
