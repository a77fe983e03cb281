import { Context, SQSBatchItemFailure, SQSBatchResponse, SQSEvent, SQSRecord } from 'aws-lambda';
import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient, PutCommand } from '@aws-sdk/lib-dynamodb';
import { loadConfig, validateConfig } from '../../shared/config';
import { getEmbeddingProvider } from '../../shared/embeddings';
import {
  ItemTaggingResult,
  ProcessingError,
  ProcessingStatus,
  SQSMessagePayload,
  SQSMessagePayloadSchema,
  ValidationError,
} from '../../shared/types';
import {
  getCookies,
  getLogger,
  getMetricsCollector,
  Logger,
  setLambdaContext,
  toError,
} from '../../shared/utils';
import { getTaxonomy } from '../../shared/utils/taxonomy-loader';
import { prepareCatalogItems, TaggableItem } from './catalog';
import { tagItem, TaggingContext } from './tagger';
import { getTaxonomyTrees } from './trees';

const logger = getLogger();
const config = loadConfig();
validateConfig(config);

const dynamoClient = DynamoDBDocumentClient.from(new DynamoDBClient({}));
const metricsCollector = getMetricsCollector();

const RETENTION_SECONDS = 365 * 24 * 60 * 60;

/**
 * Item Tagger Lambda: SQS entry point
 *
 * Each record carries a batch of scraped catalog items. Items are
 * de-duplicated, embedded with the category and attribute models, matched
 * against the taxonomy trees and stored in the item-tags table. Records are
 * independent: only the records with a failed item are returned for
 * redelivery.
 */
export const handler = async (event: SQSEvent, context: Context): Promise<SQSBatchResponse> => {
  setLambdaContext(context.awsRequestId, context.functionName, context.functionVersion);

  logger.info('Item tagger started', {
    record_count: event.Records.length,
  });

  const results = await Promise.allSettled(event.Records.map((record) => processRecord(record)));

  const batchItemFailures: SQSBatchItemFailure[] = [];
  results.forEach((result, i) => {
    if (result.status === 'rejected') {
      batchItemFailures.push({ itemIdentifier: event.Records[i].messageId });
    }
  });

  logger.info('Item tagger completed', {
    total: results.length,
    successful: results.length - batchItemFailures.length,
    failed: batchItemFailures.length,
    category_usage: getEmbeddingProvider(config.categoryModel, config).getUsage(),
    attribute_usage: getEmbeddingProvider(config.attributeModel, config).getUsage(),
  });

  return { batchItemFailures };
};

function parsePayload(body: string): SQSMessagePayload {
  let raw: unknown;
  try {
    raw = JSON.parse(body);
  } catch (error) {
    throw new ValidationError('SQS message body is not valid JSON', String(error));
  }

  const parsed = SQSMessagePayloadSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError('Invalid SQS message payload', parsed.error.issues);
  }
  return parsed.data;
}

async function processRecord(record: SQSRecord): Promise<void> {
  const startTime = Date.now();
  // Records run concurrently; each gets its own logger context
  const recordLogger = logger.child({ message_id: record.messageId });

  try {
    const payload = parsePayload(record.body);

    recordLogger.setContext({
      trace_id: payload.trace_id,
      attempt: payload.attempt,
    });

    const items = prepareCatalogItems(payload.items);
    recordLogger.info('Processing catalog batch', {
      received: payload.items.length,
      taggable: items.length,
    });

    const taggingContext: TaggingContext = {
      trees: await getTaxonomyTrees(config),
      categoryProvider: getEmbeddingProvider(config.categoryModel, config),
      attributeProvider: getEmbeddingProvider(config.attributeModel, config),
      attributeThreshold: config.attributeThreshold,
      cookies: await resolveCookies(payload.cookie_source_url, recordLogger),
    };

    const outcomes = await Promise.allSettled(
      items.map((item) => processItem(item, taggingContext, payload.trace_id, recordLogger))
    );

    const failedItems = items
      .filter((_item, i) => outcomes[i].status === 'rejected')
      .map((item) => item.item_id);

    if (failedItems.length > 0) {
      throw new ProcessingError(`${failedItems.length} of ${items.length} items failed`, true, {
        failed_items: failedItems,
      });
    }

    recordLogger.info('Catalog batch processed successfully', {
      item_count: items.length,
      processing_time_ms: Date.now() - startTime,
    });
  } catch (error) {
    recordLogger.error(
      'Failed to process catalog batch',
      { processing_time_ms: Date.now() - startTime },
      toError(error)
    );
    throw error;
  }
}

async function resolveCookies(
  url: string | undefined,
  recordLogger: Logger
): Promise<Record<string, string> | undefined> {
  if (!url) return undefined;

  try {
    return await getCookies(url, config.httpTimeoutMs);
  } catch (error) {
    recordLogger.warn(
      'Cookie fetch failed, downloading images without cookies',
      { cookie_source_url: url },
      toError(error)
    );
    return undefined;
  }
}

async function processItem(
  item: TaggableItem,
  context: TaggingContext,
  traceId: string,
  recordLogger: Logger
): Promise<void> {
  const startTime = Date.now();
  const itemLogger = recordLogger.child({ item_id: item.item_id });

  try {
    const { result, embeddingCalls, inputTokens } = await tagItem(item, context);

    if (result.unavailable.length > 0) {
      itemLogger.warn('Item tagged with missing embeddings', { unavailable: result.unavailable });
    }
    if (result.skipped_comparisons > 0) {
      itemLogger.warn('Comparisons skipped on dimension mismatch', {
        skipped_comparisons: result.skipped_comparisons,
      });
    }

    await storeResult(result, traceId, startTime);
    await metricsCollector.trackTagging({
      item_id: item.item_id,
      trace_id: traceId,
      category_model: config.categoryModel,
      attribute_model: config.attributeModel,
      processing_time_ms: Date.now() - startTime,
      embedding_calls: embeddingCalls,
      input_tokens: inputTokens,
      skipped_comparisons: result.skipped_comparisons,
      unavailable_inputs: result.unavailable,
      status: ProcessingStatus.COMPLETED,
      timestamp: new Date().toISOString(),
    });

    itemLogger.debug('Item tagged', {
      categories: result.categories,
      attribute_count: Object.keys(result.attributes).length,
    });
  } catch (error) {
    const err = toError(error);
    itemLogger.error('Failed to tag item', {}, err);

    await metricsCollector.trackTagging({
      item_id: item.item_id,
      trace_id: traceId,
      category_model: config.categoryModel,
      attribute_model: config.attributeModel,
      processing_time_ms: Date.now() - startTime,
      embedding_calls: 0,
      input_tokens: 0,
      skipped_comparisons: 0,
      unavailable_inputs: [],
      status: ProcessingStatus.FAILED,
      timestamp: new Date().toISOString(),
      error_type: err.name,
    });

    throw err;
  }
}

async function storeResult(result: ItemTaggingResult, traceId: string, startTime: number): Promise<void> {
  const now = new Date().toISOString();

  await dynamoClient.send(
    new PutCommand({
      TableName: config.itemTagsTableName,
      Item: {
        ...result,
        status: ProcessingStatus.COMPLETED,
        trace_id: traceId,
        processing_metadata: {
          category_model: config.categoryModel,
          attribute_model: config.attributeModel,
          attribute_threshold: config.attributeThreshold,
          taxonomy_version: getTaxonomy().metadata.version,
          processing_time_ms: Date.now() - startTime,
        },
        created_at: now,
        updated_at: now,
        ttl: Math.floor(Date.now() / 1000) + RETENTION_SECONDS,
      },
    })
  );
}
