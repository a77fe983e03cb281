import { z } from 'zod';

// Outcome of tagging one item
export enum ProcessingStatus {
  COMPLETED = 'completed',
  FAILED = 'failed',
}

// Catalog item as scraped from a shop listing
export const CatalogItemSchema = z.object({
  item_id: z.string().min(1),
  image_url: z.string().url().optional(),
  page_url: z.string().url().optional(),
  title: z.string().optional(),
  brand: z.string().optional(),
  description: z.string().optional(),
  details: z.string().optional(),
  color: z.string().optional(),
});

export type CatalogItem = z.infer<typeof CatalogItemSchema>;

export type ItemTextField = 'title' | 'brand' | 'description' | 'details' | 'color';

// One percentile-ranked attribute match
export const AttributeTagSchema = z.object({
  value: z.string(),
  similarity: z.number(),
  rank: z.number().min(0).max(100),
});

export type AttributeTag = z.infer<typeof AttributeTagSchema>;

export const ItemTaggingResultSchema = z.object({
  item_id: z.string(),
  categories: z.array(z.string()),
  attributes: z.record(z.string()),
  attribute_tags: z.record(z.array(AttributeTagSchema)),
  skipped_comparisons: z.number(),
  unavailable: z.array(z.string()),
});

export type ItemTaggingResult = z.infer<typeof ItemTaggingResultSchema>;

// SQS message payload
export const SQSMessagePayloadSchema = z.object({
  items: z.array(CatalogItemSchema).min(1),
  cookie_source_url: z.string().url().optional(),
  attempt: z.number().default(1),
  trace_id: z.string().uuid(),
});

export type SQSMessagePayload = z.infer<typeof SQSMessagePayloadSchema>;
