import { CatalogItem, ItemTextField } from '../../shared/types';

/** Fields embedded for attribute matching */
export const SHORT_TEXT_FIELDS: readonly ItemTextField[] = ['title', 'brand'];

/** Fields embedded for category matching */
export const FULL_TEXT_FIELDS: readonly ItemTextField[] = ['title', 'brand', 'description', 'details', 'color'];

/** A catalog item that can be tagged: it has both an image and a page. */
export type TaggableItem = CatalogItem & { image_url: string; page_url: string };

function isTaggable(item: CatalogItem): item is TaggableItem {
  return Boolean(item.image_url) && Boolean(item.page_url);
}

function completeness(item: CatalogItem): number {
  return Object.values(item).filter((value) => typeof value === 'string' && value.trim() !== '').length;
}

/**
 * Drops items without an image or page URL and keeps one item per page,
 * the most complete one (earliest on ties). Most complete items come first.
 */
export function prepareCatalogItems(items: readonly CatalogItem[]): TaggableItem[] {
  const ranked = items
    .filter(isTaggable)
    .map((item, index) => ({ item, index, score: completeness(item) }))
    .sort((a, b) => b.score - a.score || a.index - b.index);

  const seenPages = new Set<string>();
  const kept: TaggableItem[] = [];
  for (const { item } of ranked) {
    if (seenPages.has(item.page_url)) continue;
    seenPages.add(item.page_url);
    kept.push(item);
  }
  return kept;
}

export function buildItemText(item: CatalogItem, fields: readonly ItemTextField[]): string {
  return fields
    .map((field) => item[field]?.trim() ?? '')
    .filter((value) => value !== '')
    .join(' ');
}
