import { buildItemText, FULL_TEXT_FIELDS, prepareCatalogItems, SHORT_TEXT_FIELDS } from '../catalog';
import { CatalogItem } from '../../../shared/types';

const item = (overrides: Partial<CatalogItem> & { item_id: string }): CatalogItem => ({
  image_url: `https://cdn.shop.test/${overrides.item_id}.jpg`,
  page_url: `https://shop.test/p/${overrides.item_id}`,
  ...overrides,
});

describe('prepareCatalogItems', () => {
  it('drops items without an image or page URL', () => {
    const items: CatalogItem[] = [
      item({ item_id: 'a' }),
      { item_id: 'b', page_url: 'https://shop.test/p/b' },
      { item_id: 'c', image_url: 'https://cdn.shop.test/c.jpg' },
    ];

    expect(prepareCatalogItems(items).map((i) => i.item_id)).toEqual(['a']);
  });

  it('keeps the most complete item per page', () => {
    const page = 'https://shop.test/p/shared';
    const items: CatalogItem[] = [
      item({ item_id: 'sparse', page_url: page, title: 'Linen shirt' }),
      item({ item_id: 'rich', page_url: page, title: 'Linen shirt', brand: 'Acme', color: 'white' }),
    ];

    expect(prepareCatalogItems(items).map((i) => i.item_id)).toEqual(['rich']);
  });

  it('keeps the earliest item when completeness ties', () => {
    const page = 'https://shop.test/p/shared';
    const items: CatalogItem[] = [
      item({ item_id: 'first', page_url: page, title: 'Scarf' }),
      item({ item_id: 'second', page_url: page, brand: 'Acme' }),
    ];

    expect(prepareCatalogItems(items).map((i) => i.item_id)).toEqual(['first']);
  });

  it('orders the result by completeness, most complete first', () => {
    const items: CatalogItem[] = [
      item({ item_id: 'one' }),
      item({ item_id: 'three', title: 'Boots', brand: 'Acme', color: 'black' }),
      item({ item_id: 'two', title: 'Belt' }),
    ];

    expect(prepareCatalogItems(items).map((i) => i.item_id)).toEqual(['three', 'two', 'one']);
  });

  it('does not count blank fields', () => {
    const items: CatalogItem[] = [
      item({ item_id: 'blank', title: '   ', brand: '' }),
      item({ item_id: 'titled', title: 'Cap' }),
    ];

    expect(prepareCatalogItems(items).map((i) => i.item_id)).toEqual(['titled', 'blank']);
  });
});

describe('buildItemText', () => {
  const shirt = item({
    item_id: 'shirt',
    title: ' Striped shirt ',
    brand: 'Acme',
    description: '',
    details: '100% cotton',
    color: 'blue',
  });

  it('joins the trimmed non-empty fields with single spaces', () => {
    expect(buildItemText(shirt, FULL_TEXT_FIELDS)).toBe('Striped shirt Acme 100% cotton blue');
  });

  it('uses only the requested fields, in order', () => {
    expect(buildItemText(shirt, SHORT_TEXT_FIELDS)).toBe('Striped shirt Acme');
    expect(buildItemText(shirt, ['color', 'title'])).toBe('blue Striped shirt');
  });

  it('returns an empty string when no field has text', () => {
    expect(buildItemText(item({ item_id: 'bare' }), FULL_TEXT_FIELDS)).toBe('');
  });
});
