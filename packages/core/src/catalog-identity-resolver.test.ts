import { parseItemCatalog } from '@icon-dimmer/item-schema';
import { describe, expect, it } from 'vitest';

import {
  UnknownItemError,
  createCatalogIdentityResolver,
} from './catalog-identity-resolver.js';
import { NO_PLACEHOLDER_TEMPLATE } from './identity-resolver.js';

const catalog = parseItemCatalog({
  items: [
    { id: 100, name: 'Iron bar', tradable: true, notedId: 101, placeholderId: 102 },
    { id: 300, name: 'Ghostly robe' },
  ],
});

describe('createCatalogIdentityResolver', () => {
  it('canonicalizes variants to their base item', () => {
    const resolver = createCatalogIdentityResolver(catalog);

    expect(resolver.canonicalize(100)).toBe(100);
    expect(resolver.canonicalize(101)).toBe(100);
    expect(resolver.canonicalize(102)).toBe(100);
    expect(resolver.canonicalize(300)).toBe(300);
  });

  it('throws for ids outside the catalog', () => {
    const resolver = createCatalogIdentityResolver(catalog);

    expect(() => resolver.canonicalize(999)).toThrow(UnknownItemError);
    expect(() => resolver.canonicalize(999)).toThrow(
      'Item 999 is not present in the item catalog.',
    );
  });

  it('returns compositions and nothing for unknown ids', () => {
    const resolver = createCatalogIdentityResolver(catalog);

    expect(resolver.getComposition(101)).toMatchObject({
      tradable: true,
      placeholderTemplateId: NO_PLACEHOLDER_TEMPLATE,
      linkedNoteId: 100,
    });
    expect(resolver.getComposition(300)?.tradable).toBe(false);
    expect(resolver.getComposition(999)).toBeUndefined();
  });
});
