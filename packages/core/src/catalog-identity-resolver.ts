import type { NormalizedItemCatalog } from '@icon-dimmer/item-schema';

import type { IdentityResolver } from './identity-resolver.js';

export class UnknownItemError extends Error {
  constructor(readonly itemId: number) {
    super(`Item ${itemId} is not present in the item catalog.`);
    this.name = 'UnknownItemError';
  }
}

/**
 * Identity resolver backed by a validated item catalog. Noted and placeholder
 * ids canonicalize to their base item; ids outside the catalog fail.
 */
export function createCatalogIdentityResolver(
  catalog: NormalizedItemCatalog,
): IdentityResolver {
  return {
    canonicalize(rawItemId) {
      const entry = catalog.byId.get(rawItemId);
      if (!entry) {
        throw new UnknownItemError(rawItemId);
      }
      return entry.canonicalId;
    },
    getComposition(itemId) {
      return catalog.byId.get(itemId);
    },
  };
}
