export {
  createItemCatalogValidator,
  itemCatalogSchema,
  normalizeItemCatalog,
  parseItemCatalog,
  type ItemCatalogInput,
  type ItemCatalogSafeParseResult,
  type ItemCatalogValidator,
  type NormalizedItemCatalog,
} from './catalog.js';

export { ItemSchemaError } from './errors.js';

export * from './base/numbers.js';
export * from './modules/items.js';
