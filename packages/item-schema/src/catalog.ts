import { z } from 'zod';

import { ItemSchemaError } from './errors.js';
import {
  expandItemDefinition,
  itemDefinitionSchema,
  type ItemDefinition,
  type NormalizedItem,
} from './modules/items.js';

export interface NormalizedItemCatalog {
  readonly items: readonly NormalizedItem[];
  readonly byId: ReadonlyMap<number, NormalizedItem>;
}

export type ItemCatalogSafeParseResult =
  | { readonly success: true; readonly data: NormalizedItemCatalog }
  | { readonly success: false; readonly error: ItemSchemaError };

export interface ItemCatalogValidator {
  parse(input: unknown): NormalizedItemCatalog;
  safeParse(input: unknown): ItemCatalogSafeParseResult;
}

type IdClaim = readonly (string | number)[];

const claimIds = (
  items: readonly ItemDefinition[],
  ctx: z.RefinementCtx,
): void => {
  const claims = new Map<number, IdClaim>();

  const claim = (id: number, path: IdClaim) => {
    const previous = claims.get(id);
    if (previous) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [...path],
        message: `Item id ${id} is already declared at ${previous.join('.')}.`,
      });
      return;
    }
    claims.set(id, path);
  };

  items.forEach((item, index) => {
    claim(item.id, ['items', index, 'id']);
    if (item.notedId !== undefined) {
      claim(item.notedId, ['items', index, 'notedId']);
    }
    if (item.placeholderId !== undefined) {
      claim(item.placeholderId, ['items', index, 'placeholderId']);
    }
  });
};

export const normalizeItemCatalog = (
  items: readonly ItemDefinition[],
): NormalizedItemCatalog => {
  const entries = items.flatMap((item) => expandItemDefinition(item));
  const byId = new Map<number, NormalizedItem>();
  for (const entry of entries) {
    byId.set(entry.id, entry);
  }
  return Object.freeze({
    items: Object.freeze(entries),
    byId,
  });
};

export const itemCatalogSchema = z
  .object({
    items: z.array(itemDefinitionSchema),
  })
  .strict()
  .superRefine((catalog, ctx) => claimIds(catalog.items, ctx))
  .transform((catalog) => normalizeItemCatalog(catalog.items));

export type ItemCatalogInput = z.input<typeof itemCatalogSchema>;

const toSchemaError = (error: z.ZodError): ItemSchemaError => {
  const [first] = error.issues;
  const location = first && first.path.length > 0 ? ` at ${first.path.join('.')}` : '';
  const detail = first ? `: ${first.message}${location}` : '';
  return new ItemSchemaError(
    `Item catalog validation failed${detail}`,
    error.issues,
  );
};

export const createItemCatalogValidator = (): ItemCatalogValidator => ({
  parse(input: unknown): NormalizedItemCatalog {
    const result = itemCatalogSchema.safeParse(input);
    if (!result.success) {
      throw toSchemaError(result.error);
    }
    return result.data;
  },
  safeParse(input: unknown): ItemCatalogSafeParseResult {
    const result = itemCatalogSchema.safeParse(input);
    if (result.success) {
      return { success: true, data: result.data };
    }
    return { success: false, error: toSchemaError(result.error) };
  },
});

export const parseItemCatalog = (input: unknown): NormalizedItemCatalog =>
  createItemCatalogValidator().parse(input);
