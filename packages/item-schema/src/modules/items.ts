import { z } from 'zod';

import { itemIdSchema } from '../base/numbers.js';

/**
 * Template id carried by every bank placeholder composition. Base and noted
 * items report {@link NO_PLACEHOLDER_TEMPLATE} instead.
 */
export const PLACEHOLDER_TEMPLATE_ID = 14401;
export const NO_PLACEHOLDER_TEMPLATE = -1;
export const NO_LINKED_ITEM = -1;

const itemNameSchema = z
  .string()
  .trim()
  .min(1, { message: 'Item names must contain at least one character.' })
  .max(80, { message: 'Item names must contain at most 80 characters.' });

export const itemDefinitionSchema = z
  .object({
    id: itemIdSchema,
    name: itemNameSchema,
    tradable: z.boolean().default(false),
    notedId: itemIdSchema.optional(),
    placeholderId: itemIdSchema.optional(),
  })
  .strict()
  .superRefine((item, ctx) => {
    if (item.notedId !== undefined && item.notedId === item.id) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['notedId'],
        message: `Item ${item.id} cannot be its own noted form.`,
      });
    }
    if (item.placeholderId !== undefined && item.placeholderId === item.id) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['placeholderId'],
        message: `Item ${item.id} cannot be its own placeholder.`,
      });
    }
    if (
      item.notedId !== undefined &&
      item.placeholderId !== undefined &&
      item.notedId === item.placeholderId
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['placeholderId'],
        message: `Item ${item.id} uses ${item.placeholderId} for both its noted form and its placeholder.`,
      });
    }
  });

export type ItemDefinitionInput = z.input<typeof itemDefinitionSchema>;
export type ItemDefinition = z.infer<typeof itemDefinitionSchema>;

export type ItemVariantKind = 'base' | 'noted' | 'placeholder';

/**
 * One resolvable item id. Noted and placeholder variants are expanded from
 * their base definition and point back at it through `canonicalId`.
 */
export interface NormalizedItem {
  readonly id: number;
  readonly canonicalId: number;
  readonly name: string;
  readonly kind: ItemVariantKind;
  readonly tradable: boolean;
  readonly placeholderTemplateId: number;
  readonly placeholderId: number;
  readonly linkedNoteId: number;
}

export const expandItemDefinition = (
  definition: ItemDefinition,
): readonly NormalizedItem[] => {
  const base: NormalizedItem = {
    id: definition.id,
    canonicalId: definition.id,
    name: definition.name,
    kind: 'base',
    tradable: definition.tradable,
    placeholderTemplateId: NO_PLACEHOLDER_TEMPLATE,
    placeholderId: definition.placeholderId ?? NO_LINKED_ITEM,
    linkedNoteId: definition.notedId ?? NO_LINKED_ITEM,
  };
  const entries: NormalizedItem[] = [base];

  if (definition.notedId !== undefined) {
    // Noted forms share tradability and unlock status with the base item.
    const noted: NormalizedItem = {
      id: definition.notedId,
      canonicalId: definition.id,
      name: definition.name,
      kind: 'noted',
      tradable: definition.tradable,
      placeholderTemplateId: NO_PLACEHOLDER_TEMPLATE,
      placeholderId: NO_LINKED_ITEM,
      linkedNoteId: definition.id,
    };
    entries.push(noted);
  }

  if (definition.placeholderId !== undefined) {
    const placeholder: NormalizedItem = {
      id: definition.placeholderId,
      canonicalId: definition.id,
      name: definition.name,
      kind: 'placeholder',
      tradable: false,
      placeholderTemplateId: PLACEHOLDER_TEMPLATE_ID,
      placeholderId: definition.id,
      linkedNoteId: NO_LINKED_ITEM,
    };
    entries.push(placeholder);
  }

  return Object.freeze(entries.map((entry) => Object.freeze(entry)));
};
