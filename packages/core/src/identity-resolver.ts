import { NO_PLACEHOLDER_TEMPLATE } from '@icon-dimmer/item-schema';

export { NO_PLACEHOLDER_TEMPLATE };

export interface ItemComposition {
  readonly tradable: boolean;
  /** {@link NO_PLACEHOLDER_TEMPLATE} unless the item is a placeholder. */
  readonly placeholderTemplateId: number;
  /** For placeholders, the item the placeholder stands in for. */
  readonly placeholderId: number;
  /** The other half of a noted/unnoted pair; `<= 0` when unpaired. */
  readonly linkedNoteId: number;
}

/**
 * Item metadata source. Both operations may throw; the engine treats every
 * failure as "unknown" and applies its own default.
 */
export interface IdentityResolver {
  canonicalize(rawItemId: number): number;
  getComposition(itemId: number): ItemComposition | null | undefined;
}
