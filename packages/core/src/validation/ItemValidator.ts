import type { Language, MenuItem, MenuSize, MenuStore, SizeCode } from '../types/index.js';
import { messagesFor } from '../i18n/messages.js';

export type ItemValidationFailure =
  | 'empty'
  | 'not_found'
  | 'out_of_stock'
  | 'no_sizes'
  | 'size_unavailable'
  | 'invalid_size';

export type ItemValidation =
  | { ok: true; item: MenuItem; size: MenuSize }
  | { ok: false; reason: ItemValidationFailure; message: string; item?: MenuItem }
  | { ok: false; reason: 'similar_found'; message: string; suggestions: string[] };

export interface ItemValidatorConfig {
  /** How many similar names to offer when nothing matches. Defaults to 3. */
  maxSuggestions?: number;
}

/**
 * Checks an item name and size against the menu before anything touches the cart
 */
export class ItemValidator {
  private readonly maxSuggestions: number;

  constructor(
    private readonly menu: MenuStore,
    config: ItemValidatorConfig = {}
  ) {
    this.maxSuggestions = config.maxSuggestions ?? 3;
  }

  async validate(
    itemName: string | null | undefined,
    size?: SizeCode | null,
    language: Language = 'en'
  ): Promise<ItemValidation> {
    const messages = messagesFor(language);
    const query = itemName?.trim() ?? '';
    if (!query) {
      return { ok: false, reason: 'empty', message: messages.emptyItemName };
    }

    const item = await this.menu.getMenuItem(query, false);
    if (!item) {
      const similar = await this.menu.searchMenu(query, this.maxSuggestions);
      if (similar.length > 0) {
        const suggestions = similar.map((candidate) => candidate.name);
        return {
          ok: false,
          reason: 'similar_found',
          message: messages.similarItems(query, suggestions),
          suggestions,
        };
      }
      return { ok: false, reason: 'not_found', message: messages.menuItemNotFound(query) };
    }

    if (!item.available) {
      return { ok: false, reason: 'out_of_stock', message: messages.outOfStock(item.name), item };
    }

    if (!size) {
      const first = item.sizes.find((candidate) => candidate.available);
      if (!first) {
        return { ok: false, reason: 'no_sizes', message: messages.noSizes(item.name), item };
      }
      return { ok: true, item, size: first };
    }

    const match = item.sizes.find((candidate) => candidate.size === size);
    if (!match) {
      const offered = item.sizes.filter((candidate) => candidate.available).map((candidate) => candidate.size);
      return {
        ok: false,
        reason: 'invalid_size',
        message: messages.sizeNotOffered(size, offered),
        item,
      };
    }
    if (!match.available) {
      return {
        ok: false,
        reason: 'size_unavailable',
        message: messages.sizeUnavailable(size, item.name),
        item,
      };
    }

    return { ok: true, item, size: match };
  }
}
