import type {
  CartStore,
  HandlerResult,
  Language,
  PendingSuggestion,
  SessionState,
  SizeCode,
} from '../types/index.js';
import { messagesFor } from '../i18n/messages.js';
import type { ItemValidation, ItemValidator } from '../validation/ItemValidator.js';

export const SUGGESTION_TTL_MS = 5 * 60 * 1000;

export interface SuggestionProtocolConfig {
  ttlMs?: number;
  now?: () => Date;
}

export interface SuggestionOutcome {
  result: HandlerResult;
  session: SessionState;
}

/**
 * Propose-then-confirm flow for near-miss item names. A suggestion is resolved
 * at most once: confirming, rejecting or finding it expired all clear it.
 */
export class SuggestionProtocol {
  private readonly ttlMs: number;
  private readonly now: () => Date;

  constructor(
    private readonly cart: CartStore,
    private readonly validator: ItemValidator,
    config: SuggestionProtocolConfig = {}
  ) {
    this.ttlMs = config.ttlMs ?? SUGGESTION_TTL_MS;
    this.now = config.now ?? (() => new Date());
  }

  createSuggestion(item: string, size: SizeCode | null, quantity: number): PendingSuggestion {
    return { type: 'add_item', item, size, quantity, createdAt: this.now() };
  }

  /**
   * Record a suggestion on the session, replacing any earlier one
   */
  propose(
    session: SessionState,
    original: string,
    item: string,
    size: SizeCode | null,
    quantity: number,
    language: Language
  ): SuggestionOutcome {
    const suggestion = this.createSuggestion(item, size, quantity);
    const message = messagesFor(language).suggestAlternative(original, item, size);

    return {
      result: { success: false, error: `'${original}' not found`, message, suggestionCreated: true },
      session: { ...session, pendingSuggestion: suggestion, dialogueState: 'awaiting_confirmation' },
    };
  }

  isExpired(suggestion: PendingSuggestion): boolean {
    return this.now().getTime() - suggestion.createdAt.getTime() > this.ttlMs;
  }

  async confirm(userId: string, session: SessionState, language: Language): Promise<SuggestionOutcome> {
    const messages = messagesFor(language);
    const suggestion = session.pendingSuggestion;
    const cleared: SessionState = { ...session, pendingSuggestion: null, dialogueState: 'idle' };

    if (!suggestion) {
      return { result: { success: false, message: messages.nothingToConfirm }, session: cleared };
    }

    if (this.isExpired(suggestion)) {
      return { result: { success: false, message: messages.suggestionExpired }, session: cleared };
    }

    const validation = await this.resolveSize(suggestion, language);
    if (!validation.ok) {
      return {
        result: { success: false, error: validation.message, message: validation.message },
        session: cleared,
      };
    }

    const added = await this.cart.addToCart(userId, validation.size.id, suggestion.quantity);
    if (!added.success) {
      return { result: { success: false, error: added.message, message: added.message }, session: cleared };
    }

    return {
      result: {
        success: true,
        message: messages.suggestionAdded(suggestion.quantity, validation.size.size, validation.item.name),
        itemAdded: { name: validation.item.name, size: validation.size.size, quantity: suggestion.quantity },
      },
      session: cleared,
    };
  }

  reject(session: SessionState, language: Language): SuggestionOutcome {
    const messages = messagesFor(language);
    return {
      result: {
        success: true,
        message: session.pendingSuggestion ? messages.rejectedSuggestion : messages.rejectedNothing,
      },
      session: { ...session, pendingSuggestion: null, dialogueState: 'idle' },
    };
  }

  // Requested size if offered, else REG, else the first available size
  private async resolveSize(suggestion: PendingSuggestion, language: Language): Promise<ItemValidation> {
    if (suggestion.size) {
      const exact = await this.validator.validate(suggestion.item, suggestion.size, language);
      if (exact.ok || (exact.reason !== 'invalid_size' && exact.reason !== 'size_unavailable')) {
        return exact;
      }
    }

    const fallback = await this.validator.validate(suggestion.item, null, language);
    if (!fallback.ok) return fallback;

    const regular = fallback.item.sizes.find((size) => size.size === 'REG' && size.available);
    return regular ? { ...fallback, size: regular } : fallback;
  }
}
