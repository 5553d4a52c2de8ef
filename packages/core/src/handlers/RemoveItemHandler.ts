import type { DialogueContext, IntentHandler } from '../types/index.js';
import { withHandlerResult } from '../context/DialogueContext.js';
import { messagesFor } from '../i18n/messages.js';
import { takeLeadingQuantity } from '../domain/normalize.js';
import type { HandlerDependencies } from './types.js';

export class RemoveItemHandler implements IntentHandler {
  readonly name = 'remove_item';

  constructor(private readonly deps: HandlerDependencies) {}

  canHandle(context: DialogueContext): boolean {
    return context.intent === 'remove_item' && Boolean(context.entities.item?.trim());
  }

  async execute(context: DialogueContext): Promise<DialogueContext> {
    const raw = context.entities.item?.trim().toLowerCase() ?? '';
    const parsed = takeLeadingQuantity(raw, context.language);
    const quantity = context.entities.quantity ?? parsed.quantity;
    const query = parsed.remainder;

    const cart = await this.deps.store.getCart(context.userId);
    if (cart.items.length === 0) {
      return withHandlerResult(context, this.name, {
        success: false,
        error: messagesFor(context.language).emptyCart,
      });
    }

    const line = cart.items.find((candidate) => {
      const name = candidate.itemName.toLowerCase();
      return containsWords(name, query) || containsWords(query, name);
    });
    if (!line) {
      const names = cart.items.map((candidate) => candidate.itemName);
      return withHandlerResult(context, this.name, {
        success: false,
        error: messagesFor(context.language).notInCart(query, names),
      });
    }

    if (quantity === null || quantity >= line.quantity) {
      const removed = await this.deps.store.removeFromCart(context.userId, line.menuSizeId);
      return withHandlerResult(context, this.name, {
        success: removed.success,
        message: removed.success && quantity !== null ? `Removed all ${line.itemName} from cart` : removed.message,
        ...(removed.success ? {} : { error: removed.message }),
      });
    }

    const remaining = line.quantity - quantity;
    const updated = await this.deps.store.updateCartQuantity(context.userId, line.menuSizeId, remaining);
    if (!updated.success) {
      return withHandlerResult(context, this.name, { success: false, error: updated.message });
    }

    return withHandlerResult(context, this.name, {
      success: true,
      message: `Removed ${quantity} ${line.itemName}, ${remaining} remaining`,
    });
  }
}

/**
 * Every word of `needle` appears as a whole word in `haystack`; a plural "s" is ignored
 */
function containsWords(haystack: string, needle: string): boolean {
  const words = haystack.split(/\s+/).filter(Boolean);
  const wanted = needle.split(/\s+/).filter(Boolean);
  return wanted.length > 0 && wanted.every((word) => words.some((candidate) => sameWord(candidate, word)));
}

function sameWord(a: string, b: string): boolean {
  return a === b || a === `${b}s` || b === `${a}s`;
}
