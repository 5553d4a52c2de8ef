import type { DialogueContext, IntentHandler } from '../types/index.js';
import { EMPTY_CART, withHandlerResult } from '../context/DialogueContext.js';
import { messagesFor } from '../i18n/messages.js';
import type { HandlerDependencies } from './types.js';

export class ClearCartHandler implements IntentHandler {
  readonly name = 'clear_cart';

  constructor(private readonly deps: HandlerDependencies) {}

  canHandle(context: DialogueContext): boolean {
    return context.intent === 'clear_cart';
  }

  async execute(context: DialogueContext): Promise<DialogueContext> {
    const cleared = await this.deps.store.clearCart(context.userId);
    if (!cleared.success) {
      return withHandlerResult(context, this.name, { success: false, error: cleared.message });
    }

    return withHandlerResult(
      context,
      this.name,
      { success: true, message: messagesFor(context.language).cartCleared },
      { cart: EMPTY_CART }
    );
  }
}
